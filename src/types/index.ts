export type {
  Content,
  ContentKind,
  NilContent,
  BoolContent,
  IntContent,
  FloatContent,
  StringContent,
  BytesContent,
  SeqContent,
  MapContent,
  MapEntry,
  StructContent,
  StructField,
  EnumContent,
  PrimitiveContent,
  PathStep,
  ContentPath,
} from './content.js';
export type { Selector, SelectorSegment } from './selector.js';
export type { SnapshotIdentity, SnapshotLocation } from './identity.js';
export type {
  SnapshotOutcome,
  SnapshotStatus,
  PassedOutcome,
  UpdatedOutcome,
  FailedOutcome,
} from './outcome.js';
