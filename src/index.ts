// Types
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
  Selector,
  SelectorSegment,
  SnapshotIdentity,
  SnapshotLocation,
  SnapshotOutcome,
  SnapshotStatus,
  PassedOutcome,
  UpdatedOutcome,
  FailedOutcome,
} from './types/index.js';

// Content model
export {
  nil,
  bool,
  int,
  float,
  str,
  bytes,
  seq,
  map,
  struct,
  enumVariant,
  childrenOf,
  replaceAt,
  contentEquals,
} from './content.js';
export type { ChildEntry } from './content.js';
export { validateContent } from './validate.js';
export type { ValidationResult } from './validate.js';
export { parseContent } from './parse.js';
export type { ParseResult } from './parse.js';
export { isContent, isPrimitiveContent, isFailedOutcome } from './guards.js';
export { captureValue } from './capture.js';
export type { CaptureFn, Snapshotable } from './capture.js';

// Selectors and redaction
export { compileSelector, parseSelector, formatSelector, matchesPath } from './selector.js';
export { redaction, compileRedactions, applyRedactions } from './redact.js';
export type { RedactionRule, RedactionSpec, Replacement } from './redact.js';

// Rendering
export {
  SNAPSHOT_FORMATS,
  FORMAT_REGISTRY,
  TEXT_FORMAT,
  DEBUG_FORMAT,
  isSnapshotFormat,
  getFormatMeta,
} from './formats.js';
export type { SnapshotFormat, RecordedFormat, FormatMeta } from './formats.js';
export { render, renderJson, renderBlock, renderTyped, renderDebug } from './render/index.js';
export { diffLines, formatDiff, hasChanges } from './diff.js';
export type { DiffLine, DiffOp } from './diff.js';

// Storage
export {
  SNAPSHOT_DIR,
  SNAPSHOT_EXTENSION,
  PENDING_SUFFIX,
  encodeComponent,
  snapshotName,
  baseSnapshotPath,
  resolveSnapshotPath,
  SnapshotCounter,
} from './identity.js';
export { formatSnapshotFile, parseSnapshotFile, SnapshotHeaderSchema } from './snapshot-file.js';
export type { SnapshotFile, SnapshotHeader } from './snapshot-file.js';
export { SnapshotStore, compareSnapshots, normalizeBody } from './store.js';
export type { Comparison, StoredSnapshot, SnapshotStoreOptions } from './store.js';

// Assertions
export {
  assertSnapshot,
  ensurePassed,
  SnapshotSession,
  createSnapshotSession,
  createSessionFromEnv,
} from './assert.js';
export type {
  AssertionRequest,
  AssertionContext,
  AssertionSite,
  IdentityInput,
  Redactions,
  SnapshotSessionOptions,
  SnapshotSubject,
} from './assert.js';

// Configuration and logging
export { loadConfig, EnvSchema, SwitchSchema } from './config.js';
export type { SnapwardConfig } from './config.js';
export { createLogger, consoleLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

// Errors
export {
  SnapshotError,
  SelectorParseError,
  SerializationError,
  CaptureError,
  SnapshotIoError,
  SnapshotFormatError,
  ConfigError,
  SnapshotMismatchError,
} from './errors.js';
export type { SelectorParseReason } from './errors.js';
