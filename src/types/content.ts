export type ContentKind =
  | 'nil'
  | 'bool'
  | 'int'
  | 'float'
  | 'string'
  | 'bytes'
  | 'seq'
  | 'map'
  | 'struct'
  | 'enum';

export interface NilContent {
  readonly kind: 'nil';
}

export interface BoolContent {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface IntContent {
  readonly kind: 'int';
  readonly value: bigint;
}

export interface FloatContent {
  readonly kind: 'float';
  readonly value: number;
}

export interface StringContent {
  readonly kind: 'string';
  readonly value: string;
}

export interface BytesContent {
  readonly kind: 'bytes';
  /** Octets, 0..255 */
  readonly value: readonly number[];
}

export interface SeqContent {
  readonly kind: 'seq';
  readonly items: readonly Content[];
}

export type MapEntry = readonly [key: Content, value: Content];

export interface MapContent {
  readonly kind: 'map';
  /** Insertion order is significant and never re-sorted. */
  readonly entries: readonly MapEntry[];
}

export type StructField = readonly [name: string, value: Content];

export interface StructContent {
  readonly kind: 'struct';
  readonly name: string;
  readonly fields: readonly StructField[];
}

export interface EnumContent {
  readonly kind: 'enum';
  readonly name: string;
  readonly variant: string;
  readonly payload: Content | null;
}

export type Content =
  | NilContent
  | BoolContent
  | IntContent
  | FloatContent
  | StringContent
  | BytesContent
  | SeqContent
  | MapContent
  | StructContent
  | EnumContent;

/** Values a redaction may substitute for a subtree. */
export type PrimitiveContent = BoolContent | IntContent | FloatContent | StringContent;

/**
 * One positional step from a node to one of its children.
 * `entry` is the position within a map's entries or a struct's fields.
 */
export type PathStep =
  | { readonly kind: 'seq'; readonly index: number }
  | { readonly kind: 'map'; readonly entry: number; readonly key: Content }
  | { readonly kind: 'field'; readonly entry: number; readonly name: string }
  | { readonly kind: 'payload' };

export type ContentPath = readonly PathStep[];
