import type {
  BoolContent,
  BytesContent,
  Content,
  ContentPath,
  EnumContent,
  FloatContent,
  IntContent,
  MapContent,
  MapEntry,
  NilContent,
  PathStep,
  SeqContent,
  StringContent,
  StructContent,
  StructField,
} from './types/content.js';
import { SerializationError } from './errors.js';

// ─── CONSTRUCTORS ───
// Every node is frozen on construction. Containers copy their input lists.

const NIL: NilContent = Object.freeze({ kind: 'nil' });

export function nil(): NilContent {
  return NIL;
}

export function bool(value: boolean): BoolContent {
  return Object.freeze({ kind: 'bool', value });
}

export function int(value: bigint | number): IntContent {
  if (typeof value === 'number' && !Number.isInteger(value)) {
    throw new SerializationError(`Integer content requires an integral value, got ${value}`);
  }
  return Object.freeze({ kind: 'int', value: BigInt(value) });
}

export function float(value: number): FloatContent {
  return Object.freeze({ kind: 'float', value });
}

export function str(value: string): StringContent {
  return Object.freeze({ kind: 'string', value });
}

export function bytes(value: Iterable<number>): BytesContent {
  const octets = Array.from(value);
  for (const b of octets) {
    if (!Number.isInteger(b) || b < 0 || b > 255) {
      throw new SerializationError(`Byte content requires octets in 0..255, got ${b}`);
    }
  }
  return Object.freeze({ kind: 'bytes', value: Object.freeze(octets) });
}

export function seq(items: readonly Content[]): SeqContent {
  return Object.freeze({ kind: 'seq', items: Object.freeze([...items]) });
}

export function map(entries: readonly MapEntry[]): MapContent {
  return Object.freeze({
    kind: 'map',
    entries: Object.freeze(entries.map(([k, v]) => Object.freeze([k, v] as const))),
  });
}

export function struct(name: string, fields: readonly StructField[]): StructContent {
  if (name.length === 0) throw new SerializationError('Struct content requires a non-empty name');
  return Object.freeze({
    kind: 'struct',
    name,
    fields: Object.freeze(fields.map(([n, v]) => Object.freeze([n, v] as const))),
  });
}

export function enumVariant(name: string, variant: string, payload: Content | null = null): EnumContent {
  if (name.length === 0) throw new SerializationError('Enum content requires a non-empty name');
  if (variant.length === 0) throw new SerializationError('Enum content requires a non-empty variant');
  return Object.freeze({ kind: 'enum', name, variant, payload });
}

// ─── TRAVERSAL ───

export interface ChildEntry {
  step: PathStep;
  node: Content;
}

/**
 * Positional children of a node, in order.
 * Map keys are labels, not children: only map values are returned.
 */
export function childrenOf(node: Content): ChildEntry[] {
  switch (node.kind) {
    case 'seq':
      return node.items.map((item, index) => ({ step: { kind: 'seq', index }, node: item }));
    case 'map':
      return node.entries.map(([key, value], entry) => ({
        step: { kind: 'map', entry, key },
        node: value,
      }));
    case 'struct':
      return node.fields.map(([name, value], entry) => ({
        step: { kind: 'field', entry, name },
        node: value,
      }));
    case 'enum':
      return node.payload === null ? [] : [{ step: { kind: 'payload' }, node: node.payload }];
    default:
      return [];
  }
}

/**
 * Return a new tree with the node at `path` replaced by `value`.
 * Steps that do not fit the tree leave it unchanged; unchanged subtrees are shared.
 */
export function replaceAt(tree: Content, path: ContentPath, value: Content): Content {
  if (path.length === 0) return value;
  const [step, ...rest] = path;

  switch (step.kind) {
    case 'seq': {
      if (tree.kind !== 'seq' || step.index >= tree.items.length) return tree;
      const items = [...tree.items];
      items[step.index] = replaceAt(items[step.index], rest, value);
      return seq(items);
    }
    case 'map': {
      if (tree.kind !== 'map' || step.entry >= tree.entries.length) return tree;
      const entries = [...tree.entries];
      const [key, child] = entries[step.entry];
      entries[step.entry] = [key, replaceAt(child, rest, value)];
      return map(entries);
    }
    case 'field': {
      if (tree.kind !== 'struct' || step.entry >= tree.fields.length) return tree;
      const fields = [...tree.fields];
      const [name, child] = fields[step.entry];
      fields[step.entry] = [name, replaceAt(child, rest, value)];
      return struct(tree.name, fields);
    }
    case 'payload': {
      if (tree.kind !== 'enum' || tree.payload === null) return tree;
      return enumVariant(tree.name, tree.variant, replaceAt(tree.payload, rest, value));
    }
    default: {
      const _exhaustive: never = step;
      return _exhaustive;
    }
  }
}

// ─── EQUALITY ───

export function contentEquals(a: Content, b: Content): boolean {
  switch (a.kind) {
    case 'nil':
      return b.kind === 'nil';
    case 'bool':
      return b.kind === 'bool' && b.value === a.value;
    case 'int':
      return b.kind === 'int' && b.value === a.value;
    case 'string':
      return b.kind === 'string' && b.value === a.value;
    case 'float':
      return b.kind === 'float' && Object.is(a.value, b.value);
    case 'bytes':
      return (
        b.kind === 'bytes' &&
        a.value.length === b.value.length &&
        a.value.every((octet, i) => octet === b.value[i])
      );
    case 'seq':
      return (
        b.kind === 'seq' &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => contentEquals(item, b.items[i]))
      );
    case 'map':
      return (
        b.kind === 'map' &&
        a.entries.length === b.entries.length &&
        a.entries.every(
          ([k, v], i) => contentEquals(k, b.entries[i][0]) && contentEquals(v, b.entries[i][1]),
        )
      );
    case 'struct':
      return (
        b.kind === 'struct' &&
        a.name === b.name &&
        a.fields.length === b.fields.length &&
        a.fields.every(([n, v], i) => n === b.fields[i][0] && contentEquals(v, b.fields[i][1]))
      );
    case 'enum':
      if (b.kind !== 'enum' || a.name !== b.name || a.variant !== b.variant) return false;
      if (a.payload === null || b.payload === null) return a.payload === b.payload;
      return contentEquals(a.payload, b.payload);
    default: {
      const _exhaustive: never = a;
      return _exhaustive;
    }
  }
}
