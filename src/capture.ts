import type { Content, MapEntry, StructField } from './types/content.js';
import { CaptureError } from './errors.js';
import { bool, bytes, float, int, map, nil, seq, str, struct } from './content.js';
import { isContent } from './guards.js';

/**
 * Values that know their own structural form.
 * Use this to supply struct field order or enum variants explicitly.
 */
export interface Snapshotable {
  toSnapshotContent(): Content;
}

export type CaptureFn = (value: unknown) => Content;

function isSnapshotable(value: object): value is Snapshotable {
  return typeof (value as Partial<Snapshotable>).toSnapshotContent === 'function';
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

function isNativeConstructor(ctor: unknown): boolean {
  return typeof ctor === 'function' && /\{\s*\[native code\]\s*\}$/.test(Function.prototype.toString.call(ctor));
}

function keyPath(path: string, key: string): string {
  return /^[A-Za-z_$][A-Za-z0-9_$]*$/.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

function captureNode(value: unknown, path: string, ancestors: Set<object>): Content {
  switch (typeof value) {
    case 'undefined':
      return nil();
    case 'boolean':
      return bool(value);
    case 'bigint':
      return int(value);
    case 'number':
      return Number.isInteger(value) ? int(value) : float(value);
    case 'string':
      return str(value);
    case 'function':
      throw new CaptureError(path, 'functions have no structural form');
    case 'symbol':
      throw new CaptureError(path, 'symbols have no structural form');
  }
  if (value === null || typeof value !== 'object') return nil();

  if (ancestors.has(value)) {
    throw new CaptureError(path, 'cyclic reference');
  }
  ancestors.add(value);
  try {
    return captureObject(value, path, ancestors);
  } finally {
    ancestors.delete(value);
  }
}

function captureObject(value: object, path: string, ancestors: Set<object>): Content {
  if (isSnapshotable(value)) {
    const content: unknown = value.toSnapshotContent();
    if (!isContent(content)) throw new CaptureError(path, 'toSnapshotContent() did not return content');
    return content;
  }

  if (value instanceof Uint8Array) return bytes(value);

  if (Array.isArray(value)) {
    return seq(value.map((item: unknown, i) => captureNode(item, `${path}[${i}]`, ancestors)));
  }

  if (value instanceof Set) {
    return seq([...value].map((item: unknown, i) => captureNode(item, `${path}[${i}]`, ancestors)));
  }

  if (value instanceof Map) {
    const entries: MapEntry[] = [];
    let i = 0;
    for (const [k, v] of value) {
      entries.push([
        captureNode(k, `${path}.<key ${i}>`, ancestors),
        captureNode(v, `${path}.<value ${i}>`, ancestors),
      ]);
      i++;
    }
    return map(entries);
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new CaptureError(path, 'invalid date');
    return str(value.toISOString());
  }

  if (value instanceof RegExp) return str(value.toString());

  if (value instanceof URL) return str(value.href);

  if (value instanceof URLSearchParams) return str(value.toString());

  const symbolKeys = Object.getOwnPropertySymbols(value).filter(k =>
    Object.prototype.propertyIsEnumerable.call(value, k),
  );
  if (symbolKeys.length > 0) {
    throw new CaptureError(path, 'symbol-keyed properties have no structural form');
  }

  const record = value as Record<string, unknown>;
  const ownKeys = Object.keys(record);
  const keys = ownKeys.filter(k => record[k] !== undefined);
  const fieldsOf = (skip: ReadonlySet<string>): StructField[] =>
    keys.filter(k => !skip.has(k)).map((k): StructField => [k, captureNode(record[k], keyPath(path, k), ancestors)]);

  if (isPlainObject(value)) {
    return map(keys.map(k => [str(k), captureNode(record[k], keyPath(path, k), ancestors)] as const));
  }

  const ctor: unknown = value.constructor;
  const name = typeof ctor === 'function' ? ctor.name : '';
  if (!name) throw new CaptureError(path, 'anonymous class instances need toSnapshotContent()');

  // Stack traces depend on the call site and are left out.
  if (value instanceof Error) {
    const fields: StructField[] = [
      ['name', str(value.name)],
      ['message', str(value.message)],
    ];
    if (value.cause !== undefined) fields.push(['cause', captureNode(value.cause, `${path}.cause`, ancestors)]);
    return struct(name, [...fields, ...fieldsOf(new Set(['name', 'message', 'cause', 'stack']))]);
  }

  // Built-ins keep their state in internal slots, which a key walk cannot see.
  if (ownKeys.length === 0 && isNativeConstructor(ctor)) {
    throw new CaptureError(path, `${name} has no enumerable state; supply toSnapshotContent()`);
  }

  return struct(name, fieldsOf(new Set()));
}

/**
 * Default capture collaborator for plain JavaScript values.
 * Plain objects become maps, class instances become structs named after
 * their constructor. Errors keep name, message and cause; regular expressions
 * and URLs become their string form. Shapes without a structural form throw
 * CaptureError.
 */
export function captureValue(value: unknown): Content {
  return captureNode(value, '$', new Set());
}
