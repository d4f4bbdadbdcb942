import { describe, it, expect } from 'vitest';
import { captureValue } from '../src/capture.js';
import type { Snapshotable } from '../src/capture.js';
import { bytes, enumVariant, float, int, map, nil, seq, str, struct } from '../src/content.js';
import { CaptureError } from '../src/errors.js';

class Point {
  constructor(
    public x: number,
    public y: number,
  ) {}
}

class Status implements Snapshotable {
  constructor(private readonly active: boolean) {}

  toSnapshotContent() {
    return enumVariant('Status', this.active ? 'Active' : 'Inactive');
  }
}

class Marker {}

class NotFound extends Error {
  code = 'E404';

  constructor() {
    super('missing');
    this.name = 'NotFound';
  }
}

class Broken {
  toSnapshotContent(): unknown {
    return undefined;
  }
}

describe('captureValue', () => {
  it('captures scalars', () => {
    expect(captureValue(null)).toEqual(nil());
    expect(captureValue(undefined)).toEqual(nil());
    expect(captureValue(3)).toEqual(int(3));
    expect(captureValue(2.5)).toEqual(float(2.5));
    expect(captureValue(10n)).toEqual(int(10));
    expect(captureValue('hi')).toEqual(str('hi'));
  });

  it('keeps plain object key order and omits undefined properties', () => {
    expect(captureValue({ b: 1, a: 'x', c: undefined })).toEqual(
      map([
        [str('b'), int(1)],
        [str('a'), str('x')],
      ]),
    );
  });

  it('captures class instances as structs', () => {
    expect(captureValue(new Point(1, 2))).toEqual(struct('Point', [['x', int(1)], ['y', int(2)]]));
  });

  it('uses toSnapshotContent when present', () => {
    expect(captureValue([new Status(true)])).toEqual(seq([enumVariant('Status', 'Active')]));
  });

  it('captures Map, Set, Uint8Array and Date', () => {
    expect(captureValue(new Map([[1, 'one']]))).toEqual(map([[int(1), str('one')]]));
    expect(captureValue(new Set(['a']))).toEqual(seq([str('a')]));
    expect(captureValue(new Uint8Array([0, 255]))).toEqual(bytes([0, 255]));
    expect(captureValue(new Date('2024-01-02T03:04:05.000Z'))).toEqual(str('2024-01-02T03:04:05.000Z'));
  });

  it('allows shared references that are not cycles', () => {
    const shared = { id: 1 };
    const tree = captureValue({ a: shared, b: shared });
    expect(tree.kind === 'map' && tree.entries.length).toBe(2);
  });

  it('fails on cycles with the path of the repeat', () => {
    const node: Record<string, unknown> = { name: 'root' };
    node.self = node;
    expect(() => captureValue(node)).toThrow('Cannot capture value at $.self: cyclic reference');
  });

  it('fails on functions instead of dropping them', () => {
    expect(() => captureValue({ items: [() => 1] })).toThrow(CaptureError);
    expect(() => captureValue({ items: [() => 1] })).toThrow('$.items[0]');
  });

  it('fails on symbols and invalid dates', () => {
    expect(() => captureValue(Symbol('s'))).toThrow('symbols have no structural form');
    expect(() => captureValue(new Date(NaN))).toThrow('invalid date');
  });

  it('quotes keys that are not identifiers in error paths', () => {
    expect(() => captureValue({ 'a b': Symbol('s') })).toThrow('$["a b"]');
  });

  it('rejects toSnapshotContent results that are not content', () => {
    expect(() => captureValue([new Broken()])).toThrow(
      'Cannot capture value at $[0]: toSnapshotContent() did not return content',
    );
  });

  it('captures errors by name, message and cause', () => {
    expect(captureValue(new Error('boom'))).toEqual(
      struct('Error', [
        ['name', str('Error')],
        ['message', str('boom')],
      ]),
    );
    expect(captureValue(new Error('outer', { cause: new TypeError('inner') }))).toEqual(
      struct('Error', [
        ['name', str('Error')],
        ['message', str('outer')],
        [
          'cause',
          struct('TypeError', [
            ['name', str('TypeError')],
            ['message', str('inner')],
          ]),
        ],
      ]),
    );
  });

  it('keeps extra fields of error subclasses', () => {
    expect(captureValue(new NotFound())).toEqual(
      struct('NotFound', [
        ['name', str('NotFound')],
        ['message', str('missing')],
        ['code', str('E404')],
      ]),
    );
  });

  it('captures regular expressions and URLs as strings', () => {
    expect(captureValue({ pattern: /secret-pattern/g })).toEqual(
      map([[str('pattern'), str('/secret-pattern/g')]]),
    );
    expect(captureValue(new URL('https://example.org/a?b=1'))).toEqual(str('https://example.org/a?b=1'));
  });

  it('fails on built-ins whose state is not enumerable', () => {
    expect(() => captureValue({ p: Promise.resolve(1) })).toThrow(
      'Cannot capture value at $.p: Promise has no enumerable state; supply toSnapshotContent()',
    );
    expect(() => captureValue(new WeakMap())).toThrow(CaptureError);
  });

  it('keeps field-less user classes as empty structs', () => {
    expect(captureValue(new Marker())).toEqual(struct('Marker', []));
  });

  it('fails on symbol-keyed properties instead of dropping them', () => {
    expect(() => captureValue({ a: 1, [Symbol('k')]: 2 })).toThrow(
      'Cannot capture value at $: symbol-keyed properties have no structural form',
    );
  });
});
