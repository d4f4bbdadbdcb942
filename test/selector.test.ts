import { describe, it, expect } from 'vitest';
import { compileSelector, formatSelector, matchesPath, parseSelector } from '../src/selector.js';
import { SelectorParseError } from '../src/errors.js';
import type { ContentPath, PathStep } from '../src/types/content.js';
import { int, str } from '../src/content.js';

function fieldPath(...names: string[]): ContentPath {
  return names.map((name, entry): PathStep => ({ kind: 'field', entry, name }));
}

function expectParseError(source: string, position: number, reason: string): void {
  try {
    compileSelector(source);
    expect.unreachable(`${source} should not parse`);
  } catch (error) {
    expect(error).toBeInstanceOf(SelectorParseError);
    if (error instanceof SelectorParseError) {
      expect(error.position).toBe(position);
      expect(error.reason).toBe(reason);
    }
  }
}

describe('compileSelector', () => {
  it('parses keys with and without a leading dot', () => {
    expect(compileSelector('.user.name').segments).toEqual([
      { kind: 'key', key: 'user' },
      { kind: 'key', key: 'name' },
    ]);
    expect(compileSelector('user.name').segments).toEqual(compileSelector('.user.name').segments);
  });

  it('parses indexes and wildcards', () => {
    expect(compileSelector('.items.0.*.**').segments).toEqual([
      { kind: 'key', key: 'items' },
      { kind: 'index', index: 0 },
      { kind: 'wildcard' },
      { kind: 'recursive' },
    ]);
  });

  it('parses quoted keys containing separators and escapes', () => {
    expect(compileSelector('."a.b"."say \\"hi\\""').segments).toEqual([
      { kind: 'key', key: 'a.b' },
      { kind: 'key', key: 'say "hi"' },
    ]);
  });

  it('keeps the source text', () => {
    expect(compileSelector('*.id').source).toBe('*.id');
  });

  it('accepts identifiers with dashes and dollars', () => {
    expect(compileSelector('.x-request-id.$ref').segments).toEqual([
      { kind: 'key', key: 'x-request-id' },
      { kind: 'key', key: '$ref' },
    ]);
  });

  describe('errors', () => {
    it('rejects an empty selector', () => expectParseError('', 0, 'empty-selector'));
    it('rejects a lone dot', () => expectParseError('.', 0, 'trailing-separator'));
    it('rejects empty segments', () => expectParseError('.a..b', 3, 'empty-segment'));
    it('rejects a trailing separator', () => expectParseError('.a.', 2, 'trailing-separator'));
    it('rejects an unterminated quote', () => expectParseError('.a."bc', 3, 'unterminated-quote'));
    it('rejects a dangling escape', () => expectParseError('."ab\\', 1, 'unterminated-quote'));
    it('rejects invalid integers', () => expectParseError('.items.1a', 7, 'invalid-integer'));
    it('rejects three stars', () => expectParseError('.***', 3, 'unexpected-character'));
    it('rejects spaces', () => expectParseError('.a b', 2, 'unexpected-character'));
    it('rejects text after a quoted key', () => expectParseError('."a"b', 4, 'unexpected-character'));
  });

  it('formats a readable message', () => {
    expect(() => compileSelector('.a.')).toThrow(
      'Invalid selector ".a." at 2: selector ends with a separator',
    );
  });
});

describe('parseSelector', () => {
  it('returns ok for valid input', () => {
    const result = parseSelector('.a');
    expect(result.ok).toBe(true);
  });

  it('returns the error instead of throwing', () => {
    const result = parseSelector('.a."');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(SelectorParseError);
  });
});

describe('formatSelector', () => {
  it('quotes keys that are not identifiers', () => {
    expect(formatSelector(compileSelector('a."b.c".0.*.**'))).toBe('.a."b.c".0.*.**');
  });
});

describe('matchesPath', () => {
  it('matches exact key paths', () => {
    expect(matchesPath(compileSelector('.user.id'), fieldPath('user', 'id'))).toBe(true);
    expect(matchesPath(compileSelector('.user.id'), fieldPath('user'))).toBe(false);
    expect(matchesPath(compileSelector('.user.id'), fieldPath('user', 'id', 'x'))).toBe(false);
  });

  it('matches one level per wildcard', () => {
    const selector = compileSelector('*.id');
    expect(matchesPath(selector, fieldPath('a', 'id'))).toBe(true);
    expect(matchesPath(selector, fieldPath('id'))).toBe(false);
    expect(matchesPath(selector, fieldPath('a', 'b', 'id'))).toBe(false);
  });

  it('matches any depth with a recursive wildcard, including zero levels', () => {
    const selector = compileSelector('**.id');
    expect(matchesPath(selector, fieldPath('id'))).toBe(true);
    expect(matchesPath(selector, fieldPath('user', 'id'))).toBe(true);
    expect(matchesPath(selector, fieldPath('a', 'b', 'c', 'id'))).toBe(true);
    expect(matchesPath(selector, fieldPath('a', 'id', 'b'))).toBe(false);
  });

  it('matches a node and all descendants with a trailing recursive wildcard', () => {
    const selector = compileSelector('.user.**');
    expect(matchesPath(selector, fieldPath('user'))).toBe(true);
    expect(matchesPath(selector, fieldPath('user', 'a', 'b'))).toBe(true);
    expect(matchesPath(selector, fieldPath('other'))).toBe(false);
  });

  it('matches sequence indexes and integer map keys', () => {
    const selector = compileSelector('.2');
    expect(matchesPath(selector, [{ kind: 'seq', index: 2 }])).toBe(true);
    expect(matchesPath(selector, [{ kind: 'map', entry: 0, key: int(2) }])).toBe(true);
    expect(matchesPath(selector, [{ kind: 'map', entry: 2, key: str('2') }])).toBe(false);
  });

  it('skips enum payload steps', () => {
    const path: ContentPath = [
      { kind: 'field', entry: 0, name: 'state' },
      { kind: 'payload' },
      { kind: 'field', entry: 0, name: 'since' },
    ];
    expect(matchesPath(compileSelector('.state.since'), path)).toBe(true);
  });

  it('lets wildcards match opaque keys', () => {
    const path: ContentPath = [{ kind: 'map', entry: 0, key: int(-1) }];
    expect(matchesPath(compileSelector('.*'), path)).toBe(true);
    expect(matchesPath(compileSelector('.0'), path)).toBe(false);
  });
});
