import { describe, it, expect } from 'vitest';
import { validateContent } from '../src/validate.js';
import { parseContent } from '../src/parse.js';
import { isContent, isPrimitiveContent } from '../src/guards.js';
import { contentEquals, enumVariant, int, map, nil, seq, str } from '../src/content.js';
import { SerializationError } from '../src/errors.js';

describe('validateContent', () => {
  describe('valid inputs', () => {
    it('validates a nested tree built from plain objects', () => {
      const result = validateContent({
        kind: 'map',
        entries: [[{ kind: 'string', value: 'ids' }, { kind: 'seq', items: [{ kind: 'int', value: 1n }] }]],
      });
      expect(result.valid).toBe(true);
      expect(result.kind).toBe('map');
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
    });

    it('accepts unit enum variants', () => {
      const result = validateContent({ kind: 'enum', name: 'E', variant: 'A', payload: null });
      expect(result.valid).toBe(true);
    });
  });

  describe('invalid inputs', () => {
    it('rejects null', () => {
      const result = validateContent(null);
      expect(result.valid).toBe(false);
      expect(result.kind).toBeNull();
      expect(result.errors).toEqual(['$ must be an object with a known "kind"']);
    });

    it('rejects numbers where bigints are required', () => {
      const result = validateContent({ kind: 'int', value: 1 });
      expect(result.errors).toEqual(['$.value must be a bigint']);
    });

    it('reports nested locations', () => {
      const result = validateContent({
        kind: 'struct',
        name: 'User',
        fields: [['tags', { kind: 'seq', items: [{ kind: 'string', value: 3 }] }]],
      });
      expect(result.errors).toEqual(['$.tags[0].value must be a string']);
    });

    it('rejects out-of-range octets', () => {
      const result = validateContent({ kind: 'bytes', value: [1, 300] });
      expect(result.errors).toEqual(['$.value[1] must be an integer in 0..255']);
    });

    it('rejects malformed map entries', () => {
      const result = validateContent({ kind: 'map', entries: [[{ kind: 'nil' }]] });
      expect(result.errors).toEqual(['$.entries[0] must be a [key, value] pair']);
    });

    it('rejects enums without a variant', () => {
      const result = validateContent({ kind: 'enum', name: 'E', variant: '', payload: null });
      expect(result.errors).toEqual(['$.variant must be a non-empty string']);
    });
  });

  describe('warnings', () => {
    it('warns on duplicate map keys', () => {
      const result = validateContent({
        kind: 'map',
        entries: [
          [{ kind: 'string', value: 'a' }, { kind: 'nil' }],
          [{ kind: 'string', value: 'a' }, { kind: 'nil' }],
        ],
      });
      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual(['$ has duplicate key string:a']);
    });

    it('warns on duplicate struct fields', () => {
      const result = validateContent({
        kind: 'struct',
        name: 'S',
        fields: [['x', { kind: 'nil' }], ['x', { kind: 'nil' }]],
      });
      expect(result.warnings).toEqual(['$ has duplicate field "x"']);
    });
  });
});

describe('parseContent', () => {
  it('returns a frozen copy of a valid tree', () => {
    const input = { kind: 'seq', items: [{ kind: 'string', value: 'a' }] };
    const result = parseContent(input);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(contentEquals(result.value, seq([str('a')]))).toBe(true);
      expect(Object.isFrozen(result.value)).toBe(true);
      expect(result.value).not.toBe(input);
    }
  });

  it('accepts trees built with the constructors', () => {
    const tree = map([[str('n'), int(1)]]);
    const result = parseContent(tree);
    expect(result.ok && contentEquals(result.value, tree)).toBe(true);
  });

  it('returns a SerializationError for invalid trees', () => {
    const result = parseContent({ kind: 'float', value: 'x' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SerializationError);
      expect(result.error.message).toBe('Invalid content tree: $.value must be a number');
    }
  });
});

describe('guards', () => {
  it('recognizes content nodes by their own fields', () => {
    expect(isContent(int(1))).toBe(true);
    expect(isContent(enumVariant('Status', 'Active'))).toBe(true);
    expect(isContent({ kind: 'int', value: 1 })).toBe(false);
    expect(isContent({ kind: 'tuple', items: [] })).toBe(false);
    expect(isContent(null)).toBe(false);
  });

  it('does not look below the top node', () => {
    expect(isContent({ kind: 'seq', items: ['not content'] })).toBe(true);
  });

  it('accepts only scalar replacements as primitive content', () => {
    expect(isPrimitiveContent(str('x'))).toBe(true);
    expect(isPrimitiveContent(nil())).toBe(false);
    expect(isPrimitiveContent(seq([]))).toBe(false);
  });
});
