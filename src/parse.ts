import type { Content } from './types/content.js';
import { validateContent } from './validate.js';
import { SerializationError, SnapshotError } from './errors.js';
import { bool, bytes, enumVariant, float, int, map, nil, seq, str, struct } from './content.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: SnapshotError };

/**
 * Rebuild a validated tree through the constructors so it is frozen and
 * detached from the caller's objects.
 */
function rebuild(node: Content): Content {
  switch (node.kind) {
    case 'nil':
      return nil();
    case 'bool':
      return bool(node.value);
    case 'int':
      return int(node.value);
    case 'float':
      return float(node.value);
    case 'string':
      return str(node.value);
    case 'bytes':
      return bytes(node.value);
    case 'seq':
      return seq(node.items.map(rebuild));
    case 'map':
      return map(node.entries.map(([k, v]) => [rebuild(k), rebuild(v)] as const));
    case 'struct':
      return struct(node.name, node.fields.map(([n, v]) => [n, rebuild(v)] as const));
    case 'enum':
      return enumVariant(node.name, node.variant, node.payload === null ? null : rebuild(node.payload));
    default: {
      const _exhaustive: never = node;
      return _exhaustive;
    }
  }
}

/**
 * Parse an unknown input into a typed Content tree.
 * Single dispatch: validate structure -> rebuild frozen tree -> return typed or error.
 */
export function parseContent(input: unknown): ParseResult<Content> {
  const validation = validateContent(input);
  if (!validation.valid) {
    return {
      ok: false,
      error: new SerializationError(`Invalid content tree: ${validation.errors.join('; ')}`),
    };
  }

  // At this point, validation passed -- safe to cast
  return { ok: true, value: rebuild(input as Content) };
}
