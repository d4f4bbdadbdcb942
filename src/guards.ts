import type { Content, PrimitiveContent } from './types/content.js';
import type { FailedOutcome, SnapshotOutcome } from './types/outcome.js';

const CONTENT_KINDS: ReadonlySet<string> = new Set([
  'nil', 'bool', 'int', 'float', 'string', 'bytes', 'seq', 'map', 'struct', 'enum',
]);

/**
 * Type guard for a Content node.
 * Checks the discriminant and the fields of this node only; use
 * validateContent() for a deep check.
 */
export function isContent(node: unknown): node is Content {
  if (!node || typeof node !== 'object') return false;
  const n = node as Record<string, unknown>;
  if (typeof n.kind !== 'string' || !CONTENT_KINDS.has(n.kind)) return false;

  switch (n.kind) {
    case 'nil':
      return true;
    case 'bool':
      return typeof n.value === 'boolean';
    case 'int':
      return typeof n.value === 'bigint';
    case 'float':
      return typeof n.value === 'number';
    case 'string':
      return typeof n.value === 'string';
    case 'bytes':
      return Array.isArray(n.value);
    case 'seq':
      return Array.isArray(n.items);
    case 'map':
      return Array.isArray(n.entries);
    case 'struct':
      return typeof n.name === 'string' && Array.isArray(n.fields);
    case 'enum':
      // null (unit variant) or a node
      return typeof n.name === 'string' && typeof n.variant === 'string' && typeof n.payload === 'object';
    default:
      return false;
  }
}

/**
 * Type guard for the node kinds a redaction may substitute.
 */
export function isPrimitiveContent(node: unknown): node is PrimitiveContent {
  if (!isContent(node)) return false;
  return (
    node.kind === 'bool' ||
    node.kind === 'int' ||
    node.kind === 'float' ||
    node.kind === 'string'
  );
}

export function isFailedOutcome(outcome: SnapshotOutcome): outcome is FailedOutcome {
  return outcome.status === 'failed';
}
