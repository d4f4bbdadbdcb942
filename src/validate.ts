import type { ContentKind } from './types/content.js';

export interface ValidationResult {
  valid: boolean;
  kind: ContentKind | null;
  errors: string[];
  warnings: string[];
}

const MAX_DEPTH = 512;

function kindOf(node: unknown): ContentKind | null {
  if (!node || typeof node !== 'object') return null;
  switch ((node as Record<string, unknown>).kind) {
    case 'nil':
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
    case 'bytes':
    case 'seq':
    case 'map':
    case 'struct':
    case 'enum':
      return (node as { kind: ContentKind }).kind;
    default:
      return null;
  }
}

/**
 * Identity of a scalar key for duplicate detection. Containers never collide.
 */
function scalarKeyOf(node: unknown): string | null {
  const kind = kindOf(node);
  if (!kind) return null;
  const value = (node as Record<string, unknown>).value;
  switch (kind) {
    case 'nil':
      return 'nil';
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return `${kind}:${String(value)}`;
    default:
      return null;
  }
}

function validateNode(
  node: unknown,
  path: string,
  depth: number,
  errors: string[],
  warnings: string[],
): void {
  if (depth > MAX_DEPTH) {
    errors.push(`${path} exceeds the maximum depth of ${MAX_DEPTH}`);
    return;
  }
  const kind = kindOf(node);
  if (!kind) {
    errors.push(`${path} must be an object with a known "kind"`);
    return;
  }
  const n = node as Record<string, unknown>;

  switch (kind) {
    case 'nil':
      return;
    case 'bool':
      if (typeof n.value !== 'boolean') errors.push(`${path}.value must be a boolean`);
      return;
    case 'int':
      if (typeof n.value !== 'bigint') errors.push(`${path}.value must be a bigint`);
      return;
    case 'float':
      if (typeof n.value !== 'number') errors.push(`${path}.value must be a number`);
      return;
    case 'string':
      if (typeof n.value !== 'string') errors.push(`${path}.value must be a string`);
      return;
    case 'bytes':
      if (!Array.isArray(n.value)) {
        errors.push(`${path}.value must be an array of octets`);
        return;
      }
      n.value.forEach((b: unknown, i: number) => {
        if (typeof b !== 'number' || !Number.isInteger(b) || b < 0 || b > 255) {
          errors.push(`${path}.value[${i}] must be an integer in 0..255`);
        }
      });
      return;
    case 'seq':
      if (!Array.isArray(n.items)) {
        errors.push(`${path}.items must be an array`);
        return;
      }
      n.items.forEach((item: unknown, i: number) =>
        validateNode(item, `${path}[${i}]`, depth + 1, errors, warnings),
      );
      return;
    case 'map': {
      if (!Array.isArray(n.entries)) {
        errors.push(`${path}.entries must be an array`);
        return;
      }
      const seen = new Set<string>();
      n.entries.forEach((entry: unknown, i: number) => {
        if (!Array.isArray(entry) || entry.length !== 2) {
          errors.push(`${path}.entries[${i}] must be a [key, value] pair`);
          return;
        }
        validateNode(entry[0], `${path}.entries[${i}].key`, depth + 1, errors, warnings);
        validateNode(entry[1], `${path}.entries[${i}].value`, depth + 1, errors, warnings);
        const scalarKey = scalarKeyOf(entry[0]);
        if (scalarKey !== null) {
          if (seen.has(scalarKey)) warnings.push(`${path} has duplicate key ${scalarKey}`);
          seen.add(scalarKey);
        }
      });
      return;
    }
    case 'struct': {
      if (typeof n.name !== 'string' || n.name.length === 0) {
        errors.push(`${path}.name must be a non-empty string`);
      }
      if (!Array.isArray(n.fields)) {
        errors.push(`${path}.fields must be an array`);
        return;
      }
      const seen = new Set<string>();
      n.fields.forEach((field: unknown, i: number) => {
        if (!Array.isArray(field) || field.length !== 2 || typeof field[0] !== 'string') {
          errors.push(`${path}.fields[${i}] must be a [name, value] pair`);
          return;
        }
        const name: string = field[0];
        validateNode(field[1], `${path}.${name}`, depth + 1, errors, warnings);
        if (seen.has(name)) warnings.push(`${path} has duplicate field "${name}"`);
        seen.add(name);
      });
      return;
    }
    case 'enum':
      if (typeof n.name !== 'string' || n.name.length === 0) {
        errors.push(`${path}.name must be a non-empty string`);
      }
      if (typeof n.variant !== 'string' || n.variant.length === 0) {
        errors.push(`${path}.variant must be a non-empty string`);
      }
      if (n.payload !== null) {
        validateNode(n.payload, `${path}.payload`, depth + 1, errors, warnings);
      }
      return;
    default: {
      const _exhaustive: never = kind;
      errors.push(`${path} has unsupported kind ${String(_exhaustive)}`);
    }
  }
}

/**
 * Validate an externally produced Content tree.
 * Collects every structural error with its location; duplicate map keys and
 * struct fields are warnings, since renderers keep them in order.
 */
export function validateContent(input: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  validateNode(input, '$', 0, errors, warnings);

  return {
    valid: errors.length === 0,
    kind: kindOf(input),
    errors,
    warnings,
  };
}
