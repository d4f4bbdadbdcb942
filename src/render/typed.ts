import type { Content, StructField } from '../types/content.js';
import { SerializationError } from '../errors.js';
import { floatText } from './json.js';

const INDENT = '    ';

function typedFloat(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  return floatText(value);
}

/** Items one per line, each followed by a comma. */
function group(open: string, close: string, items: string[], depth: number): string {
  if (items.length === 0) return `${open}${close}`;
  const pad = INDENT.repeat(depth + 1);
  return `${open}\n${items.map(item => `${pad}${item},\n`).join('')}${INDENT.repeat(depth)}${close}`;
}

function fieldsOf(fields: readonly StructField[], depth: number): string[] {
  return fields.map(([name, value]) => `${name}: ${renderNode(value, depth + 1)}`);
}

function renderNode(node: Content, depth: number): string {
  switch (node.kind) {
    case 'nil':
      return 'None';
    case 'bool':
      return node.value ? 'true' : 'false';
    case 'int':
      return node.value.toString();
    case 'float':
      return typedFloat(node.value);
    case 'string':
      return JSON.stringify(node.value);
    case 'bytes':
      return group('[', ']', node.value.map(String), depth);
    case 'seq':
      return group('[', ']', node.items.map(item => renderNode(item, depth + 1)), depth);
    case 'map':
      return group(
        '{',
        '}',
        node.entries.map(([k, v]) => `${renderNode(k, depth + 1)}: ${renderNode(v, depth + 1)}`),
        depth,
      );
    case 'struct':
      if (node.fields.length === 0) return node.name;
      return group(`${node.name}(`, ')', fieldsOf(node.fields, depth), depth);
    case 'enum': {
      const { payload, variant } = node;
      if (payload === null) return variant;
      // struct payloads expand their fields under the variant tag
      if (payload.kind === 'struct' && payload.fields.length > 0) {
        return group(`${variant}(`, ')', fieldsOf(payload.fields, depth), depth);
      }
      return `${variant}(${renderNode(payload, depth)})`;
    }
    default: {
      const _exhaustive: never = node;
      throw new SerializationError(`Unsupported content ${String(_exhaustive)}`);
    }
  }
}

/**
 * Render as RON-like typed text. Struct names and enum variants are kept;
 * indentation is four spaces with a trailing comma after every item.
 */
export function renderTyped(tree: Content): string {
  return renderNode(tree, 0);
}
