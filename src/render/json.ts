import type { Content } from '../types/content.js';
import { SerializationError } from '../errors.js';

const INDENT = '  ';

/**
 * Float text: integral values keep a fractional part so they stay distinct
 * from integers in the rendered text.
 */
export function floatText(value: number): string {
  const text = String(value);
  return Number.isInteger(value) && !/[e.]/.test(text) ? `${text}.0` : text;
}

function jsonKey(key: Content, path: string): string {
  switch (key.kind) {
    case 'string':
      return JSON.stringify(key.value);
    case 'int':
    case 'bool':
      return JSON.stringify(String(key.value));
    case 'float':
      if (!Number.isFinite(key.value)) {
        throw new SerializationError('Non-finite float map keys cannot be rendered as JSON', path);
      }
      return JSON.stringify(floatText(key.value));
    default:
      throw new SerializationError(`Map keys of kind ${key.kind} cannot be rendered as JSON`, path);
  }
}

function block(open: string, close: string, items: string[], depth: number): string {
  if (items.length === 0) return `${open}${close}`;
  const pad = INDENT.repeat(depth + 1);
  return `${open}\n${items.map(item => `${pad}${item}`).join(',\n')}\n${INDENT.repeat(depth)}${close}`;
}

function renderNode(node: Content, depth: number, path: string): string {
  switch (node.kind) {
    case 'nil':
      return 'null';
    case 'bool':
      return node.value ? 'true' : 'false';
    case 'int':
      return node.value.toString();
    case 'float':
      if (!Number.isFinite(node.value)) {
        throw new SerializationError(`${node.value} cannot be rendered as JSON`, path);
      }
      return floatText(node.value);
    case 'string':
      return JSON.stringify(node.value);
    case 'bytes':
      return block('[', ']', node.value.map(String), depth);
    case 'seq':
      return block(
        '[',
        ']',
        node.items.map((item, i) => renderNode(item, depth + 1, `${path}[${i}]`)),
        depth,
      );
    case 'map':
      return block(
        '{',
        '}',
        node.entries.map(([k, v], i) => {
          const key = jsonKey(k, `${path}.<key ${i}>`);
          return `${key}: ${renderNode(v, depth + 1, `${path}[${key}]`)}`;
        }),
        depth,
      );
    case 'struct':
      return block(
        '{',
        '}',
        node.fields.map(
          ([name, v]) => `${JSON.stringify(name)}: ${renderNode(v, depth + 1, `${path}.${name}`)}`,
        ),
        depth,
      );
    case 'enum':
      if (node.payload === null) return JSON.stringify(node.variant);
      return block(
        '{',
        '}',
        [`${JSON.stringify(node.variant)}: ${renderNode(node.payload, depth + 1, path)}`],
        depth,
      );
    default: {
      const _exhaustive: never = node;
      throw new SerializationError(`Unsupported content ${String(_exhaustive)}`, path);
    }
  }
}

/**
 * Render as pretty-printed JSON with two-space indentation.
 * Map and field order are kept as given; nothing is sorted.
 */
export function renderJson(tree: Content): string {
  return renderNode(tree, 0, '$');
}
