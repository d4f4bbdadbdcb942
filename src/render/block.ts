import { Document, Pair, Scalar, YAMLMap, YAMLSeq } from 'yaml';
import type { Node as YamlNode } from 'yaml';
import type { Content } from '../types/content.js';
import { SerializationError } from '../errors.js';

function mapping(pairs: Array<[YamlNode, YamlNode]>): YAMLMap<YamlNode, YamlNode> {
  const node = new YAMLMap<YamlNode, YamlNode>();
  for (const [k, v] of pairs) node.items.push(new Pair<YamlNode, YamlNode>(k, v));
  return node;
}

function sequence(items: YamlNode[]): YAMLSeq<YamlNode> {
  const node = new YAMLSeq<YamlNode>();
  node.items.push(...items);
  return node;
}

function toYaml(node: Content): YamlNode {
  switch (node.kind) {
    case 'nil':
      return new Scalar(null);
    case 'bool':
    case 'int':
    case 'float':
    case 'string':
      return new Scalar(node.value);
    case 'bytes':
      return sequence(node.value.map(b => new Scalar(b)));
    case 'seq':
      return sequence(node.items.map(toYaml));
    case 'map':
      return mapping(node.entries.map(([k, v]): [YamlNode, YamlNode] => [toYaml(k), toYaml(v)]));
    case 'struct':
      return mapping(node.fields.map(([name, v]): [YamlNode, YamlNode] => [new Scalar(name), toYaml(v)]));
    case 'enum':
      if (node.payload === null) return new Scalar(node.variant);
      return mapping([[new Scalar(node.variant), toYaml(node.payload)]]);
    default: {
      const _exhaustive: never = node;
      throw new SerializationError(`Unsupported content ${String(_exhaustive)}`);
    }
  }
}

/**
 * Render as block-style YAML. Scalars are quoted only where the YAML
 * grammar requires it and long lines are never folded. Integral floats
 * print like integers: this format carries no type information.
 */
export function renderBlock(tree: Content): string {
  const doc = new Document(toYaml(tree));
  return doc.toString({ lineWidth: 0 }).replace(/\n$/, '');
}
