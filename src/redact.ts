import type { Content, ContentPath, PathStep, PrimitiveContent } from './types/content.js';
import type { Selector } from './types/selector.js';
import { bool, childrenOf, float, int, replaceAt, str } from './content.js';
import { compileSelector, matchesPath } from './selector.js';

export interface RedactionRule {
  readonly selector: Selector;
  readonly replacement: PrimitiveContent;
}

export type Replacement = boolean | number | bigint | string | PrimitiveContent;

/** Selector text paired with its replacement, in declaration order. */
export type RedactionSpec = readonly [selector: string, replacement: Replacement];

function toReplacement(value: Replacement): PrimitiveContent {
  switch (typeof value) {
    case 'boolean':
      return bool(value);
    case 'bigint':
      return int(value);
    case 'number':
      return Number.isInteger(value) ? int(value) : float(value);
    case 'string':
      return str(value);
    default:
      return value;
  }
}

/**
 * Build one rule. Throws SelectorParseError on malformed selector text.
 */
export function redaction(selector: string, replacement: Replacement): RedactionRule {
  return Object.freeze({
    selector: compileSelector(selector),
    replacement: toReplacement(replacement),
  });
}

/**
 * Compile an ordered list of rules, failing on the first malformed selector.
 */
export function compileRedactions(
  specs: ReadonlyArray<RedactionSpec | RedactionRule>,
): RedactionRule[] {
  return specs.map(spec => ('selector' in spec ? spec : redaction(spec[0], spec[1])));
}

interface PlannedReplacement {
  path: ContentPath;
  value: PrimitiveContent;
}

/**
 * Collect the replacements for a tree, top-down. The last matching rule wins
 * for a node; a replaced node's subtree is not visited.
 */
function collect(
  node: Content,
  path: PathStep[],
  rules: readonly RedactionRule[],
  out: PlannedReplacement[],
): void {
  let hit: PrimitiveContent | undefined;
  for (const rule of rules) {
    if (matchesPath(rule.selector, path)) hit = rule.replacement;
  }
  if (hit !== undefined) {
    out.push({ path: [...path], value: hit });
    return;
  }

  for (const child of childrenOf(node)) {
    path.push(child.step);
    collect(child.node, path, rules, out);
    path.pop();
  }
}

/**
 * Apply redaction rules to a tree, returning a new tree.
 * The input is never mutated; rules matching nothing have no effect.
 */
export function applyRedactions(tree: Content, rules: readonly RedactionRule[]): Content {
  if (rules.length === 0) return tree;

  const replacements: PlannedReplacement[] = [];
  collect(tree, [], rules, replacements);

  return replacements.reduce<Content>((acc, r) => replaceAt(acc, r.path, r.value), tree);
}
