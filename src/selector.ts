import type { ContentPath } from './types/content.js';
import type { Selector, SelectorSegment } from './types/selector.js';
import type { SelectorParseReason } from './errors.js';
import { SelectorParseError } from './errors.js';
import type { ParseResult } from './parse.js';

/**
 * Selector grammar:
 *
 *   path    := ["."] segment ("." segment)*
 *   segment := identifier | quoted | integer | "*" | "**"
 *
 * identifier  [A-Za-z_$][A-Za-z0-9_$-]*
 * quoted      "..." with \" and \\ escapes; may contain "."
 * integer     decimal digits, no sign, within the safe integer range
 *
 * A leading "." is optional; every selector is anchored at the root.
 */

const IDENT_START = /[A-Za-z_$]/;
const IDENT_PART = /[A-Za-z0-9_$-]/;
const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$-]*$/;

class SelectorScanner {
  private pos = 0;
  readonly segments: SelectorSegment[] = [];

  constructor(private readonly source: string) {}

  private fail(position: number, reason: SelectorParseReason): never {
    throw new SelectorParseError(this.source, position, reason);
  }

  run(): Selector {
    const s = this.source;
    if (s.length === 0) this.fail(0, 'empty-selector');
    if (s[0] === '.') {
      if (s.length === 1) this.fail(0, 'trailing-separator');
      this.pos = 1;
    }

    for (;;) {
      this.segments.push(this.segment());
      if (this.pos === s.length) break;
      if (s[this.pos] !== '.') this.fail(this.pos, 'unexpected-character');
      this.pos++;
      if (this.pos === s.length) this.fail(this.pos - 1, 'trailing-separator');
    }

    return Object.freeze({ source: s, segments: Object.freeze([...this.segments]) });
  }

  private segment(): SelectorSegment {
    const s = this.source;
    const start = this.pos;
    const c = s[start];

    if (c === '.') this.fail(start, 'empty-segment');
    if (c === '"') return this.quoted();

    if (c === '*') {
      let end = start;
      while (s[end] === '*') end++;
      if (end - start > 2) this.fail(start + 2, 'unexpected-character');
      this.pos = end;
      return end - start === 1 ? { kind: 'wildcard' } : { kind: 'recursive' };
    }

    if (c >= '0' && c <= '9') {
      let end = start;
      while (end < s.length && s[end] !== '.') end++;
      const run = s.slice(start, end);
      const index = Number(run);
      if (!/^\d+$/.test(run) || !Number.isSafeInteger(index)) this.fail(start, 'invalid-integer');
      this.pos = end;
      return { kind: 'index', index };
    }

    if (IDENT_START.test(c)) {
      let end = start + 1;
      while (end < s.length && IDENT_PART.test(s[end])) end++;
      this.pos = end;
      return { kind: 'key', key: s.slice(start, end) };
    }

    return this.fail(start, 'unexpected-character');
  }

  private quoted(): SelectorSegment {
    const s = this.source;
    const open = this.pos;
    let key = '';
    let i = open + 1;

    while (i < s.length) {
      const ch = s[i];
      if (ch === '"') {
        this.pos = i + 1;
        return { kind: 'key', key };
      }
      if (ch === '\\') {
        if (i + 1 >= s.length) break;
        key += s[i + 1];
        i += 2;
        continue;
      }
      key += ch;
      i++;
    }

    return this.fail(open, 'unterminated-quote');
  }
}

/**
 * Compile selector text. Throws SelectorParseError on malformed input.
 */
export function compileSelector(source: string): Selector {
  return new SelectorScanner(source).run();
}

/**
 * Parse selector text without throwing.
 */
export function parseSelector(source: string): ParseResult<Selector> {
  try {
    return { ok: true, value: compileSelector(source) };
  } catch (error) {
    if (SelectorParseError.isSelectorParseError(error)) return { ok: false, error };
    throw error;
  }
}

/**
 * Render a selector back to canonical text (always root-anchored).
 */
export function formatSelector(selector: Selector): string {
  const parts = selector.segments.map(seg => {
    switch (seg.kind) {
      case 'key':
        return IDENTIFIER.test(seg.key)
          ? seg.key
          : `"${seg.key.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
      case 'index':
        return String(seg.index);
      case 'wildcard':
        return '*';
      case 'recursive':
        return '**';
      default: {
        const _exhaustive: never = seg;
        return String(_exhaustive);
      }
    }
  });
  return `.${parts.join('.')}`;
}

// ─── MATCHING ───

type PathLabel =
  | { kind: 'key'; key: string }
  | { kind: 'index'; index: number }
  | { kind: 'opaque' };

/**
 * Selector-visible labels of a path. Enum payloads are transparent and
 * contribute no label.
 */
function labelsOf(path: ContentPath): PathLabel[] {
  const labels: PathLabel[] = [];
  for (const step of path) {
    switch (step.kind) {
      case 'seq':
        labels.push({ kind: 'index', index: step.index });
        break;
      case 'field':
        labels.push({ kind: 'key', key: step.name });
        break;
      case 'map':
        if (step.key.kind === 'string') {
          labels.push({ kind: 'key', key: step.key.value });
        } else if (
          step.key.kind === 'int' &&
          step.key.value >= 0n &&
          step.key.value <= BigInt(Number.MAX_SAFE_INTEGER)
        ) {
          labels.push({ kind: 'index', index: Number(step.key.value) });
        } else {
          labels.push({ kind: 'opaque' });
        }
        break;
      case 'payload':
        break;
    }
  }
  return labels;
}

function segmentMatches(seg: SelectorSegment, label: PathLabel): boolean {
  switch (seg.kind) {
    case 'key':
      return label.kind === 'key' && label.key === seg.key;
    case 'index':
      return label.kind === 'index' && label.index === seg.index;
    default:
      return true;
  }
}

function matchFrom(
  segments: readonly SelectorSegment[],
  si: number,
  labels: readonly PathLabel[],
  li: number,
): boolean {
  if (si === segments.length) return li === labels.length;
  const seg = segments[si];

  if (seg.kind === 'recursive') {
    // zero or more levels
    for (let k = li; k <= labels.length; k++) {
      if (matchFrom(segments, si + 1, labels, k)) return true;
    }
    return false;
  }

  if (li === labels.length) return false;
  return segmentMatches(seg, labels[li]) && matchFrom(segments, si + 1, labels, li + 1);
}

/**
 * True when the selector resolves to the node at `path`.
 */
export function matchesPath(selector: Selector, path: ContentPath): boolean {
  return matchFrom(selector.segments, 0, labelsOf(path), 0);
}
