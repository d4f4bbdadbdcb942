export type DiffOp = 'equal' | 'remove' | 'add';

export interface DiffLine {
  op: DiffOp;
  text: string;
}

const PREFIX: Record<DiffOp, string> = {
  equal: ' ',
  remove: '-',
  add: '+',
};

function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  return text.replace(/\r\n/g, '\n').split('\n');
}

/**
 * Line diff of `expected` against `actual` via longest common subsequence.
 * Ties prefer removals before additions, so output is stable.
 */
export function diffLines(expected: string, actual: string): DiffLine[] {
  const a = splitLines(expected);
  const b = splitLines(actual);
  const n = a.length;
  const m = b.length;

  // lcs[i][j] = LCS length of a[i..] and b[j..]
  const lcs: number[][] = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(0));
  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lcs[i][j] = a[i] === b[j] ? lcs[i + 1][j + 1] + 1 : Math.max(lcs[i + 1][j], lcs[i][j + 1]);
    }
  }

  const lines: DiffLine[] = [];
  let i = 0;
  let j = 0;
  while (i < n && j < m) {
    if (a[i] === b[j]) {
      lines.push({ op: 'equal', text: a[i] });
      i++;
      j++;
    } else if (lcs[i + 1][j] >= lcs[i][j + 1]) {
      lines.push({ op: 'remove', text: a[i] });
      i++;
    } else {
      lines.push({ op: 'add', text: b[j] });
      j++;
    }
  }
  while (i < n) lines.push({ op: 'remove', text: a[i++] });
  while (j < m) lines.push({ op: 'add', text: b[j++] });

  return lines;
}

export function formatDiff(lines: readonly DiffLine[]): string {
  return lines.map(line => `${PREFIX[line.op]}${line.text}`).join('\n');
}

export function hasChanges(lines: readonly DiffLine[]): boolean {
  return lines.some(line => line.op !== 'equal');
}
