import { describe, it, expect } from 'vitest';
import { diffLines, formatDiff, hasChanges } from '../src/diff.js';

describe('diffLines', () => {
  it('marks identical text as equal', () => {
    const lines = diffLines('a\nb', 'a\nb');
    expect(lines).toEqual([
      { op: 'equal', text: 'a' },
      { op: 'equal', text: 'b' },
    ]);
    expect(hasChanges(lines)).toBe(false);
  });

  it('shows a changed line as a removal followed by an addition', () => {
    expect(formatDiff(diffLines('a\nb\nc', 'a\nB\nc'))).toBe(' a\n-b\n+B\n c');
  });

  it('handles insertions and deletions', () => {
    expect(formatDiff(diffLines('a\nc', 'a\nb\nc'))).toBe(' a\n+b\n c');
    expect(formatDiff(diffLines('a\nb\nc', 'a\nc'))).toBe(' a\n-b\n c');
  });

  it('treats an empty baseline as all additions', () => {
    expect(formatDiff(diffLines('', 'x\ny'))).toBe('+x\n+y');
  });

  it('ignores CRLF differences', () => {
    expect(hasChanges(diffLines('a\r\nb', 'a\nb'))).toBe(false);
  });
});
