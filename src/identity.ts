import path from 'node:path';
import type { SnapshotIdentity, SnapshotLocation } from './types/identity.js';
import { SnapshotError } from './errors.js';

export const SNAPSHOT_DIR = '__snapshots__';
export const SNAPSHOT_EXTENSION = '.snap';
export const PENDING_SUFFIX = '.new';

const DEFAULT_NAME = 'snapshot';
const SAFE_CHAR = /[A-Za-z0-9-]/;

/**
 * Escape everything outside [A-Za-z0-9-] as `_xx` per UTF-8 byte. Since `_`
 * and `.` are always escaped, `__` and `.` are free to act as separators and
 * the mapping stays injective.
 */
export function encodeComponent(component: string): string {
  let out = '';
  for (const ch of component) {
    if (SAFE_CHAR.test(ch)) {
      out += ch;
      continue;
    }
    for (const byte of Buffer.from(ch, 'utf8')) {
      out += `_${byte.toString(16).padStart(2, '0')}`;
    }
  }
  return out;
}

export function snapshotName(identity: Pick<SnapshotIdentity, 'module' | 'name'>): string {
  if (identity.name !== undefined && identity.name.length > 0) return identity.name;
  const last = identity.module[identity.module.length - 1];
  return last !== undefined && last.length > 0 ? last : DEFAULT_NAME;
}

/**
 * Path of the baseline for an identity, without the sequence suffix.
 * Identities sharing a base path are told apart by their sequence.
 */
export function baseSnapshotPath(identity: Omit<SnapshotIdentity, 'sequence'>): string {
  // The line is recorded in the header, which rejects anything else on load.
  if (!Number.isInteger(identity.line) || identity.line < 0) {
    throw new SnapshotError(`Snapshot line must be a non-negative integer, got ${identity.line}`);
  }
  const source = path.resolve(identity.root, identity.file);
  const stem = [...identity.module, snapshotName(identity)].map(encodeComponent).join('__');
  return path.join(path.dirname(source), SNAPSHOT_DIR, path.basename(source), stem);
}

/**
 * Deterministic location of the baseline and pending files for an identity.
 */
export function resolveSnapshotPath(identity: SnapshotIdentity): SnapshotLocation {
  if (!Number.isInteger(identity.sequence) || identity.sequence < 1) {
    throw new SnapshotError(`Snapshot sequence must be a positive integer, got ${identity.sequence}`);
  }
  const base = baseSnapshotPath(identity);
  const suffix = identity.sequence > 1 ? `.${identity.sequence}` : '';
  const snapshotPath = `${base}${suffix}${SNAPSHOT_EXTENSION}`;
  return { path: snapshotPath, pendingPath: `${snapshotPath}${PENDING_SUFFIX}` };
}

/**
 * Hands out 1, 2, 3, ... per key. Owned by a session; `reset()` starts
 * every key over.
 */
export class SnapshotCounter {
  private readonly counts = new Map<string, number>();

  next(key: string): number {
    const n = (this.counts.get(key) ?? 0) + 1;
    this.counts.set(key, n);
    return n;
  }

  reset(): void {
    this.counts.clear();
  }
}
