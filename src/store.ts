import { randomUUID } from 'node:crypto';
import {
  closeSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import path from 'node:path';
import type { SnapshotIdentity, SnapshotLocation } from './types/identity.js';
import type { SnapshotFile } from './snapshot-file.js';
import { formatSnapshotFile, parseSnapshotFile } from './snapshot-file.js';
import { resolveSnapshotPath } from './identity.js';
import { SnapshotIoError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export type Comparison = 'equal' | 'different';

export interface StoredSnapshot extends SnapshotFile {
  path: string;
}

export interface SnapshotStoreOptions {
  logger?: Logger;
}

/**
 * Body text as compared: LF line endings, no trailing newlines.
 */
export function normalizeBody(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\n+$/, '');
}

/**
 * Compare a baseline body with freshly rendered text. A missing baseline
 * never compares equal.
 */
export function compareSnapshots(baseline: string | null, rendered: string): Comparison {
  if (baseline === null) return 'different';
  return normalizeBody(baseline) === normalizeBody(rendered) ? 'equal' : 'different';
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Filesystem side of the snapshot lifecycle. Baselines are read on every
 * run; pending files are written on mismatch and never read back.
 */
export class SnapshotStore {
  private readonly logger: Logger;

  constructor(options: SnapshotStoreOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  resolve(identity: SnapshotIdentity): SnapshotLocation {
    return resolveSnapshotPath(identity);
  }

  /**
   * Load the baseline at `snapshotPath`. A missing file is no baseline, not an error.
   */
  loadBaseline(snapshotPath: string): StoredSnapshot | null {
    let text: string;
    try {
      text = readFileSync(snapshotPath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.debug('no baseline', { path: snapshotPath });
        return null;
      }
      throw new SnapshotIoError(snapshotPath, error);
    }

    const parsed = parseSnapshotFile(text, snapshotPath);
    if (!parsed.ok) throw parsed.error;
    return { path: snapshotPath, ...parsed.value };
  }

  compare(baseline: string | null, rendered: string): Comparison {
    return compareSnapshots(baseline, rendered);
  }

  /**
   * Write the proposed baseline next to the real one. The baseline is untouched.
   */
  writePending(location: SnapshotLocation, file: SnapshotFile): string {
    this.atomicWrite(location.pendingPath, formatSnapshotFile(file));
    this.logger.debug('wrote pending snapshot', { path: location.pendingPath });
    return location.pendingPath;
  }

  writeBaseline(location: SnapshotLocation, file: SnapshotFile): void {
    this.atomicWrite(location.path, formatSnapshotFile(file));
    this.logger.debug('wrote baseline snapshot', { path: location.path });
  }

  /**
   * Write to a unique temp file in the target directory, flush it, then
   * rename over the target. Readers see the old file or the new one.
   */
  private atomicWrite(target: string, contents: string): void {
    const dir = path.dirname(target);
    const tmp = path.join(dir, `.${path.basename(target)}.${randomUUID()}.tmp`);

    try {
      mkdirSync(dir, { recursive: true });
      const fd = openSync(tmp, 'wx');
      try {
        writeFileSync(fd, contents, 'utf8');
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(tmp, target);
    } catch (error) {
      rmSync(tmp, { force: true });
      throw new SnapshotIoError(target, error);
    }
  }
}
