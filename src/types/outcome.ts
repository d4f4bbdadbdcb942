import type { SnapshotIdentity } from './identity.js';

export interface PassedOutcome {
  readonly status: 'passed';
  readonly identity: SnapshotIdentity;
  readonly path: string;
}

export interface UpdatedOutcome {
  readonly status: 'updated';
  readonly identity: SnapshotIdentity;
  readonly path: string;
  /** True when no baseline existed before this run. */
  readonly created: boolean;
}

export interface FailedOutcome {
  readonly status: 'failed';
  readonly identity: SnapshotIdentity;
  readonly expression: string | undefined;
  readonly path: string;
  readonly pendingPath: string;
  readonly baseline: string | null;
  readonly rendered: string;
  readonly diff: string;
}

export type SnapshotOutcome = PassedOutcome | UpdatedOutcome | FailedOutcome;

export type SnapshotStatus = SnapshotOutcome['status'];
