export interface SnapshotIdentity {
  /** Logical root that relative source files resolve against. */
  readonly root: string;
  /** Namespace path, outermost first (e.g. describe blocks). */
  readonly module: readonly string[];
  /** Source file of the assertion, relative to `root` or absolute. */
  readonly file: string;
  readonly line: number;
  readonly name?: string;
  /** Disambiguation sequence, starting at 1. */
  readonly sequence: number;
}

export interface SnapshotLocation {
  readonly path: string;
  readonly pendingPath: string;
}
