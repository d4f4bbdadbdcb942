import type { SnapshotOutcome } from './types/outcome.js';

export class SnapshotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SnapshotError';
    Error.captureStackTrace(this, new.target);
  }

  static isSnapshotError(error: unknown): error is SnapshotError {
    return error instanceof SnapshotError;
  }
}

export type SelectorParseReason =
  | 'empty-selector'
  | 'empty-segment'
  | 'unterminated-quote'
  | 'invalid-integer'
  | 'trailing-separator'
  | 'unexpected-character';

const SELECTOR_REASON_TEXT: Record<SelectorParseReason, string> = {
  'empty-selector': 'selector is empty',
  'empty-segment': 'empty segment',
  'unterminated-quote': 'unterminated quoted key',
  'invalid-integer': 'invalid integer index',
  'trailing-separator': 'selector ends with a separator',
  'unexpected-character': 'unexpected character',
};

export class SelectorParseError extends SnapshotError {
  constructor(
    public readonly selector: string,
    public readonly position: number,
    public readonly reason: SelectorParseReason,
  ) {
    super(`Invalid selector "${selector}" at ${position}: ${SELECTOR_REASON_TEXT[reason]}`);
    this.name = 'SelectorParseError';
  }

  static isSelectorParseError(error: unknown): error is SelectorParseError {
    return error instanceof SelectorParseError;
  }
}

/**
 * Raised when a tree cannot be represented in the requested format,
 * or when an externally built tree is malformed.
 */
export class SerializationError extends SnapshotError {
  constructor(
    public readonly reason: string,
    public readonly path?: string,
  ) {
    super(path ? `${reason} (at ${path})` : reason);
    this.name = 'SerializationError';
  }
}

export class CaptureError extends SnapshotError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Cannot capture value at ${path}: ${reason}`);
    this.name = 'CaptureError';
  }
}

export class SnapshotIoError extends SnapshotError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`Snapshot I/O failed for ${path}: ${describeCause(cause)}`, { cause });
    this.name = 'SnapshotIoError';
  }

  static isSnapshotIoError(error: unknown): error is SnapshotIoError {
    return error instanceof SnapshotIoError;
  }
}

export class SnapshotFormatError extends SnapshotError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Malformed snapshot file ${path}: ${reason}`);
    this.name = 'SnapshotFormatError';
  }
}

export class ConfigError extends SnapshotError {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown by `ensurePassed` for harnesses that report failures as exceptions.
 * The engine itself returns mismatches as outcomes.
 */
export class SnapshotMismatchError extends SnapshotError {
  constructor(public readonly outcome: Extract<SnapshotOutcome, { status: 'failed' }>) {
    super(
      `Snapshot ${outcome.path} does not match (pending: ${outcome.pendingPath})\n${outcome.diff}`,
    );
    this.name = 'SnapshotMismatchError';
  }

  static isSnapshotMismatchError(error: unknown): error is SnapshotMismatchError {
    return error instanceof SnapshotMismatchError;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
