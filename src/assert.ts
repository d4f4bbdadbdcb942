import type { Content } from './types/content.js';
import type { SnapshotIdentity } from './types/identity.js';
import type { FailedOutcome, SnapshotOutcome } from './types/outcome.js';
import type { RecordedFormat, SnapshotFormat } from './formats.js';
import { DEBUG_FORMAT, TEXT_FORMAT } from './formats.js';
import type { CaptureFn } from './capture.js';
import { captureValue } from './capture.js';
import type { RedactionRule, RedactionSpec } from './redact.js';
import { applyRedactions, compileRedactions } from './redact.js';
import { parseContent } from './parse.js';
import { render, renderDebug } from './render/index.js';
import { baseSnapshotPath, SnapshotCounter } from './identity.js';
import type { SnapshotFile, SnapshotHeader } from './snapshot-file.js';
import { SnapshotStore, normalizeBody } from './store.js';
import { diffLines, formatDiff } from './diff.js';
import type { Logger } from './logger.js';
import { createLogger, silentLogger } from './logger.js';
import { loadConfig } from './config.js';
import { SnapshotError, SnapshotMismatchError } from './errors.js';

export type IdentityInput = Omit<SnapshotIdentity, 'sequence'>;

/** What is being snapshotted. */
export type SnapshotSubject =
  | { kind: 'value'; value: unknown }
  | { kind: 'content'; content: unknown }
  | { kind: 'text'; text: string }
  | { kind: 'debug'; value: unknown };

export type Redactions = ReadonlyArray<RedactionSpec | RedactionRule>;

export interface AssertionRequest {
  identity: IdentityInput;
  subject: SnapshotSubject;
  redactions?: Redactions;
  /** Required for `value` and `content` subjects. */
  format?: SnapshotFormat;
  /** Source expression text, recorded for diagnostics. */
  expression?: string;
}

export interface AssertionContext {
  update: boolean;
  store: SnapshotStore;
  counter: SnapshotCounter;
  capture?: CaptureFn;
  logger?: Logger;
}

interface Rendered {
  body: string;
  format: RecordedFormat;
}

function toContent(subject: Extract<SnapshotSubject, { kind: 'value' | 'content' }>, capture: CaptureFn): Content {
  if (subject.kind === 'value') return capture(subject.value);
  const parsed = parseContent(subject.content);
  if (!parsed.ok) throw parsed.error;
  return parsed.value;
}

function renderSubject(
  request: AssertionRequest,
  rules: readonly RedactionRule[],
  capture: CaptureFn,
): Rendered {
  const { subject } = request;
  if (subject.kind === 'text') {
    if (rules.length > 0) throw new SnapshotError('Text snapshots cannot be redacted');
    return { body: subject.text, format: TEXT_FORMAT };
  }
  if (subject.kind === 'debug') {
    if (rules.length > 0) throw new SnapshotError('Debug snapshots cannot be redacted');
    return { body: renderDebug(subject.value), format: DEBUG_FORMAT };
  }
  if (request.format === undefined) {
    throw new SnapshotError(`A format is required for ${subject.kind} snapshots`);
  }

  const tree = applyRedactions(toContent(subject, capture), rules);
  return { body: render(tree, request.format), format: request.format };
}

function headerFor(
  identity: SnapshotIdentity,
  expression: string | undefined,
  format: RecordedFormat,
): SnapshotHeader {
  return {
    source: identity.file,
    line: identity.line,
    module: identity.module.length > 0 ? identity.module.join('::') : undefined,
    expression,
    format,
  };
}

/**
 * Run one assertion: compile rules, render, compare against the stored
 * baseline, then write a pending file (or, in update mode, the baseline).
 *
 * Selector and serialization errors are raised before any file is touched.
 */
export function assertSnapshot(request: AssertionRequest, context: AssertionContext): SnapshotOutcome {
  const logger = context.logger ?? silentLogger;
  const rules = compileRedactions(request.redactions ?? []);

  const rendered = renderSubject(request, rules, context.capture ?? captureValue);
  const body = normalizeBody(rendered.body);

  // Only assertions that rendered take a sequence number.
  const sequence = context.counter.next(baseSnapshotPath(request.identity));
  const identity: SnapshotIdentity = { ...request.identity, sequence };

  const location = context.store.resolve(identity);
  const baseline = context.store.loadBaseline(location.path);
  const baselineBody = baseline === null ? null : normalizeBody(baseline.body);

  if (context.store.compare(baselineBody, body) === 'equal') {
    return { status: 'passed', identity, path: location.path };
  }

  const file: SnapshotFile = {
    header: headerFor(identity, request.expression, rendered.format),
    body,
  };

  if (context.update) {
    context.store.writeBaseline(location, file);
    logger.info('updated snapshot', { path: location.path, created: baseline === null });
    return { status: 'updated', identity, path: location.path, created: baseline === null };
  }

  const pendingPath = context.store.writePending(location, file);
  const diff = formatDiff(diffLines(baselineBody ?? '', body));
  logger.warn('snapshot mismatch', { path: location.path, pending: pendingPath });

  return {
    status: 'failed',
    identity,
    expression: request.expression,
    path: location.path,
    pendingPath,
    baseline: baselineBody,
    rendered: body,
    diff,
  };
}

/**
 * Throw SnapshotMismatchError for a failed outcome.
 */
export function ensurePassed(outcome: SnapshotOutcome): asserts outcome is Exclude<SnapshotOutcome, FailedOutcome> {
  if (outcome.status === 'failed') throw new SnapshotMismatchError(outcome);
}

// ─── SESSION ───

/** Where an assertion sits in the test source. */
export interface AssertionSite {
  file: string;
  line: number;
  module?: readonly string[];
  name?: string;
}

export interface SnapshotSessionOptions {
  root: string;
  update?: boolean;
  debug?: boolean | Logger;
  capture?: CaptureFn;
}

/**
 * Per-run assertion entry point. Sequence numbers for repeated identities
 * are counted per session, from its creation or its last `reset()`.
 */
export class SnapshotSession {
  readonly root: string;
  readonly update: boolean;
  readonly store: SnapshotStore;
  private readonly logger: Logger;
  private readonly capture: CaptureFn;
  private readonly counter = new SnapshotCounter();

  constructor(options: SnapshotSessionOptions) {
    this.root = options.root;
    this.update = options.update ?? false;
    this.logger = createLogger(options.debug);
    this.capture = options.capture ?? captureValue;
    this.store = new SnapshotStore({ logger: this.logger });
  }

  private run(
    site: AssertionSite,
    subject: SnapshotSubject,
    redactions: Redactions,
    format: SnapshotFormat | undefined,
    expression: string | undefined,
  ): SnapshotOutcome {
    return assertSnapshot(
      {
        identity: {
          root: this.root,
          module: site.module ?? [],
          file: site.file,
          line: site.line,
          name: site.name,
        },
        subject,
        redactions,
        format,
        expression,
      },
      {
        update: this.update,
        store: this.store,
        counter: this.counter,
        capture: this.capture,
        logger: this.logger,
      },
    );
  }

  assert(
    site: AssertionSite,
    value: unknown,
    redactions: Redactions,
    format: SnapshotFormat,
    expression?: string,
  ): SnapshotOutcome {
    return this.run(site, { kind: 'value', value }, redactions, format, expression);
  }

  assertContent(
    site: AssertionSite,
    content: Content,
    redactions: Redactions,
    format: SnapshotFormat,
    expression?: string,
  ): SnapshotOutcome {
    return this.run(site, { kind: 'content', content }, redactions, format, expression);
  }

  assertText(site: AssertionSite, text: string, expression?: string): SnapshotOutcome {
    return this.run(site, { kind: 'text', text }, [], undefined, expression);
  }

  /** Snapshot the `util.inspect` rendering of a value. */
  assertDebug(site: AssertionSite, value: unknown, expression?: string): SnapshotOutcome {
    return this.run(site, { kind: 'debug', value }, [], undefined, expression);
  }

  /** Start sequence numbering over, e.g. at the start of each test. */
  reset(): void {
    this.counter.reset();
  }
}

export function createSnapshotSession(options: SnapshotSessionOptions): SnapshotSession {
  return new SnapshotSession(options);
}

/**
 * Build a session from environment configuration. Explicit overrides win.
 */
export function createSessionFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<SnapshotSessionOptions> = {},
): SnapshotSession {
  const config = loadConfig(env);
  return new SnapshotSession({
    root: overrides.root ?? config.root,
    update: overrides.update ?? config.update,
    debug: overrides.debug ?? config.debug,
    capture: overrides.capture,
  });
}
