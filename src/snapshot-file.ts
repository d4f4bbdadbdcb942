import { z } from 'zod';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ParseResult } from './parse.js';
import { SnapshotFormatError } from './errors.js';

/**
 * Snapshot file layout:
 *
 *   ---
 *   source: test/users.test.ts
 *   line: 12
 *   module: users::profile
 *   expression: user
 *   format: json
 *   ---
 *   <body>
 *
 * The header is diagnostic only. Comparison looks at the body alone.
 */

const DELIMITER = '---';

export const SnapshotHeaderSchema = z
  .object({
    source: z.string().optional(),
    line: z.number().int().nonnegative().optional(),
    module: z.string().optional(),
    expression: z.string().optional(),
    format: z.string().optional(),
  })
  .passthrough();

export type SnapshotHeader = z.infer<typeof SnapshotHeaderSchema>;

export interface SnapshotFile {
  header: SnapshotHeader;
  body: string;
}

const HEADER_ORDER = ['source', 'line', 'module', 'expression', 'format'] as const;

export function formatSnapshotFile(file: SnapshotFile): string {
  const ordered: Record<string, unknown> = {};
  for (const key of HEADER_ORDER) {
    if (file.header[key] !== undefined) ordered[key] = file.header[key];
  }
  for (const [key, value] of Object.entries(file.header)) {
    if (!(key in ordered) && value !== undefined) ordered[key] = value;
  }

  const header = Object.keys(ordered).length > 0 ? stringifyYaml(ordered, { lineWidth: 0 }) : '';
  return `${DELIMITER}\n${header}${DELIMITER}\n${file.body}\n`;
}

/**
 * Split snapshot text into header and body. Text without a leading
 * delimiter line is all body.
 */
export function parseSnapshotFile(text: string, path = '<memory>'): ParseResult<SnapshotFile> {
  const normalized = text.replace(/\r\n/g, '\n');

  if (!normalized.startsWith(`${DELIMITER}\n`)) {
    return { ok: true, value: { header: {}, body: normalized.replace(/\n$/, '') } };
  }

  const end = normalized.indexOf(`\n${DELIMITER}\n`, DELIMITER.length);
  if (end === -1) {
    return { ok: false, error: new SnapshotFormatError(path, 'header is not terminated') };
  }

  const headerText = normalized.slice(DELIMITER.length + 1, end + 1);
  const body = normalized.slice(end + DELIMITER.length + 2).replace(/\n$/, '');

  let raw: unknown;
  try {
    raw = parseYaml(headerText);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new SnapshotFormatError(path, `header is not valid YAML: ${reason}`) };
  }

  const header = SnapshotHeaderSchema.safeParse(raw ?? {});
  if (!header.success) {
    const issues = header.error.issues.map(i => `${i.path.join('.') || 'header'}: ${i.message}`);
    return { ok: false, error: new SnapshotFormatError(path, issues.join('; ')) };
  }

  return { ok: true, value: { header: header.data, body } };
}
