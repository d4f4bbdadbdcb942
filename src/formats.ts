// ─── SNAPSHOT FORMATS (CLOSED TAG SET) ───

export const SNAPSHOT_FORMATS = {
  JSON: 'json',
  BLOCK: 'block',
  TYPED: 'typed',
} as const;

export type SnapshotFormat = typeof SNAPSHOT_FORMATS[keyof typeof SNAPSHOT_FORMATS];

// ─── PER-FORMAT METADATA ───

export interface FormatMeta {
  format: SnapshotFormat;
  /** Whether struct type names and enum variant tags survive rendering. */
  retainsTypes: boolean;
  description: string;
}

export const FORMAT_REGISTRY: readonly FormatMeta[] = [
  {
    format: SNAPSHOT_FORMATS.JSON,
    retainsTypes: false,
    description: 'Pretty-printed JSON; structs and enums collapse to objects and values',
  },
  {
    format: SNAPSHOT_FORMATS.BLOCK,
    retainsTypes: false,
    description: 'Block-style YAML with minimal quoting',
  },
  {
    format: SNAPSHOT_FORMATS.TYPED,
    retainsTypes: true,
    description: 'RON-like text keeping struct names and enum variants',
  },
] as const;

/**
 * Format recorded for raw text snapshots, which skip rendering.
 */
export const TEXT_FORMAT = 'text';

/**
 * Format recorded for debug snapshots, rendered by `util.inspect`.
 */
export const DEBUG_FORMAT = 'debug';

export type RecordedFormat = SnapshotFormat | typeof TEXT_FORMAT | typeof DEBUG_FORMAT;

// ─── HELPERS ───

export function isSnapshotFormat(f: string): f is SnapshotFormat {
  return Object.values(SNAPSHOT_FORMATS).includes(f as SnapshotFormat);
}

export function getFormatMeta(f: SnapshotFormat): FormatMeta | undefined {
  return FORMAT_REGISTRY.find(m => m.format === f);
}
