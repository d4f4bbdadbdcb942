import type { Content } from '../types/content.js';
import type { SnapshotFormat } from '../formats.js';
import { SNAPSHOT_FORMATS } from '../formats.js';
import { SerializationError } from '../errors.js';
import { renderJson } from './json.js';
import { renderBlock } from './block.js';
import { renderTyped } from './typed.js';
import { renderDebug } from './debug.js';

/**
 * Render a tree in the given format. Byte-deterministic: equal trees always
 * produce identical text. The result never ends with a newline.
 */
export function render(tree: Content, format: SnapshotFormat): string {
  switch (format) {
    case SNAPSHOT_FORMATS.JSON:
      return renderJson(tree);
    case SNAPSHOT_FORMATS.BLOCK:
      return renderBlock(tree);
    case SNAPSHOT_FORMATS.TYPED:
      return renderTyped(tree);
    default: {
      const _exhaustive: never = format;
      throw new SerializationError(`Unsupported snapshot format: ${String(_exhaustive)}`);
    }
  }
}

export { renderJson, renderBlock, renderTyped, renderDebug };
