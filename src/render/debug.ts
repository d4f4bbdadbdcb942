import { inspect } from 'node:util';
import type { InspectOptions } from 'node:util';

// Fixed so output depends on the value alone, not on terminal width or defaults.
const DEBUG_INSPECT_OPTIONS: InspectOptions = {
  depth: Infinity,
  colors: false,
  compact: false,
  sorted: false,
  breakLength: Infinity,
  maxArrayLength: Infinity,
  maxStringLength: Infinity,
  showHidden: false,
  getters: false,
  customInspect: true,
};

/**
 * Debug rendering of an arbitrary value, for shapes the content model
 * cannot hold (functions, promises, class internals). Not redactable.
 */
export function renderDebug(value: unknown): string {
  return inspect(value, DEBUG_INSPECT_OPTIONS);
}
