/**
 * Environment configuration.
 *
 * Read once by the outermost harness; the engine itself takes these values
 * as explicit arguments and never looks at the environment.
 *
 * @module config
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

const TRUE_VALUES = ['always', '1', 'true', 'on', 'yes'] as const;
const FALSE_VALUES = ['no', '0', 'false', 'off'] as const;
const ENABLED: ReadonlySet<string> = new Set(TRUE_VALUES);

/**
 * Boolean switch spelled the way shells and CI systems spell it
 */
export const SwitchSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum([...TRUE_VALUES, ...FALSE_VALUES]))
  .transform(v => ENABLED.has(v));

/** A variable set to the empty string counts as unset. */
function optionalVar<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(v => (v === '' ? undefined : v), schema.optional());
}

export const EnvSchema = z.object({
  /** Overwrite baselines on mismatch instead of failing */
  SNAPWARD_UPDATE: optionalVar(SwitchSchema),
  /** Root that relative source files resolve against */
  SNAPWARD_ROOT: optionalVar(z.string()),
  /** Log store and coordinator activity to the console */
  SNAPWARD_DEBUG: optionalVar(SwitchSchema),
});

export interface SnapwardConfig {
  update: boolean;
  root: string;
  debug: boolean;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): SnapwardConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid snapward configuration: ${issues.join('; ')}`, issues);
  }

  return {
    update: parsed.data.SNAPWARD_UPDATE ?? false,
    root: parsed.data.SNAPWARD_ROOT ?? cwd,
    debug: parsed.data.SNAPWARD_DEBUG ?? false,
  };
}
