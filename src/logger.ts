/**
 * Debug logging for snapward.
 *
 * Enable via session options:
 * ```ts
 * const session = createSnapshotSession({ root: process.cwd(), debug: true });
 * ```
 * or pass any object implementing `Logger`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

/**
 * Default console logger with formatting
 */
export const consoleLogger: Logger = {
  debug: (message, data) => console.debug(`[snapward:debug] ${message}`, data ?? ''),
  info: (message, data) => console.info(`[snapward:info] ${message}`, data ?? ''),
  warn: (message, data) => console.warn(`[snapward:warn] ${message}`, data ?? ''),
  error: (message, data) => console.error(`[snapward:error] ${message}`, data ?? ''),
};

/**
 * Silent/no-op logger
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Create a logger based on debug config
 */
export function createLogger(debug: boolean | Logger | undefined): Logger {
  if (!debug) return silentLogger;
  if (debug === true) return consoleLogger;
  return debug;
}
