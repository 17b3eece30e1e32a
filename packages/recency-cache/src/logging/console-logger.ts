import type { CacheLogger } from './types.js';

/** Prefix applied to every line written by the console logger */
export const LOG_PREFIX = '[recency-cache]';

/**
 * Creates a logger that writes to stderr via `console.error`.
 *
 * @param prefix - Tag prepended to each message (default: "[recency-cache]")
 * @returns A CacheLogger instance
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger('[sessions]');
 * logger.error('expiry sweep failed', error);
 * // stderr: [sessions] expiry sweep failed Error: ...
 * ```
 */
export const createConsoleLogger = (prefix: string = LOG_PREFIX): CacheLogger => {
  const error = (message: string, ...details: readonly unknown[]): void => {
    console.error(`${prefix} ${message}`, ...details);
  };

  return { error };
};
