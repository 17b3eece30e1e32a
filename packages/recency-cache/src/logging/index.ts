/**
 * Logging module for background diagnostics.
 *
 * @packageDocumentation
 */

export { createConsoleLogger, LOG_PREFIX } from './console-logger.js';
export type { CacheLogger } from './types.js';
