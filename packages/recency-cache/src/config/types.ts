/**
 * Cache configuration types.
 *
 * @packageDocumentation
 */

import type { CacheLogger } from '../logging/types.js';

/**
 * Validated, fully-defaulted cache configuration.
 */
export interface CacheConfig {
  /** Maximum number of entries; always a positive integer */
  readonly capacity: number;
  /** Absolute time-to-live per entry in seconds; 0 disables expiry */
  readonly ttlSeconds: number;
  /** Delay between background expiry sweeps in milliseconds */
  readonly sweepIntervalMs: number;
}

/**
 * Optional collaborators and tuning shared by every cache factory.
 */
export interface LruCacheOptions {
  /** Delay between expiry sweeps in ms (default: 200). Ignored when TTL is disabled. */
  readonly sweepIntervalMs?: number | undefined;
  /** Receives sweeper failures (default: console logger) */
  readonly logger?: CacheLogger | undefined;
  /** Clock returning epoch milliseconds (default: monotonic clock anchored at creation) */
  readonly now?: (() => number) | undefined;
}

/**
 * Complete options object accepted by `tryCreateLruCache`.
 */
export interface LruCacheSettings extends LruCacheOptions {
  readonly capacity: number;
  /** TTL in seconds (default: 0 = disabled) */
  readonly ttlSeconds?: number | undefined;
}

/**
 * Configuration error codes.
 */
export type CacheConfigErrorCode =
  | 'invalid_options'
  | 'invalid_capacity'
  | 'invalid_ttl'
  | 'invalid_sweep_interval';

/**
 * Configuration validation error.
 */
export interface CacheConfigError {
  /** Error code */
  readonly code: CacheConfigErrorCode;
  /** Human-readable error message, e.g. "invalid capacity: 0" */
  readonly message: string;
  /** Underlying validation issue */
  readonly cause?: unknown;
}

/**
 * Error thrown by the throwing cache factories when configuration is invalid.
 *
 * Invalid configuration is a programming error, so it surfaces at
 * construction and never from a cache operation.
 *
 * @example
 * ```typescript
 * try {
 *   createLruCache(0);
 * } catch (error) {
 *   if (error instanceof CacheConfigurationError) {
 *     console.error(error.code); // 'invalid_capacity'
 *   }
 * }
 * ```
 */
export class CacheConfigurationError extends Error {
  /** Error code describing which setting was rejected */
  readonly code: CacheConfigErrorCode;

  constructor(error: CacheConfigError) {
    super(error.message, { cause: error.cause });
    this.name = 'CacheConfigurationError';
    this.code = error.code;
  }
}
