/**
 * Configuration module for cache construction settings.
 *
 * @packageDocumentation
 */

export {
  cacheConfigSchema,
  parseCacheConfig,
  DEFAULT_SWEEP_INTERVAL_MS,
  MAX_SWEEP_INTERVAL_MS,
} from './cache-config.js';
export { CacheConfigurationError } from './types.js';
export type {
  CacheConfig,
  CacheConfigError,
  CacheConfigErrorCode,
  LruCacheOptions,
  LruCacheSettings,
} from './types.js';
