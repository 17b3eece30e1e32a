/**
 * recency-cache - bounded in-memory LRU cache with optional TTL expiry
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE: Cache
// ============================================================================

export { createLruCache, createLruCacheWithTtl, tryCreateLruCache } from './cache/index.js';
export type { LruCache } from './cache/index.js';

// ============================================================================
// CORE: Configuration & Errors
// ============================================================================

export {
  cacheConfigSchema,
  parseCacheConfig,
  CacheConfigurationError,
  DEFAULT_SWEEP_INTERVAL_MS,
  MAX_SWEEP_INTERVAL_MS,
} from './config/index.js';
export type {
  CacheConfig,
  CacheConfigError,
  CacheConfigErrorCode,
  LruCacheOptions,
  LruCacheSettings,
} from './config/index.js';

export { CacheReentrancyError } from './lock/index.js';

// ============================================================================
// ADVANCED: Custom Logging
// ============================================================================

export { createConsoleLogger } from './logging/index.js';
export type { CacheLogger } from './logging/index.js';

// ============================================================================
// ADVANCED: Building Blocks (for custom cache structures)
// ============================================================================

export { createRecencyList } from './recency-list/index.js';
export type { EntryHandle, RecencyEntry, RecencyList } from './recency-list/index.js';

export { createCriticalSection } from './lock/index.js';
export type { CriticalSection } from './lock/index.js';

export { startExpirySweeper } from './sweeper/index.js';
export type { ExpirySweeper, ExpirySweeperConfig, SweepOutcome } from './sweeper/index.js';
