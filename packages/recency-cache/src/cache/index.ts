/**
 * Cache module.
 *
 * @packageDocumentation
 */

export { createLruCache, createLruCacheWithTtl, tryCreateLruCache } from './lru-cache.js';
export type { LruCache } from './types.js';
