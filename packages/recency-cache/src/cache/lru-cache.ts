/**
 * Least-recently-used cache with optional TTL expiry.
 *
 * A `Map` from key to entry handle gives O(1) lookup; the recency list keeps
 * entries ordered from most to least recently used. Every operation runs
 * inside one critical section so the two structures always agree. When TTL
 * is enabled, expired entries are dropped lazily by `get` and eagerly by a
 * background sweeper.
 *
 * @packageDocumentation
 */

import type { Result } from 'neverthrow';
import { parseCacheConfig } from '../config/cache-config.js';
import {
  CacheConfigurationError,
  type CacheConfig,
  type CacheConfigError,
  type LruCacheOptions,
  type LruCacheSettings,
} from '../config/types.js';
import { createCriticalSection } from '../lock/critical-section.js';
import { createConsoleLogger } from '../logging/console-logger.js';
import { createMonotonicClock } from './clock.js';
import { createRecencyList } from '../recency-list/recency-list.js';
import type { EntryHandle, RecencyEntry } from '../recency-list/types.js';
import { startExpirySweeper } from '../sweeper/expiry-sweeper.js';
import type { SweepOutcome } from '../sweeper/types.js';
import type { LruCache } from './types.js';

const MS_PER_SECOND = 1000;

const buildLruCache = <K, V>(config: CacheConfig, options: LruCacheOptions): LruCache<K, V> => {
  const { capacity, ttlSeconds, sweepIntervalMs } = config;
  const ttlMs = ttlSeconds * MS_PER_SECOND;
  const ttlEnabled = ttlSeconds > 0;
  const now = options.now ?? createMonotonicClock();
  const logger = options.logger ?? createConsoleLogger();

  const lock = createCriticalSection();
  const index = new Map<K, EntryHandle>();
  const list = createRecencyList<K, V>();
  let stopped = false;

  const isExpired = (entry: RecencyEntry<K, V>, at: number): boolean =>
    entry.expireAt !== undefined && entry.expireAt <= at;

  // Must be called inside the lock
  const evict = (handle: EntryHandle): void => {
    const removed = list.release(handle);
    index.delete(removed.key);
  };

  const get = (key: K): V | undefined =>
    lock.run(() => {
      const handle = index.get(key);
      if (handle === undefined) {
        return undefined;
      }

      const entry = list.entry(handle);
      if (ttlEnabled && isExpired(entry, now())) {
        evict(handle);
        return undefined;
      }

      list.touch(handle);
      return entry.value;
    });

  const put = (key: K, value: V): void => {
    lock.run(() => {
      const expireAt = ttlEnabled ? now() + ttlMs : undefined;

      const existing = index.get(key);
      if (existing !== undefined) {
        const entry = list.entry(existing);
        entry.value = value;
        entry.expireAt = expireAt;
        list.touch(existing);
        return;
      }

      index.set(key, list.insert(key, value, expireAt));

      // Puts are the only growth path, so at most one entry is over capacity
      if (index.size > capacity) {
        const leastRecent = list.tail();
        if (leastRecent !== undefined) {
          evict(leastRecent);
        }
      }
    });
  };

  const remove = (key: K): V | undefined =>
    lock.run(() => {
      const handle = index.get(key);
      if (handle === undefined) {
        return undefined;
      }

      const removed = list.release(handle);
      index.delete(key);
      return removed.value;
    });

  const size = (): number => lock.run(() => index.size);

  const clear = (): void => {
    lock.run(() => {
      list.reset();
      index.clear();
    });
  };

  const keys = (): K[] => lock.run(() => list.handles().map((handle) => list.entry(handle).key));

  const stop = (): void => {
    lock.run(() => {
      stopped = true;
    });
  };

  const sweepExpired = (): SweepOutcome =>
    lock.run(() => {
      if (stopped) {
        return 'stop';
      }

      const at = now();
      let handle = list.head();
      while (handle !== undefined) {
        // Read before evicting: release clears the entry's links
        const next = list.entry(handle).next;
        if (isExpired(list.entry(handle), at)) {
          evict(handle);
        }
        handle = next;
      }
      return 'continue';
    });

  const sweeperExited: () => Promise<void> = ttlEnabled
    ? startExpirySweeper({ intervalMs: sweepIntervalMs, tick: sweepExpired, logger }).exited
    : () => Promise.resolve();

  return {
    get,
    put,
    remove,
    size,
    capacity: () => capacity,
    ttlSeconds: () => ttlSeconds,
    clear,
    keys,
    stop,
    sweeperExited,
  };
};

/**
 * Creates an LRU cache from a settings object without throwing.
 *
 * @param settings - Capacity, optional TTL and optional collaborators
 * @returns Result with the cache, or the first invalid setting
 *
 * @example
 * ```typescript
 * const result = tryCreateLruCache<string, Session>({ capacity: 500, ttlSeconds: 900 });
 * if (result.isErr()) {
 *   console.error(result.error.message); // e.g. "invalid capacity: 0"
 * }
 * ```
 */
export const tryCreateLruCache = <K, V>(
  settings: LruCacheSettings
): Result<LruCache<K, V>, CacheConfigError> => {
  const { capacity, ttlSeconds, sweepIntervalMs } = settings;
  return parseCacheConfig({ capacity, ttlSeconds, sweepIntervalMs }).map((config) =>
    buildLruCache<K, V>(config, settings)
  );
};

/**
 * Creates an LRU cache with TTL expiry.
 *
 * When `ttlSeconds` is positive a background sweeper removes expired
 * entries every `sweepIntervalMs` (default 200 ms) until `stop` is called.
 * A `ttlSeconds` of 0 disables expiry and starts no sweeper.
 *
 * @param capacity - Maximum number of entries (positive integer)
 * @param ttlSeconds - Time to live per entry in seconds (non-negative integer)
 * @param options - Sweep interval, logger and clock
 * @returns An LruCache instance
 * @throws CacheConfigurationError if capacity or ttlSeconds is invalid
 *
 * @example
 * ```typescript
 * const cache = createLruCacheWithTtl<string, string>(100, 60);
 * cache.put('token', 'abc');
 * cache.get('token'); // 'abc' for the next 60 seconds
 * cache.stop();
 * ```
 */
export const createLruCacheWithTtl = <K, V>(
  capacity: number,
  ttlSeconds: number,
  options: LruCacheOptions = {}
): LruCache<K, V> => {
  const result = tryCreateLruCache<K, V>({ ...options, capacity, ttlSeconds });
  if (result.isErr()) {
    throw new CacheConfigurationError(result.error);
  }
  return result.value;
};

/**
 * Creates an LRU cache without expiry.
 *
 * @param capacity - Maximum number of entries (positive integer)
 * @param options - Logger and clock
 * @returns An LruCache instance
 * @throws CacheConfigurationError if capacity is invalid
 */
export const createLruCache = <K, V>(
  capacity: number,
  options: LruCacheOptions = {}
): LruCache<K, V> => createLruCacheWithTtl<K, V>(capacity, 0, options);
