/**
 * Capacity-bounded cache with least-recently-used eviction and optional
 * absolute TTL expiry.
 *
 * Keys are compared like `Map` keys: primitives by value, objects by
 * identity.
 */
export interface LruCache<K, V> {
  /**
   * Gets a value and promotes its entry to most recently used.
   * An expired entry is removed and reported as missing.
   * @param key - The cache key
   * @returns The cached value or undefined if not found/expired
   */
  readonly get: (key: K) => V | undefined;

  /**
   * Sets a value and promotes its entry to most recently used.
   * Overwriting restarts the entry's TTL. Inserting past capacity evicts the
   * least recently used entry.
   * @param key - The cache key
   * @param value - The value to cache
   */
  readonly put: (key: K, value: V) => void;

  /**
   * Removes an entry.
   * @param key - The cache key
   * @returns The last stored value, even if expired, or undefined if not found
   */
  readonly remove: (key: K) => V | undefined;

  /**
   * Number of entries held, including expired entries not yet removed.
   */
  readonly size: () => number;

  /**
   * Maximum number of entries.
   */
  readonly capacity: () => number;

  /**
   * TTL in seconds; 0 when expiry is disabled.
   */
  readonly ttlSeconds: () => number;

  /**
   * Removes every entry.
   */
  readonly clear: () => void;

  /**
   * Keys from most to least recently used. Does not promote entries or
   * apply expiry.
   */
  readonly keys: () => K[];

  /**
   * Asks the expiry sweeper to exit at its next tick. Does not wait for it.
   * Idempotent; a no-op when TTL is disabled.
   */
  readonly stop: () => void;

  /**
   * Resolves once the expiry sweeper has exited after `stop`.
   * Already resolved when TTL is disabled.
   */
  readonly sweeperExited: () => Promise<void>;
}
