/**
 * Stable address of an entry inside a recency list's slot arena.
 * Valid from `insert` until `release` or `reset`.
 */
export type EntryHandle = number;

/**
 * One cached key/value pair and its position in recency order.
 */
export interface RecencyEntry<K, V> {
  readonly key: K;
  value: V;
  /** Absolute expiry time in epoch ms; undefined when TTL is disabled */
  expireAt: number | undefined;
  /** Neighbour closer to the head (more recently used) */
  prev: EntryHandle | undefined;
  /** Neighbour closer to the tail (less recently used) */
  next: EntryHandle | undefined;
}

/**
 * Doubly-linked recency order over an arena of entry slots.
 * Head is the most recently used entry, tail the least.
 *
 * Callers must hold the owning cache's critical section for every call.
 */
export interface RecencyList<K, V> {
  /** Handle of the most recently used entry */
  readonly head: () => EntryHandle | undefined;

  /** Handle of the least recently used entry */
  readonly tail: () => EntryHandle | undefined;

  /** Number of linked entries */
  readonly length: () => number;

  /**
   * Resolves a handle to its entry.
   * @throws Error if the handle was released or never issued
   */
  readonly entry: (handle: EntryHandle) => RecencyEntry<K, V>;

  /**
   * Allocates a slot for a new entry and links it at the head.
   * @returns Handle of the new entry
   */
  readonly insert: (key: K, value: V, expireAt: number | undefined) => EntryHandle;

  /** Detaches an entry, fixing its neighbours and the head/tail pointers. */
  readonly unlink: (handle: EntryHandle) => void;

  /** Links a detached entry at the head. */
  readonly prepend: (handle: EntryHandle) => void;

  /** Promotes an entry to most recently used; no-op when it is already the head. */
  readonly touch: (handle: EntryHandle) => void;

  /**
   * Unlinks an entry and frees its slot for reuse.
   * @returns The released entry
   */
  readonly release: (handle: EntryHandle) => RecencyEntry<K, V>;

  /** Drops every entry at once. */
  readonly reset: () => void;

  /** Handles in order from head to tail. */
  readonly handles: () => EntryHandle[];
}
