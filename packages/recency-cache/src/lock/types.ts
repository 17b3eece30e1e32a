/**
 * Mutual exclusion for the cache's shared structure.
 */
export interface CriticalSection {
  /**
   * Runs synchronous work while holding the section.
   * @param work - Function to run; must not return a promise it awaits on
   * @returns Whatever `work` returns
   * @throws CacheReentrancyError if the section is already held
   */
  readonly run: <T>(work: () => T) => T;

  /**
   * Whether a caller is currently inside the section.
   */
  readonly isHeld: () => boolean;
}

/**
 * Error thrown when code running inside a cache operation calls back into
 * the same cache.
 */
export class CacheReentrancyError extends Error {
  constructor() {
    super('cache operation re-entered while another operation on the same cache is in progress');
    this.name = 'CacheReentrancyError';
  }
}
