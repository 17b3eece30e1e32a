/**
 * Sink for diagnostics the cache cannot surface to a caller.
 *
 * Only the background sweeper reports through this interface; foreground
 * operations never log.
 */
export interface CacheLogger {
  /**
   * Reports a failure.
   * @param message - Short description of what failed
   * @param details - Underlying error or context values
   */
  readonly error: (message: string, ...details: readonly unknown[]) => void;
}
