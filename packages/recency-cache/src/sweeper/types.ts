import type { CacheLogger } from '../logging/types.js';

/**
 * What a sweep tick asks the sweeper to do next.
 */
export type SweepOutcome = 'continue' | 'stop';

/**
 * Configuration for a background expiry sweeper.
 */
export interface ExpirySweeperConfig {
  /** Delay before each tick in milliseconds */
  readonly intervalMs: number;
  /**
   * One sweep. Runs synchronously; returns 'stop' to end the sweeper
   * permanently.
   */
  readonly tick: () => SweepOutcome;
  /** Receives errors thrown by `tick` */
  readonly logger: CacheLogger;
}

/**
 * Handle on a running sweeper.
 */
export interface ExpirySweeper {
  /**
   * Resolves once a tick has returned 'stop' and no further tick is
   * scheduled.
   */
  readonly exited: () => Promise<void>;
}
