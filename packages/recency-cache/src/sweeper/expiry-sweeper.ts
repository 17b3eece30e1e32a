/**
 * Background task that runs a sweep on a fixed delay.
 *
 * The sweeper sleeps, runs one tick, and reschedules itself until a tick
 * returns 'stop'. Ticks never overlap and nothing is held across the sleep.
 * Timers are unref'd: a sweeper alone never keeps the process running.
 *
 * @packageDocumentation
 */

import type { ExpirySweeper, ExpirySweeperConfig, SweepOutcome } from './types.js';

/**
 * Starts a sweeper. The first tick runs after one interval.
 *
 * @param config - Interval, tick function and logger
 * @returns Handle exposing the sweeper's exit
 *
 * @example
 * ```typescript
 * const sweeper = startExpirySweeper({
 *   intervalMs: 200,
 *   tick: () => (stopped ? 'stop' : (purgeExpired(), 'continue')),
 *   logger: createConsoleLogger(),
 * });
 * await sweeper.exited();
 * ```
 */
export const startExpirySweeper = (config: ExpirySweeperConfig): ExpirySweeper => {
  const { intervalMs, tick, logger } = config;

  let markExited: () => void = () => undefined;
  const exit = new Promise<void>((resolve) => {
    markExited = resolve;
  });

  const runTick = (): SweepOutcome => {
    try {
      return tick();
    } catch (error) {
      logger.error('expiry sweep failed', error);
      return 'continue';
    }
  };

  const schedule = (): void => {
    const timer = setTimeout(() => {
      if (runTick() === 'stop') {
        markExited();
        return;
      }
      schedule();
    }, intervalMs);
    timer.unref();
  };

  schedule();

  return {
    exited: () => exit,
  };
};
