/**
 * Creates a clock in epoch milliseconds that is anchored to the wall clock
 * once and then advanced by the monotonic `performance.now()` timer.
 * Later wall-clock adjustments do not move it.
 *
 * @returns Function returning the current time in epoch ms
 *
 * @example
 * ```typescript
 * const now = createMonotonicClock();
 * const expireAt = now() + 30_000;
 * ```
 */
export const createMonotonicClock = (): (() => number) => {
  const origin = Date.now() - performance.now();
  return () => origin + performance.now();
};
