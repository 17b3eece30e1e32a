/**
 * Exclusive critical section for synchronous work on shared cache state.
 *
 * JavaScript never preempts synchronous code, so a section that does not
 * await cannot interleave with another caller on the same event loop. What
 * remains is re-entry: a callback invoked inside the section (a clock, a
 * logger) calling back into the structure it guards. That is rejected.
 *
 * @packageDocumentation
 */

import { CacheReentrancyError, type CriticalSection } from './types.js';

/**
 * Creates a non-reentrant critical section.
 *
 * @returns A CriticalSection instance
 *
 * @example
 * ```typescript
 * const lock = createCriticalSection();
 * const size = lock.run(() => index.size);
 * ```
 */
export const createCriticalSection = (): CriticalSection => {
  let held = false;

  const run = <T>(work: () => T): T => {
    if (held) {
      throw new CacheReentrancyError();
    }

    held = true;
    try {
      return work();
    } finally {
      held = false;
    }
  };

  const isHeld = (): boolean => held;

  return { run, isHeld };
};
