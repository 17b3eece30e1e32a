/**
 * Mock factories for testing.
 */

import { vi, type Mock } from 'vitest';
import type { CacheLogger } from '../logging/types.js';

/**
 * Logger double whose `error` calls can be asserted.
 */
export interface MockLogger extends CacheLogger {
  readonly error: Mock<(message: string, ...details: readonly unknown[]) => void>;
}

/**
 * Creates a logger that records calls instead of writing them.
 */
export const createMockLogger = (): MockLogger => ({
  error: vi.fn<(message: string, ...details: readonly unknown[]) => void>(),
});

/**
 * Creates a clock that delegates to `Date.now` (so fake timers drive it) but
 * throws on the calls whose 1-based positions are listed.
 */
export const createFailingClock = (failOnCalls: readonly number[]): Mock<() => number> => {
  let calls = 0;
  return vi.fn(() => {
    calls++;
    if (failOnCalls.includes(calls)) {
      throw new Error(`clock failure on call ${String(calls)}`);
    }
    return Date.now();
  });
};
