/**
 * Shared test fixtures and constants.
 */

import { expect, vi } from 'vitest';
import type { RecencyList } from '../recency-list/types.js';

// ============================================================================
// Time Constants
// ============================================================================

/** One second in milliseconds */
export const ONE_SECOND_MS = 1000;

/** TTL used by expiry tests */
export const SHORT_TTL_SECONDS = 1;

/** Sweep interval used when a test overrides the default */
export const FAST_SWEEP_INTERVAL_MS = 50;

/** Fixed epoch used as the fake clock's starting point */
export const FIXED_EPOCH_MS = Date.UTC(2024, 0, 1);

/** Globals replaced by the fake clock; includes `performance` for the monotonic timer */
export const FAKE_CLOCK_TARGETS = [
  'setTimeout',
  'clearTimeout',
  'setInterval',
  'clearInterval',
  'Date',
  'performance',
] as const;

/**
 * Installs fake timers over both clocks and pins the wall clock to `FIXED_EPOCH_MS`.
 */
export const useFakeClock = (): void => {
  vi.useFakeTimers({ toFake: [...FAKE_CLOCK_TARGETS] });
  vi.setSystemTime(FIXED_EPOCH_MS);
};

// ============================================================================
// Data Helpers
// ============================================================================

/**
 * Builds `count` distinct keys sharing a prefix: `user-0`, `user-1`, ...
 */
export const createKeys = (count: number, prefix = 'user'): string[] =>
  Array.from({ length: count }, (_, i) => `${prefix}-${String(i)}`);

// ============================================================================
// Structural Assertions
// ============================================================================

/**
 * Asserts that a recency list's links agree in both directions and that
 * forward traversal visits exactly `length()` entries.
 *
 * @returns The keys from head to tail
 */
export const expectConsistentList = <K, V>(list: RecencyList<K, V>): K[] => {
  const forward = list.handles();
  expect(forward).toHaveLength(list.length());

  const backward: number[] = [];
  for (let handle = list.tail(); handle !== undefined; handle = list.entry(handle).prev) {
    backward.push(handle);
  }
  expect(backward.reverse()).toEqual(forward);

  const head = list.head();
  const tail = list.tail();
  if (forward.length === 0) {
    expect(head).toBeUndefined();
    expect(tail).toBeUndefined();
  } else {
    expect(head).toBe(forward[0]);
    expect(tail).toBe(forward[forward.length - 1]);
  }

  return forward.map((handle) => list.entry(handle).key);
};
