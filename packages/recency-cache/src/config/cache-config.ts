/**
 * Validation of cache construction settings.
 *
 * @packageDocumentation
 */

import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import type { CacheConfig, CacheConfigError, CacheConfigErrorCode } from './types.js';

/** Default delay between expiry sweeps: 200 ms */
export const DEFAULT_SWEEP_INTERVAL_MS = 200;

/** Largest delay a Node.js timer honours; longer delays fire after 1 ms */
export const MAX_SWEEP_INTERVAL_MS = 2_147_483_647;

/**
 * Schema for the numeric cache settings.
 */
export const cacheConfigSchema = z.object({
  capacity: z.number().int().positive(),
  ttlSeconds: z.number().int().nonnegative().default(0),
  sweepIntervalMs: z
    .number()
    .int()
    .positive()
    .max(MAX_SWEEP_INTERVAL_MS)
    .default(DEFAULT_SWEEP_INTERVAL_MS),
});

/**
 * Maps each setting to the error code reported when it is rejected.
 */
const errorCodeByField: Record<keyof CacheConfig, CacheConfigErrorCode> = {
  capacity: 'invalid_capacity',
  ttlSeconds: 'invalid_ttl',
  sweepIntervalMs: 'invalid_sweep_interval',
};

const isConfigField = (value: unknown): value is keyof CacheConfig =>
  typeof value === 'string' && Object.hasOwn(errorCodeByField, value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const toConfigError = (input: unknown, issue: z.ZodIssue | undefined): CacheConfigError => {
  const field = issue?.path[0];

  if (!isConfigField(field) || !isRecord(input)) {
    return {
      code: 'invalid_options',
      message: `invalid options: ${issue?.message ?? 'expected an object'}`,
      cause: issue,
    };
  }

  return {
    code: errorCodeByField[field],
    message: `invalid ${field}: ${String(input[field])}`,
    cause: issue,
  };
};

/**
 * Validates raw cache settings and fills in defaults.
 *
 * Settings are checked in the order capacity, ttlSeconds, sweepIntervalMs;
 * the first rejected setting determines the error.
 *
 * @param input - Settings object (typically `{ capacity, ttlSeconds?, sweepIntervalMs? }`)
 * @returns Result with the validated configuration or the first violation
 *
 * @example
 * ```typescript
 * const result = parseCacheConfig({ capacity: 100, ttlSeconds: 30 });
 * if (result.isOk()) {
 *   result.value.sweepIntervalMs; // 200
 * }
 * ```
 */
export const parseCacheConfig = (input: unknown): Result<CacheConfig, CacheConfigError> => {
  const parsed = cacheConfigSchema.safeParse(input);

  if (!parsed.success) {
    return err(toConfigError(input, parsed.error.issues[0]));
  }

  return ok(parsed.data);
};
