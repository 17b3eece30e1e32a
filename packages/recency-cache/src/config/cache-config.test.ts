import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SWEEP_INTERVAL_MS,
  MAX_SWEEP_INTERVAL_MS,
  parseCacheConfig,
} from './cache-config.js';
import { CacheConfigurationError } from './types.js';

describe('parseCacheConfig', () => {
  describe('valid settings', () => {
    it('parseCacheConfig_CapacityOnly_AppliesDefaults', () => {
      // Act
      const result = parseCacheConfig({ capacity: 10 });

      // Assert
      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({
          capacity: 10,
          ttlSeconds: 0,
          sweepIntervalMs: DEFAULT_SWEEP_INTERVAL_MS,
        });
      }
    });

    it('parseCacheConfig_AllSettings_ReturnsThemUnchanged', () => {
      // Act
      const result = parseCacheConfig({ capacity: 3, ttlSeconds: 60, sweepIntervalMs: 50 });

      // Assert
      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value).toEqual({ capacity: 3, ttlSeconds: 60, sweepIntervalMs: 50 });
      }
    });

    it('parseCacheConfig_UndefinedOptionalSettings_TreatedAsAbsent', () => {
      // Act
      const result = parseCacheConfig({
        capacity: 1,
        ttlSeconds: undefined,
        sweepIntervalMs: undefined,
      });

      // Assert
      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.ttlSeconds).toBe(0);
        expect(result.value.sweepIntervalMs).toBe(DEFAULT_SWEEP_INTERVAL_MS);
      }
    });
  });

  describe('invalid capacity', () => {
    it.each([0, -1])('parseCacheConfig_Capacity%d_ReturnsInvalidCapacity', (capacity) => {
      // Act
      const result = parseCacheConfig({ capacity });

      // Assert
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('invalid_capacity');
        expect(result.error.message).toBe(`invalid capacity: ${String(capacity)}`);
      }
    });

    it('parseCacheConfig_FractionalCapacity_ReturnsInvalidCapacity', () => {
      // Act
      const result = parseCacheConfig({ capacity: 2.5 });

      // Assert
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('invalid capacity: 2.5');
      }
    });

    it('parseCacheConfig_MissingCapacity_ReportsUndefined', () => {
      // Act
      const result = parseCacheConfig({ ttlSeconds: 5 });

      // Assert
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('invalid_capacity');
        expect(result.error.message).toBe('invalid capacity: undefined');
      }
    });

    it('parseCacheConfig_CapacityAndTtlInvalid_ReportsCapacityFirst', () => {
      // Act
      const result = parseCacheConfig({ capacity: 0, ttlSeconds: -5 });

      // Assert
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('invalid_capacity');
      }
    });
  });

  describe('invalid TTL', () => {
    it('parseCacheConfig_NegativeTtl_ReturnsInvalidTtl', () => {
      // Act
      const result = parseCacheConfig({ capacity: 4, ttlSeconds: -1 });

      // Assert
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('invalid_ttl');
        expect(result.error.message).toBe('invalid ttlSeconds: -1');
      }
    });
  });

  describe('invalid sweep interval', () => {
    it('parseCacheConfig_ZeroSweepInterval_ReturnsInvalidSweepInterval', () => {
      // Act
      const result = parseCacheConfig({ capacity: 4, ttlSeconds: 1, sweepIntervalMs: 0 });

      // Assert
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('invalid_sweep_interval');
        expect(result.error.message).toBe('invalid sweepIntervalMs: 0');
      }
    });
  });

  describe('sweep interval beyond the timer limit', () => {
    it('parseCacheConfig_IntervalAboveTimerLimit_ReturnsInvalidSweepInterval', () => {
      // Act
      const result = parseCacheConfig({ capacity: 4, ttlSeconds: 60, sweepIntervalMs: 3_000_000_000 });

      // Assert
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('invalid_sweep_interval');
        expect(result.error.message).toBe('invalid sweepIntervalMs: 3000000000');
      }
    });

    it('parseCacheConfig_IntervalAtTimerLimit_IsAccepted', () => {
      // Act
      const result = parseCacheConfig({
        capacity: 4,
        ttlSeconds: 60,
        sweepIntervalMs: MAX_SWEEP_INTERVAL_MS,
      });

      // Assert
      expect(result.isOk()).toBe(true);
      if (result.isOk()) {
        expect(result.value.sweepIntervalMs).toBe(2_147_483_647);
      }
    });
  });

  describe('malformed input', () => {
    it('parseCacheConfig_NotAnObject_ReturnsInvalidOptions', () => {
      // Act
      const result = parseCacheConfig('capacity=10');

      // Assert
      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.code).toBe('invalid_options');
      }
    });
  });
});

describe('CacheConfigurationError', () => {
  it('copies code, message and cause from the config error', () => {
    const cause = { reason: 'too small' };

    const error = new CacheConfigurationError({
      code: 'invalid_capacity',
      message: 'invalid capacity: 0',
      cause,
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('CacheConfigurationError');
    expect(error.code).toBe('invalid_capacity');
    expect(error.message).toBe('invalid capacity: 0');
    expect(error.cause).toBe(cause);
  });
});
