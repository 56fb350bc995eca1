/**
 * @fileoverview Tests for the sliding-window rate limiter.
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError, OperationCancelledError } from '@seatflow/contracts';
import { RateLimiter } from '../src/rate-limiter.js';
import { FakeClock, flushAsync } from './helpers/fake-clock.js';

/** Largest number of admissions inside any half-open window [t, t + windowMs). */
function maxInAnyWindow(times: readonly number[], windowMs: number): number {
  return Math.max(...times.map((start) => times.filter((t) => t >= start && t < start + windowMs).length));
}

describe('RateLimiter', () => {
  describe('configuration', () => {
    it('should reject non-positive limits', () => {
      expect(() => new RateLimiter({ maxRequests: 0, windowMs: 1000 })).toThrow(ConfigurationError);
      expect(() => new RateLimiter({ maxRequests: 3, windowMs: -1 })).toThrow(ConfigurationError);
      expect(() => new RateLimiter({ maxRequests: 1.5, windowMs: 1000 })).toThrow(ConfigurationError);
    });
  });

  describe('acquire', () => {
    it('should admit up to maxRequests without waiting', async () => {
      const clock = new FakeClock();
      const limiter = new RateLimiter({ maxRequests: 3, windowMs: 1000, clock });

      await limiter.acquire();
      await limiter.acquire();
      await limiter.acquire();

      expect(clock.sleeps).toEqual([]);
      expect(limiter.recentTimestamps()).toEqual([0, 0, 0]);
    });

    it('should wait until the oldest call leaves the window plus epsilon', async () => {
      const clock = new FakeClock();
      const limiter = new RateLimiter({ maxRequests: 3, windowMs: 1000, clock });

      await limiter.acquire();
      await limiter.acquire();
      await limiter.acquire();
      await clock.advance(250);
      await limiter.acquire();

      expect(clock.sleeps).toEqual([850]);
      expect(clock.now()).toBe(1100);
      expect(limiter.recentTimestamps()).toEqual([1100]);
    });

    it('should delay the first excess call by at least one window and never exceed the bound', async () => {
      const clock = new FakeClock();
      const limiter = new RateLimiter({ maxRequests: 3, windowMs: 1000, clock });
      const admitted: number[] = [];

      for (let i = 0; i < 7; i++) {
        await limiter.acquire();
        admitted.push(clock.now());
      }

      expect(admitted).toEqual([0, 0, 0, 1100, 1100, 1100, 2200]);
      expect(admitted[3]).toBeGreaterThanOrEqual(1000);
      expect(maxInAnyWindow(admitted, 1000)).toBe(3);
    });

    it('should hold concurrent callers beyond the limit until the window slides', async () => {
      const clock = new FakeClock(0, 'manual');
      const limiter = new RateLimiter({ maxRequests: 3, windowMs: 1000, clock });
      const admitted: number[] = [];

      const pending = Array.from({ length: 5 }, () =>
        limiter.acquire().then(() => {
          admitted.push(clock.now());
        })
      );
      await flushAsync();

      expect(admitted).toEqual([0, 0, 0]);
      expect(clock.pendingSleeps()).toBe(2);

      await clock.advance(1100);
      await Promise.all(pending);

      expect(admitted).toEqual([0, 0, 0, 1100, 1100]);
      expect(maxInAnyWindow(admitted, 1000)).toBe(3);
    });

    it('should reject with OperationCancelledError when aborted while waiting', async () => {
      const clock = new FakeClock(0, 'manual');
      const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000, clock });
      const controller = new AbortController();

      await limiter.acquire();
      const waiting = limiter.acquire(controller.signal);
      controller.abort();

      await expect(waiting).rejects.toBeInstanceOf(OperationCancelledError);
      expect(limiter.recentTimestamps()).toEqual([0]);
    });

    it('should reject immediately for an already aborted signal', async () => {
      const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000, clock: new FakeClock() });
      const controller = new AbortController();
      controller.abort();

      await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
      expect(limiter.recentTimestamps()).toEqual([]);
    });
  });

  describe('status', () => {
    it('should report occupancy of the current window', async () => {
      const clock = new FakeClock();
      const limiter = new RateLimiter({ maxRequests: 30, windowMs: 60_000, clock });

      await limiter.acquire();
      await limiter.acquire();

      expect(limiter.status()).toEqual({ maxRequests: 30, windowMs: 60_000, inWindow: 2 });

      await clock.advance(60_000);
      expect(limiter.status().inWindow).toBe(0);
    });
  });
});
