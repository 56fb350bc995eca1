/**
 * @fileoverview Sliding-window rate limiter for outbound upstream calls.
 *
 * At most `maxRequests` calls are admitted in any `windowMs` interval. The
 * check-and-record step runs synchronously, so concurrent callers on the
 * event loop can never both take the last slot; waiting happens outside it
 * and every waiter re-evaluates after waking.
 *
 * @module @seatflow/provider-ifind/rate-limiter
 */

import { ConfigurationError } from '@seatflow/contracts';
import { createSilentLogger, type Logger } from '@seatflow/logger';
import { systemClock, throwIfAborted, type Clock } from './clock.js';

/** Added to every computed wait so the oldest call has left the window on wake-up. */
export const DEFAULT_EPSILON_MS = 100;

export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
  epsilonMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export interface RateLimiterStatus {
  maxRequests: number;
  windowMs: number;
  /** Calls recorded inside the current window */
  inWindow: number;
}

/**
 * Rate limiter shared by every upstream call of one adapter.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter({ maxRequests: 30, windowMs: 60_000 });
 * await limiter.acquire();
 * const raw = await terminal.invoke('history_quotes', ...params);
 * ```
 */
export class RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly epsilonMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly timestamps: number[] = [];

  constructor(options: RateLimiterOptions) {
    const { maxRequests, windowMs, epsilonMs = DEFAULT_EPSILON_MS } = options;

    if (!Number.isInteger(maxRequests) || maxRequests <= 0) {
      throw new ConfigurationError(`maxRequests must be a positive integer, got ${maxRequests}`, {
        field: 'maxRequests',
      });
    }
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      throw new ConfigurationError(`windowMs must be positive, got ${windowMs}`, {
        field: 'windowMs',
      });
    }
    if (!Number.isFinite(epsilonMs) || epsilonMs < 0) {
      throw new ConfigurationError(`epsilonMs must not be negative, got ${epsilonMs}`, {
        field: 'epsilonMs',
      });
    }

    this.maxRequests = maxRequests;
    this.windowMs = windowMs;
    this.epsilonMs = epsilonMs;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'rate-limiter' });
  }

  /**
   * Waits until a slot is free, then records the call.
   *
   * @throws {OperationCancelledError} When `signal` aborts before a slot is taken
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    for (;;) {
      throwIfAborted(signal, 'rate limiter acquire');

      const now = this.clock.now();
      this.evict(now);

      if (this.timestamps.length < this.maxRequests) {
        this.timestamps.push(now);
        return;
      }

      const oldest = this.timestamps[0] ?? now;
      const waitMs = this.windowMs - (now - oldest) + this.epsilonMs;

      this.logger.warn('Rate limit reached, waiting', {
        wait_ms: waitMs,
        in_window: this.timestamps.length,
        max_requests: this.maxRequests,
      });

      await this.clock.sleep(waitMs, signal);
    }
  }

  /** Copy of the recorded call timestamps, oldest first. */
  recentTimestamps(): number[] {
    this.evict(this.clock.now());
    return [...this.timestamps];
  }

  status(): RateLimiterStatus {
    this.evict(this.clock.now());
    return {
      maxRequests: this.maxRequests,
      windowMs: this.windowMs,
      inWindow: this.timestamps.length,
    };
  }

  private evict(now: number): void {
    while (this.timestamps.length > 0) {
      const oldest = this.timestamps[0];
      if (oldest === undefined || now - oldest < this.windowMs) {
        break;
      }
      this.timestamps.shift();
    }
  }
}
