/**
 * @fileoverview Time source used by every waiting component.
 *
 * The rate limiter, the session backoff and the resolver's inter-call delay
 * all read time and sleep through a Clock so tests can substitute a virtual
 * one.
 *
 * @module @seatflow/provider-ifind/clock
 */

import { setTimeout as delay } from 'node:timers/promises';
import { OperationCancelledError } from '@seatflow/contracts';

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  /** Resolves after `ms`; rejects with OperationCancelledError when `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Throws OperationCancelledError when the signal has already fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation, signal.reason);
  }
}

export const systemClock: Clock = {
  now: () => Date.now(),

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal, 'sleep');
    if (ms <= 0) {
      return;
    }

    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError('sleep', signal.reason);
      }
      throw error;
    }
  },
};
