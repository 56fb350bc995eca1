/**
 * @fileoverview Upstream login session lifecycle.
 *
 * The session manager is the only owner of SessionState. It logs in lazily,
 * retries with exponential backoff, and lets the resolver mark the session
 * expired when the upstream answers with a session-expired status.
 *
 * @module @seatflow/provider-ifind/session-manager
 */

import { OperationCancelledError, type SessionPhase, type SessionState } from '@seatflow/contracts';
import { createSilentLogger, type Logger } from '@seatflow/logger';
import { systemClock, throwIfAborted, type Clock } from './clock.js';
import type { UpstreamTerminal } from './upstream/types.js';

/** 0 is a fresh login, -201 means the terminal already holds a session. */
export const DEFAULT_ACCEPTED_LOGIN_CODES: readonly number[] = [0, -201];

export interface SessionCredentials {
  userId: string;
  password: string;
}

export interface SessionManagerOptions {
  terminal: Pick<UpstreamTerminal, 'login' | 'logout'>;
  credentials?: SessionCredentials;
  /** Login attempts per ensureActive call (default 3) */
  maxRetries?: number;
  /** Delay after the first failed attempt; doubles each time (default 1000) */
  baseDelayMs?: number;
  acceptedLoginCodes?: readonly number[];
  clock?: Clock;
  logger?: Logger;
}

export type SessionSnapshot = Readonly<SessionState & { phase: SessionPhase }>;

/** One shared login sequence and the callers still waiting on it. */
interface LoginFlight {
  promise: Promise<boolean>;
  controller: AbortController;
  waiters: number;
}

export class SessionManager {
  private readonly terminal: Pick<UpstreamTerminal, 'login' | 'logout'>;
  private readonly credentials?: SessionCredentials;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly acceptedLoginCodes: readonly number[];
  private readonly clock: Clock;
  private readonly logger: Logger;

  private state: SessionState = { loggedIn: false, lastError: null, retryCount: 0 };
  private phase: SessionPhase = 'logged_out';
  private flight: LoginFlight | null = null;

  constructor(options: SessionManagerOptions) {
    this.terminal = options.terminal;
    this.credentials = options.credentials;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? 1000);
    this.acceptedLoginCodes = options.acceptedLoginCodes ?? DEFAULT_ACCEPTED_LOGIN_CODES;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'session' });
  }

  /**
   * Makes sure a session is active, logging in when needed.
   *
   * Concurrent callers share one login sequence. A caller's signal only
   * cancels its own wait; the sequence itself stops once every waiter has
   * aborted.
   *
   * @returns false once every retry failed
   * @throws {OperationCancelledError} When `signal` aborts before the login settles
   */
  async ensureActive(signal?: AbortSignal): Promise<boolean> {
    throwIfAborted(signal, 'session ensureActive');

    if (this.state.loggedIn) {
      return true;
    }

    const flight = this.flight ?? this.startFlight();
    flight.waiters += 1;

    if (!signal) {
      return flight.promise;
    }

    return new Promise<boolean>((resolve, reject) => {
      const onAbort = () => {
        flight.waiters -= 1;
        if (flight.waiters === 0) {
          if (this.flight === flight) {
            this.flight = null;
          }
          flight.controller.abort(signal.reason);
        }
        reject(new OperationCancelledError('session ensureActive', signal.reason));
      };

      signal.addEventListener('abort', onAbort, { once: true });
      void flight.promise.then(
        (active) => {
          signal.removeEventListener('abort', onAbort);
          resolve(active);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /**
   * One upstream login call. Thrown errors count as a failed attempt.
   */
  async login(): Promise<boolean> {
    if (!this.credentials) {
      this.markFailed('missing credentials');
      return false;
    }

    this.phase = 'logging_in';

    try {
      const code = await this.terminal.login(this.credentials.userId, this.credentials.password);

      if (this.acceptedLoginCodes.includes(code)) {
        this.state = { loggedIn: true, lastError: null, retryCount: 0 };
        this.phase = 'logged_in';
        this.logger.info('Logged in', { status_code: code });
        return true;
      }

      this.markFailed(`login rejected with code ${code}`);
    } catch (error) {
      this.markFailed(error instanceof Error ? error.message : String(error));
    }

    this.logger.warn('Login attempt failed', {
      error: this.state.lastError,
      retry_count: this.state.retryCount,
    });
    return false;
  }

  /**
   * Ends the session. Upstream errors are logged, never thrown.
   */
  async logout(): Promise<void> {
    if (!this.state.loggedIn) {
      return;
    }

    try {
      await this.terminal.logout();
      this.logger.info('Logged out');
    } catch (error) {
      this.logger.warn('Logout failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.state = { ...this.state, loggedIn: false };
      this.phase = 'logged_out';
    }
  }

  /**
   * Marks the session expired so the next ensureActive logs in again.
   */
  invalidate(reason: string): void {
    if (this.state.loggedIn) {
      this.logger.warn('Session invalidated', { reason });
    }
    this.state = { ...this.state, loggedIn: false, lastError: reason };
    this.phase = 'logged_out';
  }

  getState(): SessionSnapshot {
    return { ...this.state, phase: this.phase };
  }

  private startFlight(): LoginFlight {
    const controller = new AbortController();
    const flight: LoginFlight = {
      controller,
      waiters: 0,
      promise: this.loginWithRetry(controller.signal).finally(() => {
        if (this.flight === flight) {
          this.flight = null;
        }
      }),
    };
    this.flight = flight;
    return flight;
  }

  private async loginWithRetry(signal?: AbortSignal): Promise<boolean> {
    if (!this.credentials) {
      this.markFailed('missing credentials');
      this.logger.error('Cannot log in: upstream credentials are not configured');
      return false;
    }

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      if (await this.login()) {
        return true;
      }

      if (attempt < this.maxRetries) {
        const delayMs = this.baseDelayMs * 2 ** (attempt - 1);
        this.logger.info('Retrying login', { attempt, delay_ms: delayMs });
        await this.clock.sleep(delayMs, signal);
      }
    }

    this.logger.error('Login retries exhausted', {
      attempts: this.maxRetries,
      error: this.state.lastError,
    });
    return false;
  }

  private markFailed(reason: string): void {
    this.state = {
      loggedIn: false,
      lastError: reason,
      retryCount: this.state.retryCount + 1,
    };
    this.phase = 'logged_out';
  }
}
