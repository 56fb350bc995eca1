/**
 * @fileoverview Tests for the upstream session lifecycle.
 */

import { describe, it, expect, vi } from 'vitest';
import { OperationCancelledError } from '@seatflow/contracts';
import { SessionManager } from '../src/session-manager.js';
import { FakeClock, flushAsync } from './helpers/fake-clock.js';

const credentials = { userId: 'demo-user', password: 'test-secret' };

function terminalWith(login: (userId: string, password: string) => Promise<number>) {
  return { login: vi.fn(login), logout: vi.fn(async () => undefined) };
}

describe('SessionManager', () => {
  describe('ensureActive', () => {
    it('should log in once and take the fast path afterwards', async () => {
      const terminal = terminalWith(async () => 0);
      const session = new SessionManager({ terminal, credentials, clock: new FakeClock() });

      expect(await session.ensureActive()).toBe(true);
      expect(await session.ensureActive()).toBe(true);

      expect(terminal.login).toHaveBeenCalledTimes(1);
      expect(terminal.login).toHaveBeenCalledWith('demo-user', 'test-secret');
      expect(session.getState()).toEqual({
        loggedIn: true,
        lastError: null,
        retryCount: 0,
        phase: 'logged_in',
      });
    });

    it('should accept the already-logged-in code', async () => {
      const terminal = terminalWith(async () => -201);
      const session = new SessionManager({ terminal, credentials, clock: new FakeClock() });

      expect(await session.ensureActive()).toBe(true);
      expect(session.getState().loggedIn).toBe(true);
    });

    it('should retry with exponential backoff and give up after maxRetries', async () => {
      const clock = new FakeClock();
      const terminal = terminalWith(async () => -1);
      const session = new SessionManager({ terminal, credentials, clock });

      expect(await session.ensureActive()).toBe(false);

      expect(terminal.login).toHaveBeenCalledTimes(3);
      expect(clock.sleeps).toEqual([1000, 2000]);
      expect(session.getState()).toEqual({
        loggedIn: false,
        lastError: 'login rejected with code -1',
        retryCount: 3,
        phase: 'logged_out',
      });
    });

    it('should count thrown login errors as failed attempts', async () => {
      const clock = new FakeClock();
      let calls = 0;
      const terminal = terminalWith(async () => {
        calls++;
        if (calls < 3) {
          throw new Error('network down');
        }
        return 0;
      });
      const session = new SessionManager({ terminal, credentials, clock, baseDelayMs: 500 });

      expect(await session.ensureActive()).toBe(true);

      expect(terminal.login).toHaveBeenCalledTimes(3);
      expect(clock.sleeps).toEqual([500, 1000]);
      expect(session.getState().retryCount).toBe(0);
    });

    it('should fail without calling upstream when credentials are missing', async () => {
      const terminal = terminalWith(async () => 0);
      const session = new SessionManager({ terminal, clock: new FakeClock() });

      expect(await session.ensureActive()).toBe(false);
      expect(terminal.login).not.toHaveBeenCalled();
      expect(session.getState().lastError).toBe('missing credentials');
    });

    it('should share one login between concurrent callers', async () => {
      const terminal = terminalWith(
        () => new Promise<number>((resolve) => setImmediate(() => resolve(0)))
      );
      const session = new SessionManager({ terminal, credentials, clock: new FakeClock() });

      const results = await Promise.all([
        session.ensureActive(),
        session.ensureActive(),
        session.ensureActive(),
      ]);

      expect(results).toEqual([true, true, true]);
      expect(terminal.login).toHaveBeenCalledTimes(1);
    });

    it('should reject when aborted during backoff', async () => {
      const clock = new FakeClock(0, 'manual');
      const terminal = terminalWith(async () => -1);
      const session = new SessionManager({ terminal, credentials, clock });
      const controller = new AbortController();

      const pending = session.ensureActive(controller.signal);
      await flushAsync();
      expect(clock.pendingSleeps()).toBe(1);

      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
      expect(terminal.login).toHaveBeenCalledTimes(1);
    });

    it('should keep a shared login running when only one caller aborts', async () => {
      const clock = new FakeClock(0, 'manual');
      const codes = [-1, 0];
      const terminal = terminalWith(async () => codes.shift() ?? 0);
      const session = new SessionManager({ terminal, credentials, clock });
      const controller = new AbortController();

      const cancelled = session.ensureActive(controller.signal);
      const unsignalled = session.ensureActive();
      await flushAsync();
      expect(clock.pendingSleeps()).toBe(1);

      controller.abort();
      await expect(cancelled).rejects.toBeInstanceOf(OperationCancelledError);
      expect(clock.pendingSleeps()).toBe(1);

      await clock.advance(1000);

      expect(await unsignalled).toBe(true);
      expect(terminal.login).toHaveBeenCalledTimes(2);
      expect(session.getState().loggedIn).toBe(true);
    });

    it('should stop the shared login once every caller has aborted', async () => {
      const clock = new FakeClock(0, 'manual');
      const terminal = terminalWith(async () => -1);
      const session = new SessionManager({ terminal, credentials, clock });
      const first = new AbortController();
      const second = new AbortController();

      const pending = [session.ensureActive(first.signal), session.ensureActive(second.signal)];
      await flushAsync();

      first.abort();
      expect(clock.pendingSleeps()).toBe(1);
      second.abort();

      await expect(pending[0]).rejects.toBeInstanceOf(OperationCancelledError);
      await expect(pending[1]).rejects.toBeInstanceOf(OperationCancelledError);
      await flushAsync();
      expect(clock.pendingSleeps()).toBe(0);
      expect(terminal.login).toHaveBeenCalledTimes(1);
    });

    it('should reject an already aborted signal before logging in', async () => {
      const terminal = terminalWith(async () => 0);
      const session = new SessionManager({ terminal, credentials, clock: new FakeClock() });
      const controller = new AbortController();
      controller.abort();

      await expect(session.ensureActive(controller.signal)).rejects.toBeInstanceOf(
        OperationCancelledError
      );
      expect(terminal.login).not.toHaveBeenCalled();
    });
  });

  describe('invalidate', () => {
    it('should force a fresh login on the next ensureActive', async () => {
      const terminal = terminalWith(async () => 0);
      const session = new SessionManager({ terminal, credentials, clock: new FakeClock() });

      await session.ensureActive();
      session.invalidate('upstream status -1010');

      expect(session.getState()).toMatchObject({
        loggedIn: false,
        lastError: 'upstream status -1010',
        phase: 'logged_out',
      });

      expect(await session.ensureActive()).toBe(true);
      expect(terminal.login).toHaveBeenCalledTimes(2);
    });
  });

  describe('logout', () => {
    it('should call upstream only when logged in', async () => {
      const terminal = terminalWith(async () => 0);
      const session = new SessionManager({ terminal, credentials, clock: new FakeClock() });

      await session.logout();
      expect(terminal.logout).not.toHaveBeenCalled();

      await session.ensureActive();
      await session.logout();

      expect(terminal.logout).toHaveBeenCalledTimes(1);
      expect(session.getState().loggedIn).toBe(false);
    });

    it('should swallow upstream logout errors', async () => {
      const terminal = {
        login: vi.fn(async () => 0),
        logout: vi.fn(async () => {
          throw new Error('socket closed');
        }),
      };
      const session = new SessionManager({ terminal, credentials, clock: new FakeClock() });

      await session.ensureActive();
      await expect(session.logout()).resolves.toBeUndefined();
      expect(session.getState().phase).toBe('logged_out');
    });
  });
});
