/**
 * @fileoverview Sequential fallback resolution over invocation candidates.
 *
 * Each candidate is one concrete upstream call. Candidates are tried strictly
 * in order until one satisfies the success predicate; upstream exceptions,
 * malformed responses and expired sessions are recorded in the trace and the
 * next candidate is tried. Only cancellation escapes.
 *
 * @module @seatflow/provider-ifind/fallback-resolver
 */

import { isOperationCancelledError } from '@seatflow/contracts';
import type { AttemptTrace, NormalizedResponse, Query, RawResponse } from '@seatflow/contracts';
import { createSilentLogger, type Logger } from '@seatflow/logger';
import { systemClock, throwIfAborted, type Clock } from './clock.js';
import { DEFAULT_SESSION_EXPIRED_CODES } from './indicators.js';
import { normalize } from './normalizer.js';
import { classifyRaw, describeRaw } from './raw.js';
import type { RateLimiter } from './rate-limiter.js';
import type { SessionManager } from './session-manager.js';
import type { InvocationShape, Resolution, ResolveOptions, SuccessPredicate } from './types.js';
import type { UpstreamTerminal } from './upstream/types.js';

export const SESSION_UNAVAILABLE = 'session unavailable';

/**
 * Status 0 with rows, or no status at all with rows (shapes that carry no
 * status field).
 */
export const defaultSuccess: SuccessPredicate = (statusCode, rowCount) =>
  rowCount > 0 && (statusCode === 0 || statusCode === null);

export interface FallbackResolverOptions {
  terminal: Pick<UpstreamTerminal, 'invoke'>;
  session: Pick<SessionManager, 'ensureActive' | 'invalidate'>;
  limiter: Pick<RateLimiter, 'acquire'>;
  /** Pause between consecutive candidates (default 0) */
  interCallDelayMs?: number;
  sessionExpiredCodes?: readonly number[];
  clock?: Clock;
  logger?: Logger;
}

interface Attempt {
  trace: AttemptTrace;
  response: NormalizedResponse | null;
}

export class FallbackQueryResolver {
  private readonly terminal: Pick<UpstreamTerminal, 'invoke'>;
  private readonly session: Pick<SessionManager, 'ensureActive' | 'invalidate'>;
  private readonly limiter: Pick<RateLimiter, 'acquire'>;
  private readonly interCallDelayMs: number;
  private readonly sessionExpiredCodes: readonly number[];
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: FallbackResolverOptions) {
    this.terminal = options.terminal;
    this.session = options.session;
    this.limiter = options.limiter;
    this.interCallDelayMs = Math.max(0, options.interCallDelayMs ?? 0);
    this.sessionExpiredCodes = options.sessionExpiredCodes ?? DEFAULT_SESSION_EXPIRED_CODES;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'resolver' });
  }

  /**
   * Tries candidates in order and returns the rows of the first success.
   *
   * @throws {OperationCancelledError} When `options.signal` aborts
   *
   * @example
   * ```typescript
   * const { rows, trace } = await resolver.resolve(query, historyQuoteCandidates(params));
   * ```
   */
  async resolve(
    query: Query,
    candidates: readonly InvocationShape[],
    isSuccess: SuccessPredicate = defaultSuccess,
    options: ResolveOptions = {}
  ): Promise<Resolution> {
    const { signal } = options;
    const trace: AttemptTrace[] = [];

    for (const [index, candidate] of candidates.entries()) {
      throwIfAborted(signal, 'resolve');

      if (index > 0 && this.interCallDelayMs > 0) {
        await this.clock.sleep(this.interCallDelayMs, signal);
      }

      const attempt = await this.attempt(candidate, signal);
      trace.push(attempt.trace);

      this.logger.debug('Attempt finished', {
        kind: query.kind,
        shape: candidate.description,
        status_code: attempt.trace.statusCode,
        count: attempt.trace.rowCount,
        error: attempt.trace.error,
      });

      if (attempt.response && isSuccess(attempt.response.statusCode, attempt.response.rows.length)) {
        return { rows: attempt.response.rows, trace, matched: candidate };
      }
    }

    this.logger.info('All candidates exhausted', {
      kind: query.kind,
      codes: query.codes,
      attempts: trace.length,
    });

    return { rows: [], trace, matched: null };
  }

  private async attempt(candidate: InvocationShape, signal?: AbortSignal): Promise<Attempt> {
    const startedAt = this.clock.now();
    const skipped = (error: string): Attempt => ({
      trace: {
        shapeDescription: candidate.description,
        rawTypeName: 'none',
        statusCode: null,
        rowCount: 0,
        error,
        durationMs: this.clock.now() - startedAt,
      },
      response: null,
    });

    if (!(await this.session.ensureActive(signal))) {
      return skipped(SESSION_UNAVAILABLE);
    }

    await this.limiter.acquire(signal);

    let value: unknown;
    try {
      value = await this.terminal.invoke(candidate.operation, ...candidate.params);
    } catch (error) {
      if (isOperationCancelledError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Upstream call failed', { shape: candidate.description, error: message });
      return skipped(message);
    }

    let raw: RawResponse;
    let response: NormalizedResponse;
    try {
      raw = classifyRaw(value);
      response = normalize(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Response could not be normalized', { shape: candidate.description, error: message });
      return skipped(`normalize failed: ${message}`);
    }

    if (response.statusCode !== null && this.sessionExpiredCodes.includes(response.statusCode)) {
      this.session.invalidate(`upstream status ${response.statusCode}`);
    }

    return {
      trace: {
        shapeDescription: candidate.description,
        rawTypeName: describeRaw(raw),
        statusCode: response.statusCode,
        rowCount: response.rows.length,
        durationMs: this.clock.now() - startedAt,
      },
      response,
    };
  }
}
