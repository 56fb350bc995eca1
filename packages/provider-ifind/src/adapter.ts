/**
 * @fileoverview Data provider adapter: the public face of the ingestion core.
 *
 * Composes the rate limiter, session manager, fallback resolver, normalizer
 * and flattener behind four fetch operations. Every operation resolves to a
 * FetchOutcome and never rejects; callers branch on `status` and, for
 * errors, on `error.kind`.
 *
 * @module @seatflow/provider-ifind/adapter
 */

import {
  QueryKind,
  QueryValidationError,
  SessionUnavailableError,
  createQuery,
  eachDay,
  isOperationCancelledError,
  isQueryValidationError,
  isSessionUnavailableError,
} from '@seatflow/contracts';
import type {
  AttemptTrace,
  FetchErrorKind,
  FetchOutcome,
  FlattenedRecord,
  NormalizedRow,
  Query,
} from '@seatflow/contracts';
import { createSilentLogger, startTimer, type Logger } from '@seatflow/logger';
import {
  basicDataCandidates,
  dataPoolCandidates,
  exchangeDate,
  historyQuoteCandidates,
  instrumentListCandidates,
} from './candidates.js';
import { systemClock, throwIfAborted, type Clock } from './clock.js';
import { FallbackQueryResolver, defaultSuccess } from './fallback-resolver.js';
import { flattenRows, unpackDelimited } from './flattener.js';
import {
  ALL_MARKET,
  CODE_FIELDS,
  HISTORY_INDICATORS,
  INSTRUMENT_ID_FIELDS,
  SEAT_INDICATORS,
  TOP_LIST_REPORT,
  TRADE_FLOW_INDICATORS,
} from './indicators.js';
import { RateLimiter, type RateLimiterStatus } from './rate-limiter.js';
import { SessionManager, type SessionCredentials, type SessionSnapshot } from './session-manager.js';
import type { FetchOptions, FetchParams, Market } from './types.js';
import type { UpstreamTerminal } from './upstream/types.js';

export const MARKETS: readonly Market[] = ['all', 'SSE', 'SZSE'];

export function isMarket(value: string): value is Market {
  return MARKETS.some((market) => market === value);
}

export interface DataProviderAdapterOptions {
  terminal: UpstreamTerminal;
  credentials?: SessionCredentials;
  /** Calls admitted per window (default 30) */
  maxRequests?: number;
  /** Sliding window length in ms (default 60000) */
  windowMs?: number;
  /** Login attempts before giving up (default 3) */
  loginMaxRetries?: number;
  /** First login backoff in ms, doubled per attempt (default 1000) */
  baseRetryDelayMs?: number;
  /** Pause between consecutive upstream calls in ms (default 200) */
  interCallDelayMs?: number;
  /** Pause between history batches in ms (default 2000) */
  interBatchDelayMs?: number;
  /** Instruments per history batch (default 20) */
  batchSize?: number;
  acceptedLoginCodes?: readonly number[];
  sessionExpiredCodes?: readonly number[];
  /** Share one quota between adapters by passing the same limiter */
  limiter?: RateLimiter;
  clock?: Clock;
  logger?: Logger;
}

export interface AdapterStatus {
  session: SessionSnapshot;
  limiter: RateLimiterStatus;
}

type Work = (trace: AttemptTrace[]) => Promise<FlattenedRecord[]>;

/**
 * First code-bearing field of a record, if any.
 */
export function recordCode(record: FlattenedRecord): string | null {
  for (const field of CODE_FIELDS) {
    const value = record[field];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return null;
}

/**
 * Adds `code` to a record that carries none.
 */
function withCode(record: FlattenedRecord, code: string | null): FlattenedRecord {
  const existing = record['code'];
  if (code === null || (existing !== undefined && existing !== null)) {
    return record;
  }
  return { ...record, code };
}

function toFetchError(error: unknown): { kind: FetchErrorKind; message: string } {
  const message = error instanceof Error ? error.message : String(error);
  if (isQueryValidationError(error)) {
    return { kind: 'invalid_query', message };
  }
  if (isSessionUnavailableError(error)) {
    return { kind: 'session_unavailable', message };
  }
  if (isOperationCancelledError(error)) {
    return { kind: 'cancelled', message };
  }
  return { kind: 'internal', message };
}

/**
 * Resilient adapter over one upstream terminal.
 *
 * @example
 * ```typescript
 * const adapter = new DataProviderAdapter({
 *   terminal: new HttpTerminal(),
 *   credentials: { userId: 'analyst', password: process.env.THS_PASSWORD ?? '' },
 *   logger,
 * });
 *
 * const outcome = await adapter.fetchHistoryQuotes({
 *   codes: ['000001.SZ'],
 *   startDate: '2024-01-02',
 *   endDate: '2024-01-31',
 * });
 * if (outcome.status === 'ok') {
 *   for (const record of outcome.records) console.log(record.time, record.close);
 * }
 * await adapter.close();
 * ```
 */
export class DataProviderAdapter {
  private readonly limiter: RateLimiter;
  private readonly session: SessionManager;
  private readonly resolver: FallbackQueryResolver;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly loginMaxRetries: number;
  private readonly interCallDelayMs: number;
  private readonly interBatchDelayMs: number;
  private readonly batchSize: number;

  constructor(options: DataProviderAdapterOptions) {
    const baseLogger = options.logger ?? createSilentLogger();
    this.clock = options.clock ?? systemClock;
    this.logger = baseLogger.child({ component: 'adapter' });
    this.loginMaxRetries = options.loginMaxRetries ?? 3;
    this.interCallDelayMs = options.interCallDelayMs ?? 200;
    this.interBatchDelayMs = options.interBatchDelayMs ?? 2000;
    this.batchSize = Math.max(1, options.batchSize ?? 20);

    this.limiter =
      options.limiter ??
      new RateLimiter({
        maxRequests: options.maxRequests ?? 30,
        windowMs: options.windowMs ?? 60_000,
        clock: this.clock,
        logger: baseLogger,
      });

    this.session = new SessionManager({
      terminal: options.terminal,
      credentials: options.credentials,
      maxRetries: this.loginMaxRetries,
      baseDelayMs: options.baseRetryDelayMs,
      acceptedLoginCodes: options.acceptedLoginCodes,
      clock: this.clock,
      logger: baseLogger,
    });

    this.resolver = new FallbackQueryResolver({
      terminal: options.terminal,
      session: this.session,
      limiter: this.limiter,
      interCallDelayMs: this.interCallDelayMs,
      sessionExpiredCodes: options.sessionExpiredCodes,
      clock: this.clock,
      logger: baseLogger,
    });
  }

  /**
   * Daily top-list trade-flow totals per instrument, one record per
   * instrument and day, stamped with `trade_date`.
   */
  fetchTradeFlow(params: FetchParams, options: FetchOptions = {}): Promise<FetchOutcome> {
    return this.execute('fetchTradeFlow', options.signal, async (trace) => {
      const query = this.buildQuery(QueryKind.TradeFlow, params, params.codes ?? [ALL_MARKET], TRADE_FLOW_INDICATORS);
      return this.fetchTopList(query, (rows) => flattenRows(rows), trace, options.signal);
    });
  }

  /**
   * Seat-level buy/sell detail, one record per instrument, seat and day.
   * Seat cells packed with `|` are expanded to one record per seat.
   */
  fetchSeatDetail(params: FetchParams, options: FetchOptions = {}): Promise<FetchOutcome> {
    return this.execute('fetchSeatDetail', options.signal, async (trace) => {
      const query = this.buildQuery(QueryKind.SeatDetail, params, params.codes ?? [ALL_MARKET], SEAT_INDICATORS);
      return this.fetchTopList(
        query,
        (rows) => flattenRows(rows.map((row) => unpackDelimited(row, query.indicators))),
        trace,
        options.signal
      );
    });
  }

  /**
   * Daily quote series per instrument, one record per instrument and day.
   * Instruments are fetched one at a time in batches.
   */
  fetchHistoryQuotes(params: FetchParams, options: FetchOptions = {}): Promise<FetchOutcome> {
    const { signal } = options;
    return this.execute('fetchHistoryQuotes', signal, async (trace) => {
      const query = this.buildQuery(QueryKind.HistoryQuotes, params, params.codes ?? [], HISTORY_INDICATORS);
      await this.requireSession(signal);

      const records: FlattenedRecord[] = [];
      for (let start = 0; start < query.codes.length; start += this.batchSize) {
        if (start > 0) {
          this.logger.info('History batch finished', { batch: start / this.batchSize, count: records.length });
          await this.clock.sleep(this.interBatchDelayMs, signal);
        }

        const batch = query.codes.slice(start, start + this.batchSize);
        for (const [offset, code] of batch.entries()) {
          if (offset > 0) {
            await this.clock.sleep(this.interCallDelayMs, signal);
          }

          const candidates = historyQuoteCandidates({
            code,
            indicators: query.indicators,
            startDate: query.startDate,
            endDate: query.endDate,
          });
          const resolution = await this.resolver.resolve(query, candidates, defaultSuccess, { signal });
          trace.push(...resolution.trace);

          for (const record of flattenRows(resolution.rows)) {
            records.push(withCode(record, code));
          }
        }
      }

      return records;
    });
  }

  /**
   * Instrument universe of a market as of today's exchange date.
   */
  fetchInstrumentList(market: Market = 'all', options: FetchOptions = {}): Promise<FetchOutcome> {
    const { signal } = options;
    return this.execute('fetchInstrumentList', signal, async (trace) => {
      if (!isMarket(market)) {
        throw new QueryValidationError(`Unknown market: ${String(market)}`, { field: 'market', value: market });
      }

      const date = exchangeDate(this.clock.now());
      const query = this.buildQuery(QueryKind.InstrumentList, { startDate: date }, [market], ['ths_stock_code_stock']);
      await this.requireSession(signal);

      const resolution = await this.resolver.resolve(
        query,
        instrumentListCandidates({ date, market, fields: query.indicators }),
        defaultSuccess,
        { signal }
      );
      trace.push(...resolution.trace);

      return flattenRows(resolution.rows).map((record) => withCode(record, recordCode(record)));
    });
  }

  /**
   * Logs out of the upstream. Safe to call more than once.
   */
  async close(): Promise<void> {
    await this.session.logout();
  }

  status(): AdapterStatus {
    return { session: this.session.getState(), limiter: this.limiter.status() };
  }

  private buildQuery(
    kind: QueryKind,
    params: Pick<FetchParams, 'startDate' | 'endDate' | 'indicators'>,
    codes: readonly string[],
    defaultIndicators: readonly string[]
  ): Query {
    return createQuery({
      kind,
      codes,
      startDate: params.startDate,
      endDate: params.endDate,
      indicators: params.indicators ?? defaultIndicators,
    });
  }

  private async requireSession(signal?: AbortSignal): Promise<void> {
    if (await this.session.ensureActive(signal)) {
      return;
    }
    throw new SessionUnavailableError('Upstream session could not be established', {
      attempts: this.loginMaxRetries,
      lastError: this.session.getState().lastError,
    });
  }

  /**
   * Day-by-day resolution against the top-list data pool, with a basic-data
   * fallback when explicit codes were requested.
   */
  private async fetchTopList(
    query: Query,
    expand: (rows: readonly NormalizedRow[]) => FlattenedRecord[],
    trace: AttemptTrace[],
    signal?: AbortSignal
  ): Promise<FlattenedRecord[]> {
    await this.requireSession(signal);

    const codes = query.codes.filter((code) => code !== ALL_MARKET);
    const fields = [...INSTRUMENT_ID_FIELDS, ...query.indicators];
    const records: FlattenedRecord[] = [];

    for (const [index, day] of eachDay(query.startDate, query.endDate).entries()) {
      if (index > 0) {
        await this.clock.sleep(this.interCallDelayMs, signal);
      }

      const candidates = [
        ...dataPoolCandidates({ reportName: TOP_LIST_REPORT, date: day, fields }),
        ...(codes.length > 0 ? basicDataCandidates({ codes, date: day, indicators: fields }) : []),
      ];
      const resolution = await this.resolver.resolve(query, candidates, defaultSuccess, { signal });
      trace.push(...resolution.trace);

      for (const record of expand(resolution.rows)) {
        const code = recordCode(record);
        if (codes.length === 0 || code === null || codes.includes(code)) {
          records.push({ ...record, trade_date: day });
        }
      }

      this.logger.debug('Top list day resolved', { kind: query.kind, trade_date: day, count: records.length });
    }

    return records;
  }

  private async execute(operation: string, signal: AbortSignal | undefined, work: Work): Promise<FetchOutcome> {
    const timer = startTimer();
    const trace: AttemptTrace[] = [];
    let outcome: FetchOutcome;

    try {
      throwIfAborted(signal, operation);
      const records = await work(trace);
      outcome =
        records.length > 0 ? { status: 'ok', records, trace } : { status: 'no_data', records: [], trace };
    } catch (error) {
      outcome = { status: 'error', error: toFetchError(error), trace };
    }

    const meta = {
      operation,
      result: outcome.status,
      count: outcome.status === 'error' ? 0 : outcome.records.length,
      attempts: trace.length,
      duration_ms: timer.stop(),
    };

    if (outcome.status === 'error') {
      this.logger.error('Fetch failed', { ...meta, error_code: outcome.error.kind, error: outcome.error.message });
    } else if (outcome.status === 'no_data') {
      this.logger.warn('Fetch returned no data', meta);
    } else {
      this.logger.info('Fetch finished', meta);
    }

    return outcome;
  }
}
