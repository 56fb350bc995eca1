/**
 * @fileoverview iFinD data provider: resilient ingestion adapter.
 *
 * Throttles upstream calls under a shared quota, keeps the login session
 * alive, normalizes the terminal's inconsistent responses, flattens packed
 * series and resolves each query through ordered fallback candidates.
 *
 * @module @seatflow/provider-ifind
 * @example
 * ```typescript
 * import { DataProviderAdapter, FixtureTerminal } from '@seatflow/provider-ifind';
 *
 * const adapter = new DataProviderAdapter({
 *   terminal: new FixtureTerminal({ fixturePath: './__fixtures__' }),
 *   credentials: { userId: 'demo', password: 'test-secret' },
 * });
 * const outcome = await adapter.fetchSeatDetail({ startDate: '2024-01-02' });
 * ```
 */

// Adapter
export { DataProviderAdapter, MARKETS, isMarket, recordCode } from './adapter.js';
export type { DataProviderAdapterOptions, AdapterStatus } from './adapter.js';

// Core components
export { RateLimiter, DEFAULT_EPSILON_MS } from './rate-limiter.js';
export type { RateLimiterOptions, RateLimiterStatus } from './rate-limiter.js';
export { SessionManager, DEFAULT_ACCEPTED_LOGIN_CODES } from './session-manager.js';
export type { SessionManagerOptions, SessionCredentials, SessionSnapshot } from './session-manager.js';
export { FallbackQueryResolver, defaultSuccess, SESSION_UNAVAILABLE } from './fallback-resolver.js';
export type { FallbackResolverOptions } from './fallback-resolver.js';
export { classifyRaw, describeRaw } from './raw.js';
export { normalize, decodeBytes, coerceStatus, toFieldValue, alignRows } from './normalizer.js';
export { flatten, flattenRows, unpackDelimited } from './flattener.js';
export {
  dataPoolCandidates,
  basicDataCandidates,
  historyQuoteCandidates,
  instrumentListCandidates,
  formatDate,
  exchangeDate,
} from './candidates.js';
export { systemClock, throwIfAborted } from './clock.js';
export type { Clock } from './clock.js';
export * from './indicators.js';

// Upstream terminals
export { HttpTerminal, IFIND_BASE_URL, parseParamString } from './upstream/http-terminal.js';
export type { HttpTerminalOptions } from './upstream/http-terminal.js';
export { FixtureTerminal } from './upstream/fixture-terminal.js';
export type { FixtureTerminalOptions } from './upstream/fixture-terminal.js';
export { UPSTREAM_OPERATIONS, isUpstreamOperation } from './upstream/types.js';
export type { UpstreamOperation, UpstreamTerminal } from './upstream/types.js';

// Column alignment and table mapping
export { ColumnAligner, loadSynonymTable } from './mapping/column-aligner.js';
export type { Alignment, SynonymTable } from './mapping/column-aligner.js';
export { mapRecords, isTargetTable, TARGET_TABLES } from './mapping/record-mapper.js';
export type { TargetTable, TableRow, MappedRecords } from './mapping/record-mapper.js';

// Types
export type {
  InvocationShape,
  DateFormat,
  Market,
  SuccessPredicate,
  Resolution,
  ResolveOptions,
  FetchParams,
  FetchOptions,
} from './types.js';
