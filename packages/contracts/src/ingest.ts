/**
 * @fileoverview Core ingestion types shared by the adapter and its callers.
 *
 * Describes what goes into a fetch (Query), what comes back from a single
 * physical upstream call (RawResponse), and the stable shapes the adapter
 * hands to downstream consumers (NormalizedRow, FlattenedRecord).
 *
 * @module @seatflow/contracts/ingest
 */

/**
 * Logical query types served by the adapter.
 */
export enum QueryKind {
  /** Per-instrument trade-flow totals from the daily top-list pool */
  TradeFlow = 'trade_flow',
  /** Seat/participant-level buy and sell detail */
  SeatDetail = 'seat_detail',
  /** Daily quote series per instrument */
  HistoryQuotes = 'history_quotes',
  /** Instrument universe for a market */
  InstrumentList = 'instrument_list',
}

/**
 * Immutable, validated query. Build through createQuery/parseQuery.
 */
export interface Query {
  readonly codes: readonly string[];
  /** Inclusive, YYYY-MM-DD */
  readonly startDate: string;
  /** Inclusive, YYYY-MM-DD */
  readonly endDate: string;
  readonly indicators: readonly string[];
  readonly kind: QueryKind;
}

/**
 * Unvalidated query input as supplied by callers.
 */
export interface QueryInput {
  codes: readonly string[];
  startDate: string;
  endDate?: string;
  indicators: readonly string[];
  kind: QueryKind;
}

/** Scalar cell value. */
export type Scalar = string | number | boolean | null;

/**
 * Any value a normalized cell may hold. Packed responses put arrays here;
 * "inner table" responses put nested mappings here.
 */
export type FieldValue = Scalar | FieldValue[] | { [key: string]: FieldValue };

/**
 * Ordered field → value mapping produced by normalization. Rows from one
 * normalization pass share the same key set.
 */
export type NormalizedRow = Record<string, FieldValue>;

/**
 * Normalized row guaranteed free of arrays and nested mappings; one per
 * reporting unit (instrument × timestamp, or instrument × seat).
 */
export type FlattenedRecord = Record<string, Scalar>;

/**
 * Raw value returned by one physical upstream call, tagged by shape at the
 * boundary so normalization can dispatch on `kind`.
 */
export type RawResponse =
  | { readonly kind: 'tuple'; readonly items: readonly unknown[] }
  | { readonly kind: 'bytes'; readonly data: Uint8Array }
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'mapping'; readonly value: Readonly<Record<string, unknown>> }
  | { readonly kind: 'scalar'; readonly value: number | boolean | bigint }
  | { readonly kind: 'unrecognized'; readonly typeName: string };

export type RawResponseKind = RawResponse['kind'];

/**
 * Result of normalizing one raw response.
 */
export interface NormalizedResponse {
  statusCode: number | null;
  rows: NormalizedRow[];
}

/**
 * Session lifecycle phase.
 */
export type SessionPhase = 'logged_out' | 'logging_in' | 'logged_in';

/**
 * Upstream session state. Owned exclusively by the session manager; other
 * components only ever see snapshots.
 */
export interface SessionState {
  loggedIn: boolean;
  lastError: string | null;
  retryCount: number;
}

/**
 * Diagnostics for one fallback attempt. Never part of returned data.
 */
export interface AttemptTrace {
  shapeDescription: string;
  rawTypeName: string;
  statusCode: number | null;
  rowCount: number;
  /** Set when the call threw or the attempt was skipped */
  error?: string;
  durationMs?: number;
}

/**
 * Reasons a fetch can fail outright. Upstream failures are absorbed by the
 * fallback resolver; `internal` marks any other unexpected failure.
 */
export type FetchErrorKind = 'invalid_query' | 'session_unavailable' | 'cancelled' | 'internal';

/**
 * Outcome of one adapter fetch. `no_data` is a normal, confirmed-empty
 * result and is distinct from `error`.
 */
export type FetchOutcome =
  | { status: 'ok'; records: FlattenedRecord[]; trace: AttemptTrace[] }
  | { status: 'no_data'; records: []; trace: AttemptTrace[] }
  | {
      status: 'error';
      error: { kind: FetchErrorKind; message: string };
      trace: AttemptTrace[];
    };

export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

export function isFieldMapping(value: FieldValue): value is { [key: string]: FieldValue } {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Sets `key` as an own enumerable data property. Plain assignment would route
 * upstream keys such as `__proto__` through the prototype setter.
 */
export function setField<T>(target: { [key: string]: T }, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
