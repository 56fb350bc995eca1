/**
 * @fileoverview Type definitions for the iFinD provider.
 *
 * @module @seatflow/provider-ifind/types
 */

import type { AttemptTrace, NormalizedRow } from '@seatflow/contracts';
import type { UpstreamOperation } from './upstream/types.js';

/**
 * One concrete upstream call tried while resolving a query.
 */
export interface InvocationShape {
  operation: UpstreamOperation;
  params: readonly string[];
  /** Human-readable label recorded in the attempt trace */
  description: string;
}

/**
 * Date rendering accepted by the upstream. `empty` leaves the parameter
 * blank, which some data-pool reports interpret as "latest".
 */
export type DateFormat = 'hyphenated' | 'compact' | 'empty';

/** Instrument-list market filter. */
export type Market = 'all' | 'SSE' | 'SZSE';

/** Decides whether an attempt's normalized response is the answer. */
export type SuccessPredicate = (statusCode: number | null, rowCount: number) => boolean;

export interface Resolution {
  /** Rows of the successful attempt only; empty when every candidate failed */
  rows: NormalizedRow[];
  trace: AttemptTrace[];
  matched: InvocationShape | null;
}

export interface ResolveOptions {
  signal?: AbortSignal;
}

/**
 * Parameters shared by the date-ranged adapter operations.
 */
export interface FetchParams {
  /** Instrument codes; omitted means the whole market where the report allows it */
  codes?: readonly string[];
  /** YYYY-MM-DD or YYYYMMDD */
  startDate: string;
  /** Defaults to startDate */
  endDate?: string;
  /** Overrides the default indicator list of the operation */
  indicators?: readonly string[];
}

export interface FetchOptions {
  signal?: AbortSignal;
}
