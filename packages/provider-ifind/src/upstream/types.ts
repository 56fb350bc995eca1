/**
 * @fileoverview Contract of the upstream financial-data terminal.
 *
 * @module @seatflow/provider-ifind/upstream/types
 */

/**
 * Query operations the terminal exposes.
 *
 * - `instrument_list`: (date, filter, fields)
 * - `data_pool`: (reportName, date, filter, fields)
 * - `history_quotes`: (code, indicators, options, startDate, endDate)
 * - `basic_data`: (codes, indicators, params)
 */
export type UpstreamOperation = 'instrument_list' | 'data_pool' | 'history_quotes' | 'basic_data';

export const UPSTREAM_OPERATIONS: readonly UpstreamOperation[] = [
  'instrument_list',
  'data_pool',
  'history_quotes',
  'basic_data',
];

export interface UpstreamTerminal {
  /** Returns the terminal's login status code (0 on success). */
  login(userId: string, secret: string): Promise<number>;
  logout(): Promise<void>;
  /** Returns the raw, unclassified response of one call. */
  invoke(operation: UpstreamOperation, ...params: string[]): Promise<unknown>;
}

export function isUpstreamOperation(value: string): value is UpstreamOperation {
  return UPSTREAM_OPERATIONS.some((operation) => operation === value);
}
