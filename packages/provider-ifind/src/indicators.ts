/**
 * @fileoverview Default indicator lists and report names of the upstream
 * terminal, per query kind.
 *
 * @module @seatflow/provider-ifind/indicators
 */

/** Marker code meaning "every listed instrument". */
export const ALL_MARKET = 'all';

/** Data-pool report holding the daily top list. */
export const TOP_LIST_REPORT = 'block';

/** Data-pool report holding the instrument universe. */
export const INSTRUMENT_REPORT = 'stock';

/** Identification fields requested alongside every top-list indicator set. */
export const INSTRUMENT_ID_FIELDS = ['ths_stock_short_name_stock', 'ths_stock_code_stock'] as const;

export const TRADE_FLOW_INDICATORS = [
  'ths_lhb_buy_amount_stock',
  'ths_lhb_sell_amount_stock',
  'ths_lhb_net_buy_amount_stock',
  'ths_lhb_turnover_ratio_stock',
  'ths_lhb_reason_stock',
] as const;

export const SEAT_INDICATORS = [
  'ths_lhb_seat_name_stock',
  'ths_lhb_seat_type_stock',
  'ths_lhb_buy_amount_seat_stock',
  'ths_lhb_sell_amount_seat_stock',
] as const;

export const HISTORY_INDICATORS = [
  'open',
  'high',
  'low',
  'close',
  'volume',
  'amount',
  'turn',
  'pctChg',
  'avgPrice',
  'pe_ttm',
  'pb',
  'total_mv',
] as const;

/** Fields that may carry the instrument code in a returned row, by precedence. */
export const CODE_FIELDS = ['ths_stock_code_stock', 'thscode', 'stock_code', 'code'] as const;

/** Upstream statuses meaning the session is gone and a fresh login is needed. */
export const DEFAULT_SESSION_EXPIRED_CODES: readonly number[] = [-1010, -1302];
