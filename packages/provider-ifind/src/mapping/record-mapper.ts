/**
 * @fileoverview Mapping of flattened records onto the downstream tables.
 *
 * Records are aligned through the ColumnAligner, cleaned per field type and
 * de-duplicated on the table's natural key, keeping the last occurrence.
 *
 * @module @seatflow/provider-ifind/mapping/record-mapper
 */

import { canonicalDate } from '@seatflow/contracts';
import type { FlattenedRecord, Scalar } from '@seatflow/contracts';
import { ColumnAligner } from './column-aligner.js';

export type TargetTable = 'trade_flow' | 'seat_daily' | 'daily_quotes';

export const TARGET_TABLES: readonly TargetTable[] = ['trade_flow', 'seat_daily', 'daily_quotes'];

interface TableSchema {
  numeric: readonly string[];
  text: readonly string[];
  naturalKey: readonly string[];
}

const TABLE_SCHEMAS: Record<TargetTable, TableSchema> = {
  trade_flow: {
    numeric: ['lhb_buy', 'lhb_sell', 'lhb_net_buy', 'lhb_turnover_ratio'],
    text: ['code', 'name', 'reason'],
    naturalKey: ['trade_date', 'code'],
  },
  seat_daily: {
    numeric: ['buy_amt', 'sell_amt', 'net_amt'],
    text: ['code', 'name', 'seat_name', 'seat_type', 'reason'],
    naturalKey: ['trade_date', 'code', 'seat_name'],
  },
  daily_quotes: {
    numeric: [
      'open',
      'high',
      'low',
      'close',
      'volume',
      'amount',
      'turnover',
      'pct_chg',
      'avg_price',
      'pe_ttm',
      'pb',
      'total_mv',
    ],
    text: ['code'],
    naturalKey: ['trade_date', 'code'],
  },
};

export type TableRow = Record<string, Scalar>;

export interface MappedRecords {
  table: TargetTable;
  rows: TableRow[];
  /** Source columns with no canonical field */
  unmatched: string[];
}

export function isTargetTable(value: string): value is TargetTable {
  return TARGET_TABLES.some((table) => table === value);
}

/**
 * Numeric cell; unparseable and missing values become 0.
 */
export function toNumber(value: Scalar | undefined): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string') {
    const cleaned = value.replace(/,/g, '').trim();
    if (cleaned === '') {
      return 0;
    }
    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function toText(value: Scalar | undefined): string {
  return value === null || value === undefined ? '' : String(value).trim();
}

/**
 * `YYYY-MM-DD` from hyphenated, compact or timestamped input; other text is
 * kept as given.
 */
export function toTradeDate(value: Scalar | undefined): string {
  const text = toText(value);
  return canonicalDate(text.slice(0, 10)) ?? canonicalDate(text.slice(0, 8)) ?? text;
}

function sourceColumns(records: readonly FlattenedRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      seen.add(key);
    }
  }
  return [...seen];
}

/**
 * Maps flattened records onto a target table.
 *
 * @example
 * ```typescript
 * const { rows } = mapRecords(outcome.records, 'seat_daily');
 * // rows[0]: { trade_date, code, name, seat_name, seat_type, buy_amt, sell_amt, reason, net_amt }
 * ```
 */
export function mapRecords(
  records: readonly FlattenedRecord[],
  table: TargetTable,
  aligner: ColumnAligner = new ColumnAligner()
): MappedRecords {
  const schema = TABLE_SCHEMAS[table];
  const { columns, unmatched } = aligner.align(sourceColumns(records), table);
  const fields = aligner.fields(table);
  const byKey = new Map<string, TableRow>();

  for (const record of records) {
    const row: TableRow = {};

    for (const field of fields) {
      const column = columns.get(field);
      const value = column === undefined ? null : record[column];

      if (field === 'trade_date') {
        row[field] = toTradeDate(value);
      } else if (schema.numeric.includes(field)) {
        row[field] = toNumber(value);
      } else if (schema.text.includes(field)) {
        row[field] = toText(value);
      } else {
        row[field] = value ?? null;
      }
    }

    if (table === 'seat_daily') {
      row['net_amt'] = toNumber(row['buy_amt']) - toNumber(row['sell_amt']);
    }

    const key = JSON.stringify(schema.naturalKey.map((field) => row[field] ?? null));
    byKey.delete(key);
    byKey.set(key, row);
  }

  return { table, rows: [...byKey.values()], unmatched };
}
