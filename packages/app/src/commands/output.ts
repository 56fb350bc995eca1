/**
 * Outcome rendering and exit codes
 */

import type { FetchOutcome, FlattenedRecord } from '@seatflow/contracts';
import { mapRecords, type TableRow, type TargetTable } from '@seatflow/provider-ifind';

export interface RenderedOutcome {
  lines: string[];
  /** Source columns no target field claimed; empty unless mapped */
  unmatched: string[];
}

/**
 * One JSON document per record, optionally mapped onto a target table
 */
export function renderRecords(records: readonly FlattenedRecord[], table?: TargetTable): RenderedOutcome {
  if (!table) {
    return { lines: records.map((record) => JSON.stringify(record)), unmatched: [] };
  }

  const { rows, unmatched } = mapRecords(records, table);
  return { lines: rows.map((row: TableRow) => JSON.stringify(row)), unmatched };
}

/**
 * 0 for data or a confirmed-empty result, 1 for caller-side failures,
 * 2 for anything unexpected.
 */
export function exitCodeFor(outcome: FetchOutcome): number {
  if (outcome.status !== 'error') {
    return 0;
  }

  switch (outcome.error.kind) {
    case 'invalid_query':
    case 'session_unavailable':
      return 1;
    case 'cancelled':
      return 130;
    case 'internal':
      return 2;
  }
}
