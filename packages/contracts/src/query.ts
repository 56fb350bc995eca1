/**
 * @fileoverview Query construction and validation.
 *
 * @module @seatflow/contracts/query
 */

import { QueryValidationError } from './errors.js';
import { QueryKind, type Query, type QueryInput } from './ingest.js';
import { err, ok, type Result } from './result.js';

const HYPHENATED_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

/**
 * Canonicalizes a YYYY-MM-DD or YYYYMMDD date to YYYY-MM-DD.
 *
 * @returns The hyphenated date, or null when the input is not a real
 *   calendar date
 *
 * @example
 * ```typescript
 * canonicalDate('20240102'); // '2024-01-02'
 * canonicalDate('2024-02-30'); // null
 * ```
 */
export function canonicalDate(input: string): string | null {
  const trimmed = input.trim();
  const match = HYPHENATED_DATE.exec(trimmed) ?? COMPACT_DATE.exec(trimmed);
  if (!match) {
    return null;
  }

  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return `${y}-${m}-${d}`;
}

/**
 * Converts a YYYY-MM-DD date to the compact YYYYMMDD form.
 */
export function compactDate(date: string): string {
  return date.replace(/-/g, '');
}

/**
 * Lists every calendar day from start to end inclusive (YYYY-MM-DD).
 */
export function eachDay(startDate: string, endDate: string): string[] {
  const days: string[] = [];
  const cursor = new Date(`${startDate}T00:00:00.000Z`);
  const end = new Date(`${endDate}T00:00:00.000Z`);

  while (cursor.getTime() <= end.getTime()) {
    days.push(cursor.toISOString().slice(0, 10));
    cursor.setUTCDate(cursor.getUTCDate() + 1);
  }

  return days;
}

function cleanList(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const cleaned: string[] = [];
  for (const raw of values) {
    const value = raw.trim();
    if (value && !seen.has(value)) {
      seen.add(value);
      cleaned.push(value);
    }
  }
  return cleaned;
}

/**
 * Validates query input without throwing.
 *
 * Rules: codes and indicators non-empty after trimming (duplicates dropped,
 * order kept), dates real calendar dates, startDate <= endDate. A missing
 * endDate defaults to startDate.
 */
export function parseQuery(input: QueryInput): Result<Query, QueryValidationError> {
  if (!Object.values(QueryKind).includes(input.kind)) {
    return err(new QueryValidationError(`Unknown query kind: ${String(input.kind)}`, {
      field: 'kind',
      value: input.kind,
    }));
  }

  const codes = cleanList(input.codes);
  if (codes.length === 0) {
    return err(new QueryValidationError('Query requires at least one code', {
      field: 'codes',
      value: input.codes,
    }));
  }

  const indicators = cleanList(input.indicators);
  if (indicators.length === 0) {
    return err(new QueryValidationError('Query requires at least one indicator', {
      field: 'indicators',
      value: input.indicators,
    }));
  }

  const startDate = canonicalDate(input.startDate);
  if (!startDate) {
    return err(new QueryValidationError(`Invalid startDate: ${input.startDate}`, {
      field: 'startDate',
      value: input.startDate,
    }));
  }

  const rawEnd = input.endDate ?? input.startDate;
  const endDate = canonicalDate(rawEnd);
  if (!endDate) {
    return err(new QueryValidationError(`Invalid endDate: ${rawEnd}`, {
      field: 'endDate',
      value: rawEnd,
    }));
  }

  if (startDate > endDate) {
    return err(new QueryValidationError(`startDate ${startDate} is after endDate ${endDate}`, {
      field: 'startDate',
      value: startDate,
      endDate,
    }));
  }

  const query: Query = Object.freeze({
    codes: Object.freeze(codes),
    startDate,
    endDate,
    indicators: Object.freeze(indicators),
    kind: input.kind,
  });

  return ok(query);
}

/**
 * Builds an immutable query, throwing on invalid input.
 *
 * @throws {QueryValidationError} If any rule in parseQuery fails
 *
 * @example
 * ```typescript
 * const query = createQuery({
 *   codes: ['000001.SZ'],
 *   startDate: '2024-01-02',
 *   indicators: ['close'],
 *   kind: QueryKind.HistoryQuotes,
 * });
 * ```
 */
export function createQuery(input: QueryInput): Query {
  const result = parseQuery(input);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
