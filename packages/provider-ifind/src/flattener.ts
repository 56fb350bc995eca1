/**
 * @fileoverview Expansion of packed rows into one record per reporting unit.
 *
 * A packed row holds a whole time series as parallel arrays (and sometimes
 * an inner table of further arrays). Flattening turns it into one record per
 * index, broadcasting scalars. Rows without arrays or nested mappings pass
 * through unchanged, so flattening is idempotent.
 *
 * @module @seatflow/provider-ifind/flattener
 */

import { isFieldMapping, isScalar, setField } from '@seatflow/contracts';
import type { FieldValue, FlattenedRecord, NormalizedRow, Scalar } from '@seatflow/contracts';

function toScalar(value: FieldValue | undefined): Scalar {
  if (value === undefined) {
    return null;
  }
  return isScalar(value) ? value : JSON.stringify(value);
}

/**
 * Flattens one normalized row.
 *
 * Arrays are indexed up to the longest one, shorter arrays padding with null.
 * Nested mappings are flattened recursively and merged into each record, their
 * fields overriding same-named outer fields; a nested mapping that yields a
 * single record is broadcast. When every array is empty the row still yields
 * one record with those fields null.
 *
 * @example
 * ```typescript
 * flatten({ code: 'X', time: ['t1', 't2'], close: [1, 2] });
 * // [{ code: 'X', time: 't1', close: 1 }, { code: 'X', time: 't2', close: 2 }]
 * ```
 */
export function flatten(row: NormalizedRow): FlattenedRecord[] {
  const entries = Object.entries(row);
  const arrayLengths: number[] = [];
  const innerTables: FlattenedRecord[][] = [];

  for (const [, value] of entries) {
    if (Array.isArray(value)) {
      arrayLengths.push(value.length);
    } else if (isFieldMapping(value)) {
      innerTables.push(flatten(value));
    }
  }

  if (arrayLengths.length === 0 && innerTables.length === 0) {
    const record: FlattenedRecord = {};
    for (const [key, value] of entries) {
      setField(record, key, toScalar(value));
    }
    return [record];
  }

  const innerLengths = innerTables.map((table) => table.length);
  const length = Math.max(1, ...arrayLengths, ...innerLengths);
  const records: FlattenedRecord[] = [];

  for (let index = 0; index < length; index++) {
    const record: FlattenedRecord = {};

    for (const [key, value] of entries) {
      if (Array.isArray(value)) {
        setField(record, key, toScalar(value[index]));
      } else if (!isFieldMapping(value)) {
        setField(record, key, value);
      }
    }

    for (const table of innerTables) {
      for (const [key, value] of Object.entries(innerRecordAt(table, index))) {
        setField(record, key, value);
      }
    }

    records.push(record);
  }

  return records;
}

function innerRecordAt(table: readonly FlattenedRecord[], index: number): FlattenedRecord {
  const [first] = table;
  if (first === undefined) {
    return {};
  }
  if (table.length === 1) {
    return first;
  }

  const record = table[index];
  if (record !== undefined) {
    return record;
  }

  const padding: FlattenedRecord = {};
  for (const key of Object.keys(first)) {
    setField(padding, key, null);
  }
  return padding;
}

/**
 * Flattens every row and concatenates the results in order.
 */
export function flattenRows(rows: readonly NormalizedRow[]): FlattenedRecord[] {
  return rows.flatMap((row) => flatten(row));
}

/**
 * Splits delimiter-packed string cells into parallel arrays so that
 * {@link flatten} yields one record per packed entry. Used for seat detail,
 * where one instrument row lists several seats joined by `|`.
 *
 * @example
 * ```typescript
 * unpackDelimited({ code: 'X', seat: 'A|B' }, ['seat']);
 * // { code: 'X', seat: ['A', 'B'] }
 * ```
 */
export function unpackDelimited(
  row: NormalizedRow,
  fields: readonly string[],
  delimiter = '|'
): NormalizedRow {
  const unpacked: NormalizedRow = { ...row };

  for (const field of fields) {
    const value = Object.hasOwn(row, field) ? row[field] : undefined;
    if (typeof value === 'string' && value.includes(delimiter)) {
      setField(unpacked, field, value.split(delimiter).map((part) => part.trim()));
    } else if (Array.isArray(value)) {
      setField(
        unpacked,
        field,
        value.flatMap((item) =>
          typeof item === 'string' && item.includes(delimiter)
            ? item.split(delimiter).map((part) => part.trim())
            : [item]
        )
      );
    }
  }

  return unpacked;
}
