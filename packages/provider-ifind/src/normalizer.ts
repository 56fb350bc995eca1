/**
 * @fileoverview Normalization of raw upstream responses into key-aligned rows.
 *
 * The upstream answers the same logical call with status/data tuples,
 * byte-encoded JSON (not always UTF-8), JSON text, or nested mappings whose
 * status and payload keys vary in name and case. normalize() is total over
 * RawResponse: it never throws, and an unusable response is `(null, [])`.
 *
 * @module @seatflow/provider-ifind/normalizer
 */

import { setField } from '@seatflow/contracts';
import type { FieldValue, NormalizedResponse, NormalizedRow, RawResponse } from '@seatflow/contracts';
import { classifyRaw, isRecord } from './raw.js';

/** Status keys recognized wherever they appear. */
export const STRONG_STATUS_KEYS = ['errorcode', 'error_code', 'errcode', 'retcode'] as const;

/** Status keys recognized only next to a data key, since records carry their own `code`. */
export const WEAK_STATUS_KEYS = ['code', 'return', 'ret', 'status', 'status_code'] as const;

/** Payload keys, in precedence order. */
export const DATA_KEYS = ['data', 'tables', 'table', 'rows', 'list', 'result', 'records', 'items'] as const;

/** Envelope keys dropped when a status-only mapping is turned into a row. */
const MESSAGE_KEYS = ['errmsg', 'error_msg', 'msg', 'message'];

/** Nesting below this depth is cut off and becomes null. */
export const MAX_FIELD_DEPTH = 64;

/** Strict decoders tried in order before the lenient UTF-8 pass. */
export const DECODER_CHAIN = ['utf-8', 'gb18030', 'gbk', 'big5'] as const;

function empty(): NormalizedResponse {
  return { statusCode: null, rows: [] };
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Decodes bytes with the first strict decoder that accepts them, falling back
 * to UTF-8 with undecodable sequences dropped.
 */
export function decodeBytes(data: Uint8Array): string {
  for (const encoding of DECODER_CHAIN) {
    let decoder: InstanceType<typeof TextDecoder>;
    try {
      decoder = new TextDecoder(encoding, { fatal: true });
    } catch {
      // Runtime built without this encoding
      continue;
    }
    try {
      return stripBom(decoder.decode(data));
    } catch {
      continue;
    }
  }

  return stripBom(new TextDecoder('utf-8').decode(data).replace(/\uFFFD/g, ''));
}

/**
 * Integer status from a number or an integer-looking string.
 */
export function coerceStatus(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : null;
  }
  if (typeof value === 'string' && /^\s*[-+]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

/**
 * Converts any upstream cell into a FieldValue. Containers nested deeper than
 * {@link MAX_FIELD_DEPTH} become null.
 */
export function toFieldValue(value: unknown, depth = 0): FieldValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return decodeBytes(value);
  }
  if (depth >= MAX_FIELD_DEPTH) {
    return null;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toFieldValue(item, depth + 1));
  }
  if (value instanceof Map) {
    const mapping: { [key: string]: FieldValue } = {};
    for (const [key, inner] of value) {
      setField(mapping, String(key), toFieldValue(inner, depth + 1));
    }
    return mapping;
  }
  if (isRecord(value)) {
    const mapping: { [key: string]: FieldValue } = {};
    for (const [key, inner] of Object.entries(value)) {
      setField(mapping, key, toFieldValue(inner, depth + 1));
    }
    return mapping;
  }
  return null;
}

/**
 * Gives every row the union of all keys, in first-seen order, with missing
 * fields set to null.
 */
export function alignRows(rows: readonly NormalizedRow[]): NormalizedRow[] {
  const keys: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        keys.push(key);
      }
    }
  }

  return rows.map((row) => {
    const aligned: NormalizedRow = {};
    for (const key of keys) {
      setField(aligned, key, Object.hasOwn(row, key) ? (row[key] ?? null) : null);
    }
    return aligned;
  });
}

function toRow(value: unknown): NormalizedRow {
  const field = toFieldValue(value);
  if (field !== null && typeof field === 'object' && !Array.isArray(field)) {
    return field;
  }
  return { value: field };
}

function rowsFromList(items: readonly unknown[]): NormalizedRow[] {
  return items.map((item) => toRow(item));
}

/**
 * Rows from a payload nested inside a tuple or an envelope mapping. A mapping
 * inside an envelope may itself be an envelope; inside a tuple it is a record.
 */
function payloadRows(payload: unknown, container: 'tuple' | 'envelope'): NormalizedRow[] {
  const raw = classifyRaw(payload);
  switch (raw.kind) {
    case 'tuple':
      return rowsFromList(raw.items);
    case 'bytes':
      return normalizeText(decodeBytes(raw.data)).rows;
    case 'text':
      return normalizeText(raw.text).rows;
    case 'mapping':
      return container === 'envelope' ? normalizeMapping(raw.value).rows : [toRow(raw.value)];
    case 'scalar':
      return [toRow(raw.value)];
    case 'unrecognized':
      return [];
  }
}

function normalizeTuple(items: readonly unknown[]): NormalizedResponse {
  if (items.length === 0) {
    return empty();
  }
  const [head, ...rest] = items;

  if (isRecord(head) || head instanceof Map) {
    return { statusCode: null, rows: rowsFromList(items) };
  }

  const statusCode = coerceStatus(head);
  if (statusCode === null) {
    return { statusCode: null, rows: rowsFromList(items) };
  }

  return { statusCode, rows: rest.length > 0 ? payloadRows(rest[0], 'tuple') : [] };
}

function normalizeText(text: string): NormalizedResponse {
  const trimmed = stripBom(text).trim();
  if (!trimmed) {
    return empty();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return empty();
  }

  if (Array.isArray(parsed)) {
    return { statusCode: null, rows: rowsFromList(parsed) };
  }
  if (isRecord(parsed)) {
    return normalizeMapping(parsed);
  }
  return empty();
}

function findKey(
  lowered: ReadonlyMap<string, string>,
  candidates: readonly string[]
): string | undefined {
  for (const candidate of candidates) {
    const key = lowered.get(candidate);
    if (key !== undefined) {
      return key;
    }
  }
  return undefined;
}

function normalizeMapping(value: Readonly<Record<string, unknown>>): NormalizedResponse {
  const keys = Object.keys(value);
  if (keys.length === 0) {
    return empty();
  }

  const lowered = new Map<string, string>();
  for (const key of keys) {
    const lower = key.toLowerCase();
    if (!lowered.has(lower)) {
      lowered.set(lower, key);
    }
  }

  const dataKey = findKey(lowered, DATA_KEYS);
  const strongStatusKey = findKey(lowered, STRONG_STATUS_KEYS);
  const statusKey =
    strongStatusKey ?? (dataKey !== undefined ? findKey(lowered, WEAK_STATUS_KEYS) : undefined);
  const statusCode = statusKey !== undefined ? coerceStatus(value[statusKey]) : null;

  if (dataKey !== undefined) {
    return { statusCode, rows: payloadRows(value[dataKey], 'envelope') };
  }

  if (strongStatusKey === undefined) {
    return { statusCode, rows: [toRow(value)] };
  }

  // Envelope without payload: keep whatever is left besides status and message
  const remainder: Record<string, unknown> = {};
  for (const key of keys) {
    if (key !== strongStatusKey && !MESSAGE_KEYS.includes(key.toLowerCase())) {
      setField(remainder, key, value[key]);
    }
  }
  return {
    statusCode,
    rows: Object.keys(remainder).length > 0 ? [toRow(remainder)] : [],
  };
}

/**
 * Normalizes one raw upstream response.
 *
 * @example
 * ```typescript
 * normalize(classifyRaw([0, [{ close: 1 }, { close: 2, open: 1 }]]));
 * // { statusCode: 0, rows: [{ close: 1, open: null }, { close: 2, open: 1 }] }
 * ```
 */
export function normalize(raw: RawResponse): NormalizedResponse {
  try {
    const result = normalizeRaw(raw);
    return { statusCode: result.statusCode, rows: alignRows(result.rows) };
  } catch {
    // Payloads the runtime cannot walk (e.g. nesting past the stack limit) count as unusable
    return empty();
  }
}

function normalizeRaw(raw: RawResponse): NormalizedResponse {
  switch (raw.kind) {
    case 'tuple':
      return normalizeTuple(raw.items);
    case 'bytes':
      return normalizeText(decodeBytes(raw.data));
    case 'text':
      return normalizeText(raw.text);
    case 'mapping':
      return normalizeMapping(raw.value);
    case 'scalar':
      return { statusCode: null, rows: [{ value: toFieldValue(raw.value) }] };
    case 'unrecognized':
      return empty();
  }
}
