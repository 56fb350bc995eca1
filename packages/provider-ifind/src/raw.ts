/**
 * @fileoverview Boundary classification of upstream return values.
 *
 * classifyRaw is the only place that inspects the runtime type of an
 * upstream value. Everything downstream dispatches on RawResponse.kind.
 *
 * @module @seatflow/provider-ifind/raw
 */

import { setField } from '@seatflow/contracts';
import type { RawResponse } from '@seatflow/contracts';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Tags an upstream value with its shape.
 *
 * @example
 * ```typescript
 * classifyRaw([0, [{ close: 1 }]]); // { kind: 'tuple', items: [0, [{ close: 1 }]] }
 * classifyRaw(Buffer.from('{"errorcode":0}')); // { kind: 'bytes', data: ... }
 * ```
 */
export function classifyRaw(value: unknown): RawResponse {
  if (Array.isArray(value)) {
    return { kind: 'tuple', items: value };
  }
  if (value instanceof Uint8Array) {
    return { kind: 'bytes', data: value };
  }
  if (value instanceof ArrayBuffer) {
    return { kind: 'bytes', data: new Uint8Array(value) };
  }
  if (typeof value === 'string') {
    return { kind: 'text', text: value };
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return { kind: 'scalar', value };
  }
  if (value instanceof Map) {
    const entries: Record<string, unknown> = {};
    for (const [key, inner] of value) {
      setField(entries, String(key), inner);
    }
    return { kind: 'mapping', value: entries };
  }
  if (value instanceof Date) {
    return { kind: 'unrecognized', typeName: 'Date' };
  }
  if (isRecord(value)) {
    return { kind: 'mapping', value };
  }

  return { kind: 'unrecognized', typeName: value === null ? 'null' : typeof value };
}

/**
 * Short label of a raw response for attempt traces.
 */
export function describeRaw(raw: RawResponse): string {
  switch (raw.kind) {
    case 'tuple':
      return `tuple(${raw.items.length})`;
    case 'bytes':
      return `bytes(${raw.data.byteLength})`;
    case 'text':
      return 'text';
    case 'mapping':
      return 'mapping';
    case 'scalar':
      return typeof raw.value;
    case 'unrecognized':
      return raw.typeName;
  }
}
