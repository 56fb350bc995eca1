/**
 * @fileoverview Tests for raw classification and response normalization.
 */

import { describe, it, expect } from 'vitest';
import { classifyRaw, describeRaw } from '../src/raw.js';
import { coerceStatus, decodeBytes, MAX_FIELD_DEPTH, normalize, toFieldValue } from '../src/normalizer.js';

function normalizeValue(value: unknown) {
  return normalize(classifyRaw(value));
}

/** "平安银行" in GBK, which is not valid UTF-8 */
const GBK_NAME = [0xc6, 0xbd, 0xb0, 0xb2, 0xd2, 0xf8, 0xd0, 0xd0];

function nestedArrays(levels: number, innermost: unknown): unknown {
  let value = innermost;
  for (let i = 0; i < levels; i++) {
    value = [value];
  }
  return value;
}

function asciiBytes(text: string): number[] {
  return Array.from(text, (char) => char.charCodeAt(0));
}

describe('classifyRaw', () => {
  it('should tag each runtime shape', () => {
    expect(classifyRaw([1, 2]).kind).toBe('tuple');
    expect(classifyRaw(new Uint8Array([1])).kind).toBe('bytes');
    expect(classifyRaw(new ArrayBuffer(2)).kind).toBe('bytes');
    expect(classifyRaw('{}').kind).toBe('text');
    expect(classifyRaw(3).kind).toBe('scalar');
    expect(classifyRaw({ a: 1 }).kind).toBe('mapping');
    expect(classifyRaw(new Map([['a', 1]]))).toEqual({ kind: 'mapping', value: { a: 1 } });
    expect(classifyRaw(null)).toEqual({ kind: 'unrecognized', typeName: 'null' });
    expect(classifyRaw(undefined)).toEqual({ kind: 'unrecognized', typeName: 'undefined' });
    expect(classifyRaw(new Date(0))).toEqual({ kind: 'unrecognized', typeName: 'Date' });
  });

  it('should describe responses for traces', () => {
    expect(describeRaw(classifyRaw([0, []]))).toBe('tuple(2)');
    expect(describeRaw(classifyRaw(new Uint8Array(5)))).toBe('bytes(5)');
    expect(describeRaw(classifyRaw('x'))).toBe('text');
    expect(describeRaw(classifyRaw({}))).toBe('mapping');
    expect(describeRaw(classifyRaw(1))).toBe('number');
    expect(describeRaw(classifyRaw(() => 1))).toBe('function');
  });
});

describe('coerceStatus', () => {
  it('should accept integers and integer strings only', () => {
    expect(coerceStatus(0)).toBe(0);
    expect(coerceStatus(' -1010 ')).toBe(-1010);
    expect(coerceStatus(1.5)).toBeNull();
    expect(coerceStatus('ok')).toBeNull();
    expect(coerceStatus(null)).toBeNull();
  });
});

describe('toFieldValue', () => {
  it('should map non-finite numbers to null and stringify unsafe bigints', () => {
    expect(toFieldValue(Number.NaN)).toBeNull();
    expect(toFieldValue(12n)).toBe(12);
    expect(toFieldValue(2n ** 64n)).toBe('18446744073709551616');
    expect(toFieldValue(new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00.000Z');
  });

  it('should keep shallow nesting intact', () => {
    expect(toFieldValue(nestedArrays(3, { x: 'y' }))).toEqual([[[{ x: 'y' }]]]);
  });

  it('should cut containers nested past the depth limit to null', () => {
    let value = toFieldValue(nestedArrays(MAX_FIELD_DEPTH + 20, 'x'));
    let levels = 0;
    while (Array.isArray(value)) {
      levels++;
      value = value[0] ?? null;
    }

    expect(levels).toBe(MAX_FIELD_DEPTH);
    expect(value).toBeNull();
  });

  it('should keep a __proto__ key as an own field', () => {
    const field = toFieldValue(JSON.parse('{"__proto__":{"x":1},"close":1}'));

    expect(Object.keys(field ?? {})).toEqual(['__proto__', 'close']);
    expect(Object.getPrototypeOf(field)).toBe(Object.prototype);
  });
});

describe('decodeBytes', () => {
  it('should strip a UTF-8 byte order mark', () => {
    expect(decodeBytes(new Uint8Array([0xef, 0xbb, 0xbf, ...asciiBytes('ok')]))).toBe('ok');
  });

  it('should fall back to GB18030 for GBK-encoded text', () => {
    expect(decodeBytes(new Uint8Array(GBK_NAME))).toBe('平安银行');
  });

  it('should drop undecodable sequences when no strict decoder accepts the bytes', () => {
    const bytes = new Uint8Array([...asciiBytes('{"a":"'), 0xff, ...asciiBytes('b"}')]);
    expect(decodeBytes(bytes)).toBe('{"a":"b"}');
  });
});

describe('normalize', () => {
  describe('tuples', () => {
    it('should split a status/data tuple and align row keys', () => {
      expect(normalizeValue([0, [{ a: 1 }, { b: 2 }]])).toEqual({
        statusCode: 0,
        rows: [
          { a: 1, b: null },
          { a: null, b: 2 },
        ],
      });
    });

    it('should coerce a string status and keep a mapping payload as one row', () => {
      expect(normalizeValue(['0', { thscode: 'X', close: [1, 2] }])).toEqual({
        statusCode: 0,
        rows: [{ thscode: 'X', close: [1, 2] }],
      });
    });

    it('should treat a list of mappings as rows without status', () => {
      expect(normalizeValue([{ a: 1 }, { a: 2 }])).toEqual({
        statusCode: null,
        rows: [{ a: 1 }, { a: 2 }],
      });
    });

    it('should return the status alone for a one-element tuple', () => {
      expect(normalizeValue([-1010])).toEqual({ statusCode: -1010, rows: [] });
    });

    it('should decode a text payload inside a tuple', () => {
      expect(normalizeValue([0, '[{"a":1}]'])).toEqual({ statusCode: 0, rows: [{ a: 1 }] });
    });

    it('should wrap scalar items when the head is not a status', () => {
      expect(normalizeValue(['x', 'y'])).toEqual({
        statusCode: null,
        rows: [{ value: 'x' }, { value: 'y' }],
      });
    });

    it('should return an empty result for an empty tuple', () => {
      expect(normalizeValue([])).toEqual({ statusCode: null, rows: [] });
    });
  });

  describe('bytes and text', () => {
    it('should parse BOM-prefixed UTF-8 JSON envelopes', () => {
      const bytes = new TextEncoder().encode(
        '\uFEFF{"errorcode":0,"tables":[{"thscode":"000001.SZ"}]}'
      );
      expect(normalizeValue(bytes)).toEqual({ statusCode: 0, rows: [{ thscode: '000001.SZ' }] });
    });

    it('should parse GBK-encoded JSON', () => {
      const bytes = new Uint8Array([...asciiBytes('{"name":"'), ...GBK_NAME, ...asciiBytes('"}')]);
      expect(normalizeValue(bytes)).toEqual({ statusCode: null, rows: [{ name: '平安银行' }] });
    });

    it('should coerce a string status in a JSON envelope', () => {
      expect(normalizeValue('{"errcode":"0","data":[{"x":1}]}')).toEqual({
        statusCode: 0,
        rows: [{ x: 1 }],
      });
    });

    it('should return an empty result for unparseable, blank or scalar text', () => {
      expect(normalizeValue('not json')).toEqual({ statusCode: null, rows: [] });
      expect(normalizeValue('   ')).toEqual({ statusCode: null, rows: [] });
      expect(normalizeValue('42')).toEqual({ statusCode: null, rows: [] });
    });

    it('should treat a JSON array as rows', () => {
      expect(normalizeValue('[{"a":1},{"a":2}]')).toEqual({
        statusCode: null,
        rows: [{ a: 1 }, { a: 2 }],
      });
    });
  });

  describe('mappings', () => {
    it('should use a weak status key only next to a data key', () => {
      expect(normalizeValue({ code: 0, data: [{ close: 1 }] })).toEqual({
        statusCode: 0,
        rows: [{ close: 1 }],
      });
      expect(normalizeValue({ code: '000001.SZ', close: 1 })).toEqual({
        statusCode: null,
        rows: [{ code: '000001.SZ', close: 1 }],
      });
    });

    it('should match envelope keys case-insensitively', () => {
      expect(normalizeValue({ ErrorCode: -1302, Tables: [] })).toEqual({
        statusCode: -1302,
        rows: [],
      });
    });

    it('should yield no rows for a status-only envelope', () => {
      expect(normalizeValue({ errorcode: -1010, errmsg: 'session expired' })).toEqual({
        statusCode: -1010,
        rows: [],
      });
    });

    it('should keep non-envelope fields next to a strong status key', () => {
      expect(normalizeValue({ errorcode: 0, thscode: 'X' })).toEqual({
        statusCode: 0,
        rows: [{ thscode: 'X' }],
      });
    });

    it('should unwrap nested envelopes', () => {
      expect(normalizeValue({ errorcode: 0, data: { errorcode: 0, tables: [{ a: 1 }] } })).toEqual({
        statusCode: 0,
        rows: [{ a: 1 }],
      });
    });

    it('should keep a __proto__ column through alignment', () => {
      const response = normalizeValue('{"errorcode":0,"data":[{"__proto__":{"x":1},"close":1},{"close":2}]}');

      expect(response.statusCode).toBe(0);
      expect(response.rows.map((row) => Object.keys(row))).toEqual([
        ['__proto__', 'close'],
        ['__proto__', 'close'],
      ]);
      expect(Object.getOwnPropertyDescriptor(response.rows[0], '__proto__')?.value).toEqual({ x: 1 });
      expect(Object.getOwnPropertyDescriptor(response.rows[1], '__proto__')?.value).toBeNull();
    });

    it('should accept Map responses', () => {
      const response = new Map<string, unknown>([
        ['errorcode', 0],
        ['tables', [{ a: 1 }]],
      ]);
      expect(normalizeValue(response)).toEqual({ statusCode: 0, rows: [{ a: 1 }] });
    });
  });

  describe('scalars and unrecognized values', () => {
    it('should wrap scalars in a single value row', () => {
      expect(normalizeValue(42)).toEqual({ statusCode: null, rows: [{ value: 42 }] });
      expect(normalizeValue(true)).toEqual({ statusCode: null, rows: [{ value: true }] });
      expect(normalizeValue(10n)).toEqual({ statusCode: null, rows: [{ value: 10 }] });
    });

    it('should not throw on payloads nested deeper than the stack allows', () => {
      const deepCell = '{"data":[{"a":' + '['.repeat(20000) + ']'.repeat(20000) + '}]}';
      const deepEnvelope = '{"data":'.repeat(20000) + '[]' + '}'.repeat(20000);

      expect(normalizeValue(deepCell).statusCode).toBeNull();
      expect(normalizeValue(deepEnvelope)).toEqual({ statusCode: null, rows: [] });
    });

    it('should return an empty result for anything else', () => {
      for (const value of [null, undefined, () => 1, Symbol('x'), new Date(0)]) {
        expect(normalizeValue(value)).toEqual({ statusCode: null, rows: [] });
      }
    });
  });
});
