/**
 * @fileoverview Tests for the recorded-response terminal, and the adapter
 * running end to end on the bundled fixtures.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { DataProviderAdapter } from '../src/adapter.js';
import { FixtureTerminal } from '../src/upstream/fixture-terminal.js';
import { FakeClock } from './helpers/fake-clock.js';

const BUNDLED_FIXTURES = fileURLToPath(new URL('../__fixtures__', import.meta.url));

describe('FixtureTerminal', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'seatflow-fixtures-'));
    await writeFile(
      join(dir, 'history_quotes.json'),
      JSON.stringify([
        { match: ['000001.SZ', null, '', '2024-01-02'], response: [0, [{ close: 1 }]] },
        { match: ['600000.SH'], as: 'text', response: { errorcode: 0, tables: [] } },
        { match: ['600036.SH'], as: 'bytes', response: { errorcode: 0 } },
      ])
    );
    await writeFile(join(dir, 'data_pool.json'), JSON.stringify({ not: 'a list' }));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should answer with the first entry whose pattern matches', async () => {
    const terminal = new FixtureTerminal({ fixturePath: dir });

    expect(
      await terminal.invoke('history_quotes', '000001.SZ', 'close', '', '2024-01-02', '2024-01-05')
    ).toEqual([0, [{ close: 1 }]]);
  });

  it('should render text and byte responses', async () => {
    const terminal = new FixtureTerminal({ fixturePath: dir });

    expect(await terminal.invoke('history_quotes', '600000.SH')).toBe('{"errorcode":0,"tables":[]}');

    const bytes = await terminal.invoke('history_quotes', '600036.SH');
    expect(bytes).toBeInstanceOf(Uint8Array);
    expect(bytes).toEqual(new TextEncoder().encode('{"errorcode":0}'));
  });

  it('should throw when no entry matches', async () => {
    const terminal = new FixtureTerminal({ fixturePath: dir });

    await expect(terminal.invoke('history_quotes', '300750.SZ', 'close')).rejects.toThrow(
      'No history_quotes fixture matches [300750.SZ | close]'
    );
  });

  it('should throw for a missing or malformed fixture file', async () => {
    const terminal = new FixtureTerminal({ fixturePath: dir });

    await expect(terminal.invoke('basic_data', 'x')).rejects.toThrow(/^Failed to load fixture/);
    await expect(terminal.invoke('data_pool', 'block')).rejects.toThrow(/^Invalid fixture file/);
  });

  it('should report the configured login code', async () => {
    expect(await new FixtureTerminal({ fixturePath: dir, loginCode: -201 }).login()).toBe(-201);
  });
});

describe('DataProviderAdapter on bundled fixtures', () => {
  function adapter(): DataProviderAdapter {
    return new DataProviderAdapter({
      terminal: new FixtureTerminal({ fixturePath: BUNDLED_FIXTURES }),
      credentials: { userId: 'demo-user', password: 'test-secret' },
      clock: new FakeClock(Date.UTC(2024, 0, 2, 2, 0)),
    });
  }

  it('should fetch trade flow from a byte-encoded packed table', async () => {
    const outcome = await adapter().fetchTradeFlow({ startDate: '2024-01-02' });

    expect(outcome.status).toBe('ok');
    if (outcome.status !== 'ok') return;
    expect(outcome.records).toHaveLength(2);
    expect(outcome.records[1]).toEqual({
      ths_stock_short_name_stock: '平安银行',
      ths_stock_code_stock: '000001.SZ',
      ths_lhb_buy_amount_stock: 88100000,
      ths_lhb_sell_amount_stock: 120500000,
      ths_lhb_net_buy_amount_stock: -32400000,
      ths_lhb_turnover_ratio_stock: 1.05,
      ths_lhb_reason_stock: '日跌幅偏离值达7%',
      trade_date: '2024-01-02',
    });
    expect(outcome.trace).toHaveLength(1);
  });

  it('should split pipe-packed seats from a text response', async () => {
    const outcome = await adapter().fetchSeatDetail({ startDate: '20240102' });

    expect(outcome.status).toBe('ok');
    if (outcome.status !== 'ok') return;
    expect(outcome.records.map((record) => record['ths_lhb_seat_name_stock'])).toEqual([
      '机构专用',
      '示例证券上海分公司',
    ]);
    expect(outcome.records[1]?.['ths_lhb_sell_amount_seat_stock']).toBe('12500000');
  });

  it('should fetch a packed quote series', async () => {
    const outcome = await adapter().fetchHistoryQuotes({
      codes: ['000001.SZ'],
      startDate: '2024-01-02',
      endDate: '2024-01-08',
    });

    expect(outcome.status).toBe('ok');
    if (outcome.status !== 'ok') return;
    expect(outcome.records).toHaveLength(5);
    expect(outcome.records[4]).toEqual({
      thscode: '000001.SZ',
      time: '2024-01-08',
      open: 9.2,
      close: 9.15,
      volume: 771291,
      code: '000001.SZ',
    });
  });

  it('should list the instruments of one exchange', async () => {
    const outcome = await adapter().fetchInstrumentList('SSE');

    expect(outcome.status).toBe('ok');
    if (outcome.status !== 'ok') return;
    expect(outcome.records.map((record) => record['code'])).toEqual(['600000.SH', '600036.SH']);
  });

  it('should report no_data when every candidate comes back empty', async () => {
    const outcome = await adapter().fetchTradeFlow({ startDate: '2024-01-03' });

    expect(outcome.status).toBe('no_data');
    expect(outcome.trace).toHaveLength(9);
  });
});
