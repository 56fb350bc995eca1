/**
 * @fileoverview Upstream terminal that replays recorded responses.
 *
 * Fixtures live in one JSON file per operation (`data_pool.json`, ...), each
 * an ordered list of entries. The first entry whose `match` agrees with the
 * call parameters answers it; `null` in `match` accepts any value at that
 * position. `as` controls how the recorded response is handed back, so the
 * byte and text paths of the normalizer can be replayed too.
 *
 * @module @seatflow/provider-ifind/upstream/fixture-terminal
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { createSilentLogger, type Logger } from '@seatflow/logger';
import type { UpstreamOperation, UpstreamTerminal } from './types.js';

const fixtureEntrySchema = z.object({
  match: z.array(z.string().nullable()).optional(),
  as: z.enum(['value', 'text', 'bytes']).default('value'),
  response: z.unknown(),
});

const fixtureFileSchema = z.array(fixtureEntrySchema);

export type FixtureEntry = z.infer<typeof fixtureEntrySchema>;

export interface FixtureTerminalOptions {
  /** Directory holding `<operation>.json` files */
  fixturePath: string;
  /** Status returned by login (default 0) */
  loginCode?: number;
  logger?: Logger;
}

function matches(entry: FixtureEntry, params: readonly string[]): boolean {
  if (!entry.match) {
    return true;
  }
  return entry.match.every((expected, index) => expected === null || params[index] === expected);
}

function render(entry: FixtureEntry): unknown {
  switch (entry.as) {
    case 'value':
      return entry.response;
    case 'text':
      return JSON.stringify(entry.response);
    case 'bytes':
      return new TextEncoder().encode(JSON.stringify(entry.response));
  }
}

export class FixtureTerminal implements UpstreamTerminal {
  private readonly fixturePath: string;
  private readonly loginCode: number;
  private readonly logger: Logger;
  private readonly cache = new Map<UpstreamOperation, FixtureEntry[]>();

  constructor(options: FixtureTerminalOptions) {
    this.fixturePath = options.fixturePath;
    this.loginCode = options.loginCode ?? 0;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'fixture-terminal' });
  }

  async login(): Promise<number> {
    return this.loginCode;
  }

  async logout(): Promise<void> {
    this.logger.debug('Fixture session closed');
  }

  /**
   * @throws {Error} When no fixture file or entry answers the call
   */
  async invoke(operation: UpstreamOperation, ...params: string[]): Promise<unknown> {
    const entries = await this.load(operation);
    const entry = entries.find((candidate) => matches(candidate, params));

    if (!entry) {
      throw new Error(`No ${operation} fixture matches [${params.join(' | ')}]`);
    }

    return render(entry);
  }

  private async load(operation: UpstreamOperation): Promise<FixtureEntry[]> {
    const cached = this.cache.get(operation);
    if (cached) {
      return cached;
    }

    const file = join(this.fixturePath, `${operation}.json`);
    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (error) {
      throw new Error(
        `Failed to load fixture: ${file}. ` +
          `Error: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed = fixtureFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Invalid fixture file ${file}: ${parsed.error.message}`);
    }

    this.logger.debug('Fixture loaded', { operation, entries: parsed.data.length });
    this.cache.set(operation, parsed.data);
    return parsed.data;
  }
}
