/**
 * Instrument list command implementation
 */

import type { FetchOutcome } from '@seatflow/contracts';
import { isMarket } from '@seatflow/provider-ifind';
import type { Command, CommandContext, CommandOptions } from './types.js';

/**
 * instruments - listed codes of one exchange, or of both
 */
export class InstrumentsCommand implements Command {
  name = 'instruments';
  description = 'List instrument codes by market';
  aliases = ['list'];

  async execute(_args: string[], options: CommandOptions, context: CommandContext): Promise<FetchOutcome> {
    const market = options.market ?? 'all';
    if (!isMarket(market)) {
      return {
        status: 'error',
        error: { kind: 'invalid_query', message: `Unknown market: ${market}` },
        trace: [],
      };
    }

    context.logger.info('Executing instruments command', { market });
    return context.adapter.fetchInstrumentList(market, { signal: context.signal });
  }
}
