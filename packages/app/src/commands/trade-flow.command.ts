/**
 * Top-list trade flow command implementation
 */

import type { FetchOutcome } from '@seatflow/contracts';
import type { Command, CommandContext, CommandOptions } from './types.js';

/**
 * trade-flow - daily buy/sell totals of listed instruments
 */
export class TradeFlowCommand implements Command {
  name = 'trade-flow';
  description = 'Fetch daily top-list trade flow per instrument';
  aliases = ['flow'];
  table = 'trade_flow' as const;

  async execute(_args: string[], options: CommandOptions, context: CommandContext): Promise<FetchOutcome> {
    context.logger.info('Executing trade-flow command', { start: options.start, end: options.end });

    return context.adapter.fetchTradeFlow(
      {
        codes: options.codes,
        startDate: options.start ?? '',
        endDate: options.end,
        indicators: options.indicators,
      },
      { signal: context.signal }
    );
  }
}
