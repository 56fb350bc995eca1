/**
 * Seat detail command implementation
 */

import type { FetchOutcome } from '@seatflow/contracts';
import type { Command, CommandContext, CommandOptions } from './types.js';

/**
 * seats - per-seat buy/sell amounts on the daily top list
 */
export class SeatsCommand implements Command {
  name = 'seats';
  description = 'Fetch per-seat detail of the daily top list';
  table = 'seat_daily' as const;

  async execute(_args: string[], options: CommandOptions, context: CommandContext): Promise<FetchOutcome> {
    context.logger.info('Executing seats command', { start: options.start, end: options.end });

    return context.adapter.fetchSeatDetail(
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
