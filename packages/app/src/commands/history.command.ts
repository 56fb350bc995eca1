/**
 * History quotes command implementation
 */

import type { FetchOutcome } from '@seatflow/contracts';
import type { Command, CommandContext, CommandOptions } from './types.js';

/**
 * history <codes...> - daily quote series per instrument
 */
export class HistoryCommand implements Command {
  name = 'history';
  description = 'Fetch daily quote series for one or more instruments';
  aliases = ['quotes'];
  table = 'daily_quotes' as const;

  async execute(args: string[], options: CommandOptions, context: CommandContext): Promise<FetchOutcome> {
    context.logger.info('Executing history command', { codes: args, start: options.start, end: options.end });

    return context.adapter.fetchHistoryQuotes(
      {
        codes: [...args, ...(options.codes ?? [])],
        startDate: options.start ?? '',
        endDate: options.end,
        indicators: options.indicators,
      },
      { signal: context.signal }
    );
  }
}
