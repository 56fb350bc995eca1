/**
 * Command types and interfaces
 */

import type { FetchOutcome } from '@seatflow/contracts';
import type { Logger } from '@seatflow/logger';
import type { DataProviderAdapter, TargetTable } from '@seatflow/provider-ifind';

/**
 * Options shared by the fetch commands, as parsed by commander
 */
export interface CommandOptions {
  start?: string;
  end?: string;
  codes?: string[];
  indicators?: string[];
  market?: string;
  map?: boolean;
}

/**
 * What a command needs to run
 */
export interface CommandContext {
  adapter: DataProviderAdapter;
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * Base command interface
 */
export interface Command {
  name: string;
  description: string;
  aliases?: string[];
  /** Table the records are mapped onto under `--map` */
  table?: TargetTable;
  execute(args: string[], options: CommandOptions, context: CommandContext): Promise<FetchOutcome>;
}

/**
 * Command execution result
 */
export interface CommandResult {
  command: string;
  outcome: FetchOutcome;
  exitCode: number;
  duration: number;
}
