/**
 * @fileoverview Command-line program.
 *
 * Parses arguments with commander, loads configuration, wires one adapter
 * and runs a single fetch command. Records go to stdout as JSON lines;
 * logs and the human-readable summary go to stderr.
 */

import { Command as Program, CommanderError, Option } from 'commander';
import chalk from 'chalk';
import { isConfigurationError } from '@seatflow/contracts';
import {
  createLogger,
  measureAsync,
  withRequestContext,
  type Logger,
  type LogLevel,
} from '@seatflow/logger';
import { MARKETS, type Clock, type TargetTable, type UpstreamTerminal } from '@seatflow/provider-ifind';
import { getConfigSummary, loadConfig, type Config } from './config/index.js';
import { createRuntime, type Runtime } from './runtime.js';
import { HistoryCommand } from './commands/history.command.js';
import { InstrumentsCommand } from './commands/instruments.command.js';
import { SeatsCommand } from './commands/seats.command.js';
import { TradeFlowCommand } from './commands/trade-flow.command.js';
import { exitCodeFor, renderRecords } from './commands/output.js';
import type { Command, CommandOptions, CommandResult } from './commands/types.js';

export const VERSION = '0.1.0';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliDependencies {
  /** Environment to load configuration from (default process.env) */
  env?: NodeJS.ProcessEnv;
  stdout?: OutputStream;
  stderr?: OutputStream;
  /** Replaces the terminal the configuration selects */
  terminal?: UpstreamTerminal;
  clock?: Clock;
  logger?: Logger;
  signal?: AbortSignal;
  /** Called once the runtime is wired, before the command runs */
  onRuntime?: (runtime: Runtime, logger: Logger) => void;
}

type GlobalOptions = {
  fixtures?: string;
  logLevel?: LogLevel;
};

interface Io {
  stdout: OutputStream;
  stderr: OutputStream;
}

type Runner = (command: Command, args: string[], options: CommandOptions) => Promise<void>;

function splitList(value: string, previous: string[] = []): string[] {
  return [
    ...previous,
    ...value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  ];
}

function addRangeOptions(cmd: Program, table: TargetTable): Program {
  return cmd
    .requiredOption('-s, --start <date>', 'First trading day (YYYY-MM-DD or YYYYMMDD)')
    .option('-e, --end <date>', 'Last trading day (defaults to --start)')
    .option('-i, --indicators <list>', 'Comma-separated indicator names', splitList)
    .option('--map', `Map records onto the ${table} table`);
}

/**
 * Build the commander program. Each action hands off to `run`.
 */
export function createProgram(run: Runner, io: Io): Program {
  const program = new Program();

  program
    .name('seatflow')
    .description('Fetch top-list trade flow, seat detail and quotes from the iFinD terminal')
    .version(VERSION)
    .option('--fixtures <dir>', 'Answer from recorded responses in <dir> instead of the live API')
    .addOption(new Option('--log-level <level>', 'Minimum log level').choices(LOG_LEVELS))
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });

  const history = new HistoryCommand();
  addRangeOptions(
    program
      .command(history.name)
      .aliases(history.aliases)
      .description(history.description)
      .argument('<codes...>', 'Instrument codes, e.g. 000001.SZ'),
    history.table
  ).action((codes: string[], options: CommandOptions) => run(history, codes, options));

  const tradeFlow = new TradeFlowCommand();
  addRangeOptions(
    program
      .command(tradeFlow.name)
      .aliases(tradeFlow.aliases)
      .description(tradeFlow.description)
      .option('-c, --codes <list>', 'Comma-separated instrument codes (default: whole market)', splitList),
    tradeFlow.table
  ).action((options: CommandOptions) => run(tradeFlow, [], options));

  const seats = new SeatsCommand();
  addRangeOptions(
    program
      .command(seats.name)
      .description(seats.description)
      .option('-c, --codes <list>', 'Comma-separated instrument codes (default: whole market)', splitList),
    seats.table
  ).action((options: CommandOptions) => run(seats, [], options));

  const instruments = new InstrumentsCommand();
  program
    .command(instruments.name)
    .aliases(instruments.aliases)
    .description(instruments.description)
    .addOption(new Option('-m, --market <market>', 'Exchange to list').choices(MARKETS).default('all'))
    .action((options: CommandOptions) => run(instruments, [], options));

  return program;
}

/**
 * Run the CLI once and resolve to the process exit code.
 *
 * @example
 * ```typescript
 * process.exitCode = await runCli(['seats', '--start', '2024-01-02']);
 * ```
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const io: Io = {
    stdout: deps.stdout ?? process.stdout,
    stderr: deps.stderr ?? process.stderr,
  };
  let exitCode = 0;

  const program = createProgram(async (command, args, options) => {
    exitCode = await execute(command, args, options, program.opts<GlobalOptions>(), deps, io);
  }, io);

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 1;
    }
    throw error;
  }

  return exitCode;
}

function resolveEnv(globals: GlobalOptions, env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const resolved = { ...env };
  if (globals.fixtures) {
    resolved['THS_TERMINAL'] = 'fixture';
    resolved['THS_FIXTURE_PATH'] = globals.fixtures;
  }
  if (globals.logLevel) {
    resolved['LOG_LEVEL'] = globals.logLevel;
  }
  return resolved;
}

async function execute(
  command: Command,
  args: string[],
  options: CommandOptions,
  globals: GlobalOptions,
  deps: CliDependencies,
  io: Io
): Promise<number> {
  let config: Config;
  try {
    config = loadConfig(resolveEnv(globals, deps.env ?? process.env));
  } catch (error) {
    if (isConfigurationError(error)) {
      io.stderr.write(chalk.red(`✖ ${error.message}\n`));
      return 1;
    }
    throw error;
  }

  const logger =
    deps.logger ??
    createLogger({
      level: config.logging.level,
      json: config.logging.format === 'json',
      filePath: config.logging.filePath,
    });
  logger.debug('Configuration loaded', getConfigSummary(config));

  const runtime = createRuntime(config, logger, { terminal: deps.terminal, clock: deps.clock });
  deps.onRuntime?.(runtime, logger);

  try {
    return await withRequestContext(
      async () => {
        const { result: outcome, duration_ms } = await measureAsync(() =>
          command.execute(args, options, { adapter: runtime.adapter, logger, signal: deps.signal })
        );
        const result: CommandResult = {
          command: command.name,
          outcome,
          exitCode: exitCodeFor(outcome),
          duration: duration_ms,
        };

        report(result, options.map ? command.table : undefined, io, logger);
        return result.exitCode;
      },
      undefined,
      { command: command.name }
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Command failed', { operation: command.name, error: message });
    io.stderr.write(chalk.red(`✖ ${command.name} failed: ${message}\n`));
    return 2;
  } finally {
    await runtime.close();
  }
}

function report(result: CommandResult, table: TargetTable | undefined, io: Io, logger: Logger): void {
  const { outcome } = result;

  if (outcome.status === 'error') {
    logger.error('Fetch failed', {
      operation: result.command,
      error_code: outcome.error.kind,
      attempts: outcome.trace.length,
      duration_ms: result.duration,
    });
    io.stderr.write(chalk.red(`✖ ${result.command} failed (${outcome.error.kind}): ${outcome.error.message}\n`));
    return;
  }

  if (outcome.status === 'no_data') {
    logger.warn('No data', { operation: result.command, attempts: outcome.trace.length, result: 'no_data' });
    io.stderr.write(chalk.yellow(`⚠ ${result.command}: no data after ${outcome.trace.length} attempts\n`));
    return;
  }

  const { lines, unmatched } = renderRecords(outcome.records, table);
  for (const line of lines) {
    io.stdout.write(`${line}\n`);
  }

  if (unmatched.length > 0) {
    io.stderr.write(chalk.yellow(`⚠ Unmatched columns: ${unmatched.join(', ')}\n`));
  }
  io.stderr.write(
    chalk.green(`✔ ${result.command}: ${lines.length} records`) +
      chalk.dim(` (${Math.round(result.duration)}ms, ${outcome.trace.length} attempts)\n`)
  );
}
