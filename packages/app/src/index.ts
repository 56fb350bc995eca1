/**
 * @fileoverview Composition root: configuration, runtime wiring and the
 * command-line program.
 *
 * @module @seatflow/app
 */

export { loadConfig, getConfigSummary } from './config/index.js';
export type { Config } from './config/index.js';
export { configSchema, envMapping } from './config/schema.js';
export { createRuntime, createTerminal } from './runtime.js';
export type { Runtime, RuntimeOverrides } from './runtime.js';
export { runCli, createProgram, VERSION } from './program.js';
export type { CliDependencies, OutputStream } from './program.js';
export { exitCodeFor, renderRecords } from './commands/output.js';
export type { RenderedOutcome } from './commands/output.js';
export type { Command, CommandContext, CommandOptions, CommandResult } from './commands/types.js';
