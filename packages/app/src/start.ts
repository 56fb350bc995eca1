/**
 * Main application entry point
 * Runs one CLI command and sets the process exit code
 */

// Load environment variables from .env file
import 'dotenv/config';

import { attachGlobalHandlers } from '@seatflow/logger';
import { runCli } from './program.js';

/**
 * Main startup function
 */
async function start(): Promise<void> {
  const controller = new AbortController();

  process.exitCode = await runCli(process.argv.slice(2), {
    signal: controller.signal,
    onRuntime: (runtime, logger) => {
      // Ctrl-C cancels in-flight waits, then logs out before exiting
      attachGlobalHandlers(logger, {
        onShutdown: async () => {
          controller.abort(new Error('Interrupted'));
          await runtime.close();
        },
        signalExitCode: 130,
      });
    },
  });
}

start().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exitCode = 2;
});
