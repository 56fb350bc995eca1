/**
 * @fileoverview Global process handlers: uncaught errors, unhandled
 * rejections and termination signals.
 *
 * Errors are logged and the process exits with code 1; no attempt is made to
 * continue in a corrupted state. Termination signals run the registered
 * shutdown hook (the upstream logout) before exiting.
 */

import type { Logger } from './types.js';

/**
 * Time to wait for transports to flush before forcing exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

export interface GlobalHandlerOptions {
  /** Runs once on SIGINT/SIGTERM before exit. Failures are logged. */
  onShutdown?: () => Promise<void>;
  /** Exit code after a termination signal (default 0) */
  signalExitCode?: number;
}

let handlersAttached = false;

/**
 * Attaches process-level handlers. Safe to call more than once; later calls
 * are ignored with a warning.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger, { onShutdown: () => adapter.close() });
 * ```
 */
export function attachGlobalHandlers(logger: Logger, options: GlobalHandlerOptions = {}): void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: { name: error.name, message: error.message, stack: error.stack },
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    const errorInfo =
      reason instanceof Error
        ? { name: reason.name, message: reason.message, stack: reason.stack }
        : { message: String(reason) };

    logger.error('Unhandled promise rejection detected - process will exit', {
      error: errorInfo,
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  let shuttingDown = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Termination signal received', { event: signal });

    const hook = options.onShutdown ?? (() => Promise.resolve());
    hook()
      .catch((error: unknown) => {
        logger.error('Shutdown hook failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => gracefulExit(logger, options.signalExitCode ?? 0));
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  handlersAttached = true;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'SIGINT', 'SIGTERM'],
  });
}

/**
 * Ends the logger, then exits once transports finish or the flush timeout
 * elapses.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
