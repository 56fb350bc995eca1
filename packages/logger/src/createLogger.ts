/**
 * @fileoverview Main logger factory for seatflow
 * Creates configured Winston logger instances with structured logging,
 * secret redaction, and flexible transport options.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactSecrets, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * Features:
 * - Structured logging with standard fields (timestamp, level, message)
 * - Redaction of credential-like fields (password, secret, tokens)
 * - Console and optional file transports
 * - JSON in production, pretty-print in development
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Ingest started', { kind: 'history_quotes' });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', filePath: './logs/ingest.log' });
 * const resolverLogger = logger.child({ component: 'resolver' });
 * resolverLogger.debug('Attempt finished', { shape: 'history_quotes[hyphenated]', count: 5 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    silent = false,
  } = config;

  // Order is important: redact first, then standard fields, then output format
  const logFormat = format.combine(redactSecrets(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        // Keep stdout free for JSON-lines data output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: logFormat,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent,
    // Process exit is handled explicitly in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * Creates a child logger with additional context fields.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * const limiterLogger = createChildLogger(logger, { component: 'rate-limiter' });
 * limiterLogger.warn('Rate limit reached'); // includes component=rate-limiter
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

/**
 * Logger that discards everything. Default for components constructed
 * without one.
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'error', console: false, silent: true });
}
