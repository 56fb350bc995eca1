/**
 * @fileoverview Type definitions for the seatflow logger
 * Provides strongly-typed interfaces for logger configuration and usage.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Critical errors that require immediate attention
 * - 'warn': Warning conditions that should be reviewed
 * - 'info': Informational messages about normal operations
 * - 'debug': Detailed debugging information for development
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/ingest.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path for file transport, in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Suppress all output. Used by tests and library consumers that bring
   * their own logging.
   * @default false
   */
  silent?: boolean;
}

/**
 * Structured log entry with standard fields.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;

  /** Request correlation ID */
  request_id?: string;

  /** Component name (typically from child logger) */
  component?: string;

  /** Upstream operation or adapter method */
  operation?: string;

  /** Instrument code(s) being fetched */
  code?: string;

  /** Query kind */
  kind?: string;

  /** Fallback candidate description */
  shape?: string;

  /** Upstream status code */
  status_code?: number | null;

  duration_ms?: number;

  /** Operation result (e.g., "ok", "no_data", "error") */
  result?: string;

  error_code?: string;

  /** Number of rows or records */
  count?: number;

  [key: string]: unknown;
}

/**
 * Child logger context fields.
 *
 * @example
 * ```typescript
 * const sessionLogger = logger.child({ component: 'session' });
 * sessionLogger.info('Logged in'); // includes component=session
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  operation?: string;
  request_id?: string;
  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
