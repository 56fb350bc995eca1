/**
 * @fileoverview Public API exports for @seatflow/logger
 * Structured logging and process error handling for seatflow
 */

// Core logger creation
export { createLogger, createChildLogger, createSilentLogger } from './createLogger.js';

// Redaction helpers
export { redactValue, isSensitiveFieldName } from './formats.js';

// Global error handlers
export { attachGlobalHandlers } from './errorHandler.js';
export type { GlobalHandlerOptions } from './errorHandler.js';

// Request context management
export {
  generateRequestId,
  getRequestContext,
  getRequestId,
  withRequestContext,
} from './request-context.js';

// Performance timing utilities
export { startTimer, measureAsync } from './perf-timer.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, LogEntry, ChildLoggerContext } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
