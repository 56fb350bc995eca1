/**
 * @fileoverview Error taxonomy for the seatflow ingestion system.
 *
 * Every error carries a machine-readable code, an optional structured data
 * payload and an ISO timestamp. Only the errors below ever reach callers of
 * the adapter, and then only wrapped inside a typed fetch outcome.
 *
 * @module @seatflow/contracts/errors
 */

/**
 * Base error class for all seatflow errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new SeatflowError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class SeatflowError extends Error {
  /** Machine-readable error code (e.g. 'QUERY_INVALID'). */
  readonly code: string;

  /** Structured context for debugging. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'SeatflowError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown (or returned inside a Result) when a query fails validation.
 * Raised before any network activity.
 */
export class QueryValidationError extends SeatflowError {
  constructor(
    message: string,
    data: {
      field: string;
      value?: unknown;
      [key: string]: unknown;
    }
  ) {
    super('QUERY_INVALID', message, data);
    this.name = 'QueryValidationError';
  }

  /** Name of the offending query field. */
  get field(): string {
    const field = this.data?.['field'];
    return typeof field === 'string' ? field : 'unknown';
  }
}

/**
 * Thrown when configuration values are missing or out of range.
 */
export class ConfigurationError extends SeatflowError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('CONFIGURATION_INVALID', message, data);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when no upstream session could be established after every login
 * retry was spent.
 */
export class SessionUnavailableError extends SeatflowError {
  constructor(
    message: string,
    data: {
      attempts: number;
      lastError: string | null;
      [key: string]: unknown;
    }
  ) {
    super('SESSION_UNAVAILABLE', message, data);
    this.name = 'SessionUnavailableError';
  }
}

/**
 * Thrown when a blocking wait (rate-limit slot, login backoff, candidate
 * resolution) is abandoned through an AbortSignal.
 */
export class OperationCancelledError extends SeatflowError {
  constructor(operation: string, reason?: unknown) {
    super('OPERATION_CANCELLED', `Operation cancelled: ${operation}`, {
      operation,
      reason: reason instanceof Error ? reason.message : reason,
    });
    this.name = 'OperationCancelledError';
  }
}

export function isSeatflowError(error: unknown): error is SeatflowError {
  return error instanceof SeatflowError;
}

export function isQueryValidationError(error: unknown): error is QueryValidationError {
  return error instanceof QueryValidationError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isSessionUnavailableError(error: unknown): error is SessionUnavailableError {
  return error instanceof SessionUnavailableError;
}

export function isOperationCancelledError(error: unknown): error is OperationCancelledError {
  return error instanceof OperationCancelledError;
}
