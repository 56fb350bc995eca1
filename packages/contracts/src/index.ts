/**
 * @fileoverview Main entry point for @seatflow/contracts package.
 *
 * Exports the ingestion types, query construction helpers, the Result type
 * and the error taxonomy shared by every seatflow package.
 *
 * @module @seatflow/contracts
 */

// Ingestion types
export { QueryKind, isScalar, isFieldMapping, setField } from './ingest.js';
export type {
  Query,
  QueryInput,
  Scalar,
  FieldValue,
  NormalizedRow,
  FlattenedRecord,
  RawResponse,
  RawResponseKind,
  NormalizedResponse,
  SessionPhase,
  SessionState,
  AttemptTrace,
  FetchErrorKind,
  FetchOutcome,
} from './ingest.js';

// Query construction
export { createQuery, parseQuery, canonicalDate, compactDate, eachDay } from './query.js';

// Result type
export { ok, err } from './result.js';
export type { Ok, Err, Result } from './result.js';

// Error classes and guards
export {
  SeatflowError,
  QueryValidationError,
  ConfigurationError,
  SessionUnavailableError,
  OperationCancelledError,
  isSeatflowError,
  isQueryValidationError,
  isConfigurationError,
  isSessionUnavailableError,
  isOperationCancelledError,
} from './errors.js';
