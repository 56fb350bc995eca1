/**
 * @fileoverview Request context management using AsyncLocalStorage
 * Carries a request ID through every async hop of one CLI command or one
 * scheduler-triggered fetch, so all log lines of a run correlate.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  /** Unique request identifier (UUID v4) */
  request_id: string;

  [key: string]: unknown;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

export function generateRequestId(): string {
  return randomUUID();
}

export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

export function getRequestId(): string | undefined {
  return requestContextStorage.getStore()?.request_id;
}

/**
 * Runs `fn` inside a new request context.
 *
 * @param fn - Work to run
 * @param requestId - Request ID to use (a fresh UUID when omitted)
 * @param additionalContext - Extra fields visible through getRequestContext
 *
 * @example
 * ```typescript
 * await withRequestContext(async () => {
 *   logger.info('Fetching history'); // carries request_id
 *   await adapter.fetchHistoryQuotes(params);
 * });
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    ...additionalContext,
    request_id: requestId || generateRequestId(),
  };

  return requestContextStorage.run(context, fn);
}
