/**
 * @fileoverview Custom Winston formats for the seatflow logger
 * Secret redaction, standard fields, request ID injection and pretty output.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Field name patterns whose values never reach a log sink. Upstream terminal
 * credentials travel as password/secret and access or refresh tokens.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /pwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /credential/i,
];

const REDACTED = '[REDACTED]';

/** Fields owned by winston itself. */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveFieldName(name: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Returns a copy of `value` with every sensitive field replaced.
 *
 * @example
 * ```typescript
 * redactValue({ userId: 'u1', password: 'test-secret' });
 * // { userId: 'u1', password: '[REDACTED]' }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    copy[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(inner);
  }
  return copy;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Applied first in the chain so secrets never reach a transport.
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * Timestamp, error stacks and request_id from the active request context.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const requestId = getRequestId();
    if (requestId && !info['request_id']) {
      info['request_id'] = requestId;
    }
    return info;
  })()
);

/**
 * Human-readable output for development.
 *
 * @example
 * ```typescript
 * // [2024-01-02T09:30:00.000+08:00] info: Fetch finished component=adapter request_id=... count=5
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, operation, request_id, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (operation) context.push(`operation=${String(operation)}`);
    if (request_id) context.push(`request_id=${String(request_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (['level', 'message', 'timestamp', 'stack', 'splat'].includes(key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    if (typeof info['stack'] === 'string') {
      return `${baseMsg}\n${info['stack']}`;
    }

    return baseMsg;
  })
);
