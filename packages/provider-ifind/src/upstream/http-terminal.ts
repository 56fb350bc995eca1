/**
 * @fileoverview Upstream terminal over the iFinD HTTP quote API.
 *
 * Login exchanges the account's refresh token for an access token; every
 * query is a POST whose body is returned untouched as bytes, so the
 * normalizer sees exactly what the server sent.
 *
 * @module @seatflow/provider-ifind/upstream/http-terminal
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { createSilentLogger, type Logger } from '@seatflow/logger';
import { INSTRUMENT_REPORT } from '../indicators.js';
import type { UpstreamOperation, UpstreamTerminal } from './types.js';

export const IFIND_BASE_URL = 'https://quantapi.51ifind.com/api/v1';

const ENDPOINTS: Record<UpstreamOperation, string> = {
  instrument_list: '/data_pool',
  data_pool: '/data_pool',
  history_quotes: '/cmd_history_quotation',
  basic_data: '/basic_data_service',
};

const tokenResponseSchema = z.object({
  errorcode: z.coerce.number().int(),
  errmsg: z.string().optional(),
  data: z.object({ access_token: z.string().optional() }).passthrough().nullish(),
});

export interface HttpTerminalOptions {
  baseUrl?: string;
  /** Request timeout in ms (default 30000) */
  timeout?: number;
  httpClient?: AxiosInstance;
  logger?: Logger;
}

/**
 * Parses `key:value;key2:value2` parameter strings into an object.
 *
 * @example
 * ```typescript
 * parseParamString('date:20240102;exchange:SSE'); // { date: '20240102', exchange: 'SSE' }
 * ```
 */
export function parseParamString(input: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const part of input.split(/[;,]/)) {
    const separator = part.indexOf(':');
    if (separator <= 0) {
      continue;
    }
    const key = part.slice(0, separator).trim();
    if (key) {
      result[key] = part.slice(separator + 1).trim();
    }
  }
  return result;
}

function toBytes(data: unknown): Uint8Array {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  if (typeof data === 'string') {
    return new TextEncoder().encode(data);
  }
  return new TextEncoder().encode(JSON.stringify(data ?? null));
}

function splitList(value: string | undefined, separator: RegExp): string[] {
  return (value ?? '')
    .split(separator)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export class HttpTerminal implements UpstreamTerminal {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private accessToken: string | null = null;

  constructor(options: HttpTerminalOptions = {}) {
    this.http =
      options.httpClient ??
      axios.create({ baseURL: options.baseUrl ?? IFIND_BASE_URL, timeout: options.timeout ?? 30_000 });
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'http-terminal' });
  }

  /**
   * The user ID is informational; the secret is the account's refresh token.
   */
  async login(userId: string, secret: string): Promise<number> {
    const response = await this.http.post<unknown>('/get_access_token', null, {
      headers: { 'Content-Type': 'application/json', refresh_token: secret },
    });

    const parsed = tokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`Unexpected token response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const { errorcode, errmsg } = parsed.data;
    if (errorcode !== 0) {
      this.logger.warn('Token request rejected', { user_id: userId, status_code: errorcode, errmsg });
      return errorcode;
    }

    const token = parsed.data.data?.access_token;
    if (!token) {
      throw new Error('Token response carried no access_token');
    }
    this.accessToken = token;
    this.logger.debug('Access token issued', { user_id: userId });
    return errorcode;
  }

  async logout(): Promise<void> {
    this.accessToken = null;
  }

  async invoke(operation: UpstreamOperation, ...params: string[]): Promise<unknown> {
    const response = await this.http.post<unknown>(ENDPOINTS[operation], this.buildBody(operation, params), {
      headers: {
        'Content-Type': 'application/json',
        ...(this.accessToken ? { access_token: this.accessToken } : {}),
      },
      responseType: 'arraybuffer',
    });

    return toBytes(response.data);
  }

  private buildBody(operation: UpstreamOperation, params: readonly string[]): Record<string, unknown> {
    switch (operation) {
      case 'instrument_list': {
        const [date, filter, fields] = params;
        return {
          reportname: INSTRUMENT_REPORT,
          functionpara: { date: date ?? '', ...parseParamString(filter ?? '') },
          outputpara: fields ?? '',
        };
      }
      case 'data_pool': {
        const [reportName, date, filter, fields] = params;
        return {
          reportname: reportName ?? '',
          functionpara: { date: date ?? '', ...parseParamString(filter ?? '') },
          outputpara: fields ?? '',
        };
      }
      case 'history_quotes': {
        const [codes, indicators, options, startDate, endDate] = params;
        return {
          codes: codes ?? '',
          indicators: indicators ?? '',
          startdate: startDate ?? '',
          enddate: endDate ?? '',
          functionpara: parseParamString(options ?? ''),
        };
      }
      case 'basic_data': {
        const [codes, indicators, indiparams] = params;
        return {
          codes: codes ?? '',
          indipara: splitList(indicators, /[;,]/).map((indicator) => ({
            indicator,
            indiparams: splitList(indiparams, /,/),
          })),
        };
      }
    }
  }
}
