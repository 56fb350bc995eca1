/**
 * @fileoverview Builders for ordered fallback candidates.
 *
 * The upstream accepts dates and filter strings in more than one rendering,
 * and which one a report honours varies. Each builder returns the cartesian
 * product of the variants in the order they should be tried, most common
 * first.
 *
 * @module @seatflow/provider-ifind/candidates
 */

import { compactDate } from '@seatflow/contracts';
import type { DateFormat, InvocationShape, Market } from './types.js';

export const DATE_FORMATS: readonly DateFormat[] = ['hyphenated', 'compact', 'empty'];

/** `null` is the unqualified filter. */
export const EXCHANGE_FILTERS: readonly (Exclude<Market, 'all'> | null)[] = [null, 'SSE', 'SZSE'];

/**
 * Renders a YYYY-MM-DD date in the given format.
 */
export function formatDate(date: string, format: DateFormat): string {
  switch (format) {
    case 'hyphenated':
      return date;
    case 'compact':
      return compactDate(date);
    case 'empty':
      return '';
  }
}

/**
 * Trading date (YYYY-MM-DD) in exchange time, UTC+8.
 */
export function exchangeDate(epochMs: number): string {
  return new Date(epochMs + 8 * 60 * 60 * 1000).toISOString().slice(0, 10);
}

function dateFilter(date: string, exchange: string | null): string {
  return exchange ? `date:${date};exchange:${exchange}` : `date:${date}`;
}

export interface DataPoolCandidateParams {
  reportName: string;
  /** YYYY-MM-DD */
  date: string;
  fields: readonly string[];
  dateFormats?: readonly DateFormat[];
  exchanges?: readonly (string | null)[];
}

/**
 * Data-pool variants: date parameter format × exchange qualifier. The filter
 * date follows the parameter's format, hyphenated when the parameter is blank.
 */
export function dataPoolCandidates(params: DataPoolCandidateParams): InvocationShape[] {
  const { reportName, date, fields } = params;
  const dateFormats = params.dateFormats ?? DATE_FORMATS;
  const exchanges = params.exchanges ?? EXCHANGE_FILTERS;
  const candidates: InvocationShape[] = [];

  for (const format of dateFormats) {
    const filterDate = formatDate(date, format === 'empty' ? 'hyphenated' : format);
    for (const exchange of exchanges) {
      candidates.push({
        operation: 'data_pool',
        params: [reportName, formatDate(date, format), dateFilter(filterDate, exchange), fields.join(',')],
        description: `data_pool[${reportName}; date=${format}; exchange=${exchange ?? 'any'}]`,
      });
    }
  }

  return candidates;
}

export interface BasicDataCandidateParams {
  codes: readonly string[];
  date: string;
  indicators: readonly string[];
}

/**
 * Per-instrument basic-data lookups, tried after the data pool when explicit
 * codes were requested.
 */
export function basicDataCandidates(params: BasicDataCandidateParams): InvocationShape[] {
  const formats: DateFormat[] = ['hyphenated', 'compact'];
  return formats.map((format): InvocationShape => ({
    operation: 'basic_data',
    params: [params.codes.join(','), params.indicators.join(';'), formatDate(params.date, format)],
    description: `basic_data[date=${format}]`,
  }));
}

export interface HistoryQuoteCandidateParams {
  code: string;
  indicators: readonly string[];
  startDate: string;
  endDate: string;
}

export function historyQuoteCandidates(params: HistoryQuoteCandidateParams): InvocationShape[] {
  const formats: DateFormat[] = ['hyphenated', 'compact'];
  return formats.map((format): InvocationShape => ({
    operation: 'history_quotes',
    params: [
      params.code,
      params.indicators.join(','),
      '',
      formatDate(params.startDate, format),
      formatDate(params.endDate, format),
    ],
    description: `history_quotes[${params.code}; date=${format}]`,
  }));
}

export interface InstrumentListCandidateParams {
  date: string;
  market: Market;
  fields: readonly string[];
}

export function instrumentListCandidates(params: InstrumentListCandidateParams): InvocationShape[] {
  const exchange = params.market === 'all' ? null : params.market;
  const formats: DateFormat[] = ['hyphenated', 'compact'];
  return formats.map((format): InvocationShape => {
    const date = formatDate(params.date, format);
    return {
      operation: 'instrument_list',
      params: [date, dateFilter(date, exchange), params.fields.join(',')],
      description: `instrument_list[market=${params.market}; date=${format}]`,
    };
  });
}
