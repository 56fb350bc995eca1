/**
 * @fileoverview Alignment of upstream column names to canonical table fields.
 *
 * The synonym table lists, per target table, each canonical field with the
 * upstream names it may arrive under, in preference order. Matching is exact
 * first, then insensitive to case and separators; there is no substring
 * matching. Source columns that match nothing are reported as unmatched.
 *
 * @module @seatflow/provider-ifind/mapping/column-aligner
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '@seatflow/contracts';
import { createSilentLogger, type Logger } from '@seatflow/logger';

const synonymTableSchema = z.record(z.string(), z.record(z.string(), z.array(z.string()).min(1)));

/** table → canonical field → accepted upstream names */
export type SynonymTable = z.infer<typeof synonymTableSchema>;

export interface Alignment {
  /** canonical field → source column */
  columns: Map<string, string>;
  /** Source columns no canonical field claimed */
  unmatched: string[];
}

const DEFAULT_SYNONYMS_URL = new URL('./synonyms.json', import.meta.url);

/**
 * Reads and validates a synonym table; the bundled one when no path is given.
 *
 * @throws {ConfigurationError} When the file is unreadable or malformed
 */
export function loadSynonymTable(path: string | URL = DEFAULT_SYNONYMS_URL): SynonymTable {
  let content: unknown;
  try {
    content = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read synonym table ${String(path)}`, {
      path: String(path),
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = synonymTableSchema.safeParse(content);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid synonym table ${String(path)}`, {
      path: String(path),
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

/** Lowercase with `_`, `-`, spaces and dots removed. */
export function looseKey(name: string): string {
  return name.toLowerCase().replace(/[\s_.-]/g, '');
}

export class ColumnAligner {
  private readonly synonyms: SynonymTable;
  private readonly logger: Logger;

  constructor(synonyms: SynonymTable = loadSynonymTable(), logger?: Logger) {
    this.synonyms = synonyms;
    this.logger = (logger ?? createSilentLogger()).child({ component: 'column-aligner' });
  }

  tables(): string[] {
    return Object.keys(this.synonyms);
  }

  /** Canonical fields of a table, in declaration order. */
  fields(table: string): string[] {
    return Object.keys(this.tableSynonyms(table));
  }

  /**
   * Assigns each canonical field at most one source column. Fields are
   * filled in declaration order, aliases tried in preference order.
   *
   * @example
   * ```typescript
   * aligner.align(['time', 'stock_code', 'pctChg', 'extra'], 'daily_quotes');
   * // columns: trade_date→time, code→stock_code, pct_chg→pctChg; unmatched: ['extra']
   * ```
   */
  align(sourceColumns: readonly string[], table: string): Alignment {
    const synonyms = this.tableSynonyms(table);
    const claimed = new Set<string>();
    const columns = new Map<string, string>();

    const pick = (aliases: readonly string[], compare: (alias: string, column: string) => boolean) => {
      for (const alias of aliases) {
        const column = sourceColumns.find((source) => !claimed.has(source) && compare(alias, source));
        if (column !== undefined) {
          return column;
        }
      }
      return undefined;
    };

    const passes = [
      (alias: string, source: string) => alias === source,
      (alias: string, source: string) => looseKey(alias) === looseKey(source),
    ];

    // Exact matches for every field before any loose match
    for (const compare of passes) {
      for (const [field, aliases] of Object.entries(synonyms)) {
        if (columns.has(field)) {
          continue;
        }
        const column = pick(aliases, compare);
        if (column !== undefined) {
          claimed.add(column);
          columns.set(field, column);
        }
      }
    }

    const unmatched = sourceColumns.filter((source) => !claimed.has(source));
    if (unmatched.length > 0) {
      this.logger.warn('Unmatched source columns', { table, unmatched });
    }

    return { columns, unmatched };
  }

  private tableSynonyms(table: string): Record<string, string[]> {
    const synonyms = this.synonyms[table];
    if (!synonyms) {
      throw new ConfigurationError(`No synonym table for ${table}`, {
        table,
        known: this.tables(),
      });
    }
    return synonyms;
  }
}
