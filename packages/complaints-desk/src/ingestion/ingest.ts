/**
 * Dataset Ingestion Job
 *
 * Loads the four delimited datasets into their tables with insert-or-replace
 * semantics, keyed by each table's identity column. Absent files are
 * skipped; values are stored exactly as read. Re-running on the same files
 * leaves the tables unchanged.
 *
 * @module ingestion/ingest
 */

import { existsSync, readFileSync } from 'node:fs';
import { createSilentLogger, type CLILogger } from '../cli/lib/logger.js';
import type { SqliteStore } from '../persistence/sqlite-store.js';
import { TABLE_COLUMNS, type TableName } from '../persistence/schema.types.js';
import { parseDelimited, type DelimitedRecord } from './delimited.js';

// ============================================================================
// Types
// ============================================================================

export type DatasetName = 'residents' | 'categories' | 'complaints' | 'statusLogs';

/**
 * File path per dataset; datasets left out are not loaded
 */
export type DatasetSources = Partial<Record<DatasetName, string>>;

export interface DatasetResult {
  readonly dataset: DatasetName;
  readonly table: TableName;
  readonly path: string | null;
  readonly status: 'loaded' | 'skipped';
  readonly records: number;
}

export interface IngestionSummary {
  readonly datasets: readonly DatasetResult[];
  readonly totalRecords: number;
}

export interface IngestOptions {
  readonly logger?: CLILogger;
  /** Field separator (default `;`) */
  readonly delimiter?: string;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Load order: parents before children
 */
export const DATASET_ORDER: readonly DatasetName[] = [
  'residents',
  'categories',
  'complaints',
  'statusLogs',
];

export const DATASET_TABLES: Record<DatasetName, TableName> = {
  residents: 'residents',
  categories: 'service_categories',
  complaints: 'complaints',
  statusLogs: 'status_logs',
};

// ============================================================================
// Ingestion
// ============================================================================

/**
 * Build the upsert statement for a table
 */
export function buildUpsertSql(table: TableName): string {
  const columns: readonly string[] = TABLE_COLUMNS[table];
  const placeholders = columns.map(() => '?').join(', ');
  return `INSERT OR REPLACE INTO ${table} (${columns.join(', ')}) VALUES (${placeholders})`;
}

function recordValues(table: TableName, record: DelimitedRecord): (string | null)[] {
  const columns: readonly string[] = TABLE_COLUMNS[table];
  return columns.map((column) => record[column] ?? null);
}

/**
 * Load every available dataset into the store in a single transaction.
 */
export function ingestDatasets(
  store: SqliteStore,
  sources: DatasetSources,
  options: IngestOptions = {}
): IngestionSummary {
  const logger = options.logger ?? createSilentLogger();

  const pending = DATASET_ORDER.map((dataset) => {
    const table = DATASET_TABLES[dataset];
    const path = sources[dataset] ?? null;

    if (path === null || !existsSync(path)) {
      return { dataset, table, path, records: null };
    }

    const { records } = parseDelimited(readFileSync(path, 'utf-8'), {
      delimiter: options.delimiter,
    });
    return { dataset, table, path, records };
  });

  const results = store.transaction(() =>
    pending.map(({ dataset, table, path, records }): DatasetResult => {
      if (records === null) {
        return { dataset, table, path, status: 'skipped', records: 0 };
      }

      store.executeMany(
        buildUpsertSql(table),
        records.map((record) => recordValues(table, record))
      );
      return { dataset, table, path, status: 'loaded', records: records.length };
    })
  );

  for (const result of results) {
    if (result.status === 'loaded') {
      logger.info(`Loaded ${result.dataset}`, { table: result.table, records: result.records });
    } else {
      logger.info(`Skipped ${result.dataset}: file not found`, { path: result.path });
    }
  }

  return {
    datasets: results,
    totalRecords: results.reduce((sum, result) => sum + result.records, 0),
  };
}
