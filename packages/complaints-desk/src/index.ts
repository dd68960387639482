/**
 * Complaints Desk
 *
 * Store session, dataset ingestion, report catalog and text rendering for
 * municipal complaint records.
 *
 * @packageDocumentation
 */

export { SqliteStore, openStore } from './persistence/sqlite-store.js';
export type { QueryExecutor, SqlParam, SqliteStoreOptions } from './persistence/sqlite-store.js';
export { MIGRATIONS, CURRENT_STATUS_VIEW } from './persistence/migrations.js';
export type { Migration } from './persistence/migrations.js';
export * from './persistence/schema.types.js';

export { parseDelimited, tokenizeDelimited } from './ingestion/delimited.js';
export type { DelimitedDocument, DelimitedRecord } from './ingestion/delimited.js';
export { ingestDatasets, buildUpsertSql, DATASET_ORDER, DATASET_TABLES } from './ingestion/ingest.js';
export type {
  DatasetName,
  DatasetResult,
  DatasetSources,
  IngestionSummary,
  IngestOptions,
} from './ingestion/ingest.js';

export {
  CURRENT_STATUS_RELATION,
  resolveAllCurrentStatuses,
  resolveCurrentStatus,
} from './reports/latest-status.js';
export { percentage } from './reports/rates.js';
export * from './reports/catalog.js';

export { renderTable, renderRecord, formatters } from './cli/lib/output.js';
export { loadConfig, DEFAULT_CONFIG } from './cli/lib/config.js';
export type { CLIConfig } from './cli/lib/config.js';
export { runSession, EXIT_CODES } from './cli/session.js';
export type { ExitCode, SessionOptions } from './cli/session.js';
export * from './core/types/errors.js';
