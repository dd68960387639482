/**
 * Shared test data and store helpers
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { openStore, type SqlParam, type SqliteStore } from '../../persistence/sqlite-store.js';
import { buildUpsertSql } from '../../ingestion/ingest.js';
import type { TableName } from '../../persistence/schema.types.js';

export interface SeedData {
  /** [resident_id, first_name, last_name, ward, email, phone] */
  readonly residents?: ReadonlyArray<readonly SqlParam[]>;
  /** [category_id, category_name] */
  readonly categories?: ReadonlyArray<readonly SqlParam[]>;
  /** [complaint_id, resident_id, category_id, title, description, submission_date] */
  readonly complaints?: ReadonlyArray<readonly SqlParam[]>;
  /** [log_id, complaint_id, status, status_date] */
  readonly statusLogs?: ReadonlyArray<readonly SqlParam[]>;
}

/**
 * Migrated in-memory store
 */
export function createTestStore(): SqliteStore {
  return openStore(':memory:');
}

export function seed(store: SqliteStore, data: SeedData): void {
  const load = (table: TableName, rows: ReadonlyArray<readonly SqlParam[]> = []): void => {
    store.executeMany(buildUpsertSql(table), rows);
  };

  store.transaction(() => {
    load('residents', data.residents);
    load('service_categories', data.categories);
    load('complaints', data.complaints);
    load('status_logs', data.statusLogs);
  });
}

/**
 * Four residents, four categories, six complaints.
 *
 * Current statuses: 1 Resolved, 2 In Progress, 3 Submitted, 4 Resolved,
 * 5 In Progress (two events on the same day), 6 none.
 */
export const SAMPLE_DATA: SeedData = {
  residents: [
    [1, 'Ana', 'Reyes', 1, 'ana@example.test', '555-0101'],
    [2, 'Ben', 'Okafor', 2, 'ben@example.test', '555-0102'],
    [3, 'Cara', 'Lind', 1, 'cara@example.test', '555-0103'],
    [4, 'Dan', 'Moss', 3, 'dan@example.test', '555-0104'],
  ],
  categories: [
    [1, 'Pothole'],
    [2, 'Streetlight'],
    [3, 'Noise'],
    [4, 'Graffiti'],
  ],
  complaints: [
    [1, 1, 1, 'Deep hole', 'Near school', '2024-01-05'],
    [2, 2, 2, 'Dark corner', null, '2024-02-10'],
    [3, 1, 1, 'Cracked lane', 'Bike lane', '2024-03-01'],
    [4, 3, 3, 'Loud party', 'Weekends', '2024-03-01'],
    [5, 2, 1, 'Sunken cover', 'Manhole', '2024-03-15'],
    [6, 3, 2, 'Flicker', 'Lamp 12', '2024-03-20'],
  ],
  statusLogs: [
    [1, 1, 'Submitted', '2024-01-05'],
    [2, 1, 'In Progress', '2024-01-08'],
    [3, 1, 'Resolved', '2024-01-20'],
    [4, 2, 'Submitted', '2024-02-10'],
    [5, 2, 'In Progress', '2024-02-15'],
    [6, 3, 'Submitted', '2024-03-01'],
    [7, 4, 'Submitted', '2024-03-01'],
    [8, 4, 'Resolved', '2024-03-04'],
    [9, 5, 'Submitted', '2024-03-15'],
    [10, 5, 'In Progress', '2024-03-15'],
  ],
};

/**
 * Delimited file contents matching a small dataset
 */
export const SAMPLE_FILES = {
  residents: [
    'resident_id;first_name;last_name;ward;email;phone',
    '1;Ana;Reyes;1;ana@example.test;555-0101',
    '2;Ben;Okafor;2;ben@example.test;555-0102',
  ].join('\n'),
  categories: ['category_id;category_name', '1;Pothole', '2;Streetlight'].join('\n'),
  complaints: [
    'complaint_id;resident_id;category_id;title;description;submission_date',
    '1;1;1;Deep hole;"Near the school; north side";2024-01-05',
    '2;2;2;Dark corner;Lamp out;2024-02-10',
  ].join('\n'),
  statusLogs: [
    'log_id;complaint_id;status;status_date',
    '1;1;Submitted;2024-01-05',
    '2;1;Resolved;2024-01-20',
    '3;2;Submitted;2024-02-10',
  ].join('\n'),
} as const;

export type SampleFileName = keyof typeof SAMPLE_FILES;

const SAMPLE_DATASETS: readonly SampleFileName[] = ['residents', 'categories', 'complaints', 'statusLogs'];

export const SAMPLE_FILE_NAMES: Record<SampleFileName, string> = {
  residents: 'residents.csv',
  categories: 'service_categories.csv',
  complaints: 'complaints.csv',
  statusLogs: 'status_logs.csv',
};

/**
 * Temporary directory removed by `cleanup`
 */
export function createTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'complaints-desk-'));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/**
 * Write the sample files (with optional replacements) into a directory.
 * Datasets listed in `omit` are left unwritten but keep their path.
 */
export function writeSampleFiles(
  dir: string,
  replacements: Partial<Record<SampleFileName, string>> = {},
  omit: readonly SampleFileName[] = []
): Record<SampleFileName, string> {
  const paths: Record<SampleFileName, string> = {
    residents: join(dir, SAMPLE_FILE_NAMES.residents),
    categories: join(dir, SAMPLE_FILE_NAMES.categories),
    complaints: join(dir, SAMPLE_FILE_NAMES.complaints),
    statusLogs: join(dir, SAMPLE_FILE_NAMES.statusLogs),
  };
  for (const name of SAMPLE_DATASETS) {
    if (!omit.includes(name)) {
      writeFileSync(paths[name], replacements[name] ?? SAMPLE_FILES[name]);
    }
  }
  return paths;
}
