/**
 * Schema migrations for the complaints store.
 *
 * Every statement is create-if-absent so a store file written by an older
 * tool (tables present, no schema_migrations) still migrates cleanly.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly up: (db: Database.Database) => void;
}

/**
 * Name of the view holding each complaint's latest status event.
 */
export const CURRENT_STATUS_VIEW = 'current_status';

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS residents (
          resident_id INTEGER PRIMARY KEY,
          first_name TEXT NOT NULL,
          last_name TEXT NOT NULL,
          ward INTEGER NOT NULL,
          email TEXT,
          phone TEXT
        );

        CREATE TABLE IF NOT EXISTS service_categories (
          category_id INTEGER PRIMARY KEY,
          category_name TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS complaints (
          complaint_id INTEGER PRIMARY KEY,
          resident_id INTEGER NOT NULL,
          category_id INTEGER NOT NULL,
          title TEXT NOT NULL,
          description TEXT,
          submission_date DATE NOT NULL,
          FOREIGN KEY (resident_id) REFERENCES residents (resident_id),
          FOREIGN KEY (category_id) REFERENCES service_categories (category_id)
        );

        CREATE TABLE IF NOT EXISTS status_logs (
          log_id INTEGER PRIMARY KEY,
          complaint_id INTEGER NOT NULL,
          status TEXT NOT NULL,
          status_date DATE NOT NULL,
          FOREIGN KEY (complaint_id) REFERENCES complaints (complaint_id)
        );
      `);
    },
  },
  {
    version: 2,
    name: 'status_lookup_indexes',
    up: (db) => {
      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_status_logs_complaint_date
          ON status_logs (complaint_id, status_date DESC, log_id DESC);
        CREATE INDEX IF NOT EXISTS idx_complaints_resident ON complaints (resident_id);
        CREATE INDEX IF NOT EXISTS idx_complaints_category ON complaints (category_id);
      `);
    },
  },
  {
    version: 3,
    name: 'current_status_view',
    up: (db) => {
      // Latest event per complaint; equal dates resolve to the highest log_id.
      db.exec(`
        CREATE VIEW IF NOT EXISTS ${CURRENT_STATUS_VIEW} AS
        SELECT complaint_id, log_id, status, status_date
        FROM (
          SELECT
            complaint_id,
            log_id,
            status,
            status_date,
            ROW_NUMBER() OVER (
              PARTITION BY complaint_id
              ORDER BY status_date DESC, log_id DESC
            ) AS rn
          FROM status_logs
        )
        WHERE rn = 1;
      `);
    },
  },
];
