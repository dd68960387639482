/**
 * SQLite Store Adapter
 *
 * One explicit session over a better-sqlite3 database. The CLI opens it once,
 * passes it to every report, and releases it on every exit path.
 *
 * ARCHITECTURE:
 * - Synchronous better-sqlite3, one statement in flight at a time
 * - WAL journal mode
 * - Foreign keys declared but not enforced: ingestion is lenient and
 *   orphaned rows simply drop out of join-based reports
 * - Versioned, create-if-absent migrations
 */

import Database from 'better-sqlite3';
import { ConnectionError, errorMessage } from '../core/types/errors.js';
import { createSilentLogger, type CLILogger } from '../cli/lib/logger.js';
import { MIGRATIONS, type Migration } from './migrations.js';

/**
 * Values better-sqlite3 can bind
 */
export type SqlParam = string | number | bigint | Buffer | null;

/**
 * Read-only query surface the report catalog depends on
 */
export interface QueryExecutor {
  execute<T extends object>(sql: string, params?: readonly SqlParam[]): T[];
  queryOne<T extends object>(sql: string, params?: readonly SqlParam[]): T | null;
}

export interface SqliteStoreOptions {
  readonly logger?: CLILogger;
  readonly migrations?: readonly Migration[];
}

export class SqliteStore implements QueryExecutor {
  private db: Database.Database | null = null;
  private readonly logger: CLILogger;
  private readonly migrations: readonly Migration[];

  constructor(
    public readonly databasePath: string,
    options: SqliteStoreOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.migrations = options.migrations ?? MIGRATIONS;
  }

  get isConnected(): boolean {
    return this.db !== null;
  }

  /**
   * Open the session. No-op when already open.
   *
   * @throws ConnectionError when the database file cannot be opened
   */
  connect(): void {
    if (this.db) return;

    let db: Database.Database | null = null;
    try {
      db = new Database(this.databasePath);
      // The file header is first read here, so a non-database file fails now
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = OFF');
    } catch (error) {
      db?.close();
      throw new ConnectionError(
        `Unable to open database at ${this.databasePath}: ${errorMessage(error)}`,
        this.databasePath,
        { cause: error }
      );
    }

    this.db = db;
    this.logger.debug('Store connected', { database: this.databasePath });
  }

  // ============================================================================
  // Migration Management
  // ============================================================================

  /**
   * Apply pending migrations in one transaction.
   *
   * @returns Schema version after migrating
   */
  migrate(): number {
    const db = this.connection();

    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
    `);

    const currentVersion = this.getSchemaVersion();
    const record = db.prepare<[number, string]>(
      'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
    );

    const runMigrations = db.transaction(() => {
      for (const migration of this.migrations) {
        if (migration.version > currentVersion) {
          migration.up(db);
          record.run(migration.version, migration.name);
          this.logger.debug('Applied migration', {
            version: migration.version,
            name: migration.name,
          });
        }
      }
    });
    runMigrations();

    const version = this.getSchemaVersion();
    this.logger.debug('Schema ready', { version });
    return version;
  }

  /**
   * Current schema version (0 if no migrations applied)
   */
  getSchemaVersion(): number {
    const row = this.queryOne<{ version: number | null }>(
      'SELECT MAX(version) AS version FROM schema_migrations'
    );
    return row?.version ?? 0;
  }

  // ============================================================================
  // Statements
  // ============================================================================

  /**
   * Run a statement. Readers return every row with column order preserved;
   * writers return an empty array.
   */
  execute<T extends object = Record<string, unknown>>(
    sql: string,
    params: readonly SqlParam[] = []
  ): T[] {
    const stmt = this.connection().prepare<SqlParam[], T>(sql);
    if (stmt.reader) {
      return stmt.all(...params);
    }
    stmt.run(...params);
    return [];
  }

  /**
   * Run one writer statement once per parameter set, preparing it once.
   *
   * @returns Number of rows written
   */
  executeMany(sql: string, rows: Iterable<readonly SqlParam[]>): number {
    const stmt = this.connection().prepare<SqlParam[]>(sql);
    let count = 0;
    for (const params of rows) {
      count += stmt.run(...params).changes;
    }
    return count;
  }

  /**
   * First row of a reader statement, or null
   */
  queryOne<T extends object = Record<string, unknown>>(
    sql: string,
    params: readonly SqlParam[] = []
  ): T | null {
    const stmt = this.connection().prepare<SqlParam[], T>(sql);
    return stmt.get(...params) ?? null;
  }

  /**
   * Run `fn` inside BEGIN/COMMIT; any throw rolls back and propagates.
   */
  transaction<T>(fn: () => T): T {
    return this.connection().transaction(fn)();
  }

  /**
   * Release the session. Safe to call repeatedly.
   */
  disconnect(): void {
    if (!this.db) return;
    this.db.close();
    this.db = null;
    this.logger.debug('Store disconnected', { database: this.databasePath });
  }

  private connection(): Database.Database {
    if (!this.db) {
      throw new ConnectionError(
        `Store is not connected: ${this.databasePath}`,
        this.databasePath
      );
    }
    return this.db;
  }
}

/**
 * Open a store and bring its schema up to date.
 *
 * @example
 * ```typescript
 * const store = openStore(':memory:');
 * try {
 *   const rows = store.execute('SELECT * FROM complaints');
 * } finally {
 *   store.disconnect();
 * }
 * ```
 */
export function openStore(databasePath: string, options: SqliteStoreOptions = {}): SqliteStore {
  const store = new SqliteStore(databasePath, options);
  store.connect();
  try {
    store.migrate();
  } catch (error) {
    store.disconnect();
    throw error;
  }
  return store;
}
