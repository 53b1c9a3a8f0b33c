import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import { createLogger } from '../utils/logger.js';
import { ioOperation, SchemaMigrationError } from '../utils/errors.js';
import { expandPath } from '../utils/paths.js';
import { parseDbTimestamp, toDbTimestamp } from './timestamps.js';

const logger = createLogger({ component: 'database' });

export interface OpenDatabaseOptions {
  /** Use write-ahead logging. Off for transient copies, which are read back as a single file. */
  wal?: boolean;
}

/**
 * Opens (creating if needed) the journal database at `path` and brings its
 * schema up to date. Safe to call on an existing, populated store.
 */
export function openDatabase(path: string, options: OpenDatabaseOptions = {}): Database.Database {
  const dbPath = expandPath(path);
  logger.debug({ dbPath }, 'Opening database');

  ioOperation('create directory for', dbPath, () => mkdirSync(dirname(dbPath), { recursive: true }));

  const db = ioOperation('open', dbPath, () => new Database(dbPath));
  try {
    if (options.wal) {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');

    runMigrations(db);
  } catch (error) {
    db.close();
    throw error;
  }

  return db;
}

/** Opens the database, runs `work` and always closes the handle afterwards. */
export function withDatabase<T>(
  path: string,
  work: (db: Database.Database) => T,
  options: OpenDatabaseOptions = {}
): T {
  const db = openDatabase(path, options);
  try {
    return work(db);
  } finally {
    db.close();
  }
}

export function runMigrations(db: Database.Database): void {
  logger.debug('Running database migrations');

  try {
    db.exec(`
      CREATE TABLE IF NOT EXISTS entries (
        id TEXT PRIMARY KEY,
        date TEXT NOT NULL UNIQUE,
        content TEXT NOT NULL,
        created_at DATETIME NOT NULL,
        updated_at DATETIME NOT NULL
      );

      CREATE TABLE IF NOT EXISTS history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        entry_id TEXT NOT NULL,
        content TEXT NOT NULL,
        saved_at DATETIME NOT NULL,
        attachment_names TEXT DEFAULT '',
        FOREIGN KEY (entry_id) REFERENCES entries(id) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS attachments (
        id TEXT PRIMARY KEY,
        entry_id TEXT NOT NULL,
        filename TEXT NOT NULL,
        mime_type TEXT NOT NULL,
        size INTEGER NOT NULL,
        data BLOB NOT NULL,
        created_at DATETIME NOT NULL,
        FOREIGN KEY (entry_id) REFERENCES entries(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_entries_date ON entries(date);
      CREATE INDEX IF NOT EXISTS idx_history_entry ON history(entry_id);
      CREATE INDEX IF NOT EXISTS idx_attachments_entry ON attachments(entry_id);
    `);
  } catch (error) {
    throw new SchemaMigrationError('Failed to create journal schema', { cause: error });
  }

  // Stores created before per-save attachment lists lack history.attachment_names
  addColumnIfMissing(db, 'history', 'attachment_names', "TEXT DEFAULT ''");
  normalizeTimestamps(db);
}

const TIMESTAMP_COLUMNS: ReadonlyArray<[table: string, column: string]> = [
  ['entries', 'created_at'],
  ['entries', 'updated_at'],
  ['history', 'saved_at'],
  ['attachments', 'created_at'],
];

// Matches what toDbTimestamp writes
const ISO_GLOB = '[0-9][0-9][0-9][0-9]-[0-9][0-9]-[0-9][0-9]T[0-9][0-9]:[0-9][0-9]:[0-9][0-9].[0-9][0-9][0-9]Z';

/**
 * Rewrites timestamps left by older versions in the form toDbTimestamp
 * writes, so equality checks and ORDER BY compare instants. History rows that
 * then share an entry and timestamp are collapsed to the first one.
 */
export function normalizeTimestamps(db: Database.Database): void {
  const rewritten = db.transaction(() => {
    let changed = 0;
    for (const [table, column] of TIMESTAMP_COLUMNS) {
      const rows = db
        .prepare(`SELECT rowid AS rowid, ${column} AS value FROM ${table} WHERE ${column} NOT GLOB ?`)
        .all(ISO_GLOB) as Array<{ rowid: number; value: string }>;
      const update = db.prepare(`UPDATE ${table} SET ${column} = ? WHERE rowid = ?`);
      for (const row of rows) {
        const instant = parseDbTimestamp(row.value);
        if (Number.isNaN(instant.getTime())) {
          continue;
        }
        changed += update.run(toDbTimestamp(instant), row.rowid).changes;
      }
    }

    if (changed > 0) {
      db.exec(
        `DELETE FROM history WHERE id NOT IN (
           SELECT MIN(id) FROM history GROUP BY entry_id, saved_at
         )`
      );
    }
    return changed;
  })();

  if (rewritten > 0) {
    logger.info({ rows: rewritten }, 'Normalized legacy timestamps');
  }
}

/**
 * Additive, forward-only column migration. An already-present column is not
 * an error; anything else is.
 */
export function addColumnIfMissing(
  db: Database.Database,
  table: string,
  column: string,
  definition: string
): void {
  const info = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
  if (info.some((c) => c.name === column)) {
    return;
  }

  try {
    db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
    logger.info({ table, column }, 'Added column');
  } catch (error) {
    if (error instanceof Error && error.message.includes('duplicate column name')) {
      return;
    }
    throw new SchemaMigrationError(`Failed to add ${table}.${column}`, { cause: error });
  }
}
