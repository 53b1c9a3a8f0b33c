import Database from 'better-sqlite3';
import type { Entry } from '../../model/journal.js';
import { DuplicateDateError } from '../../utils/errors.js';
import { parseDbTimestamp, toDbTimestamp } from '../timestamps.js';

/** Entry columns only; history and attachments live in their own repositories. */
export type EntryRecord = Omit<Entry, 'history' | 'attachments'>;

interface EntryRow {
  id: string;
  date: string;
  content: string;
  created_at: string;
  updated_at: string;
}

function rowToEntry(row: EntryRow): EntryRecord {
  return {
    id: row.id,
    date: row.date,
    content: row.content,
    createdAt: parseDbTimestamp(row.created_at),
    updatedAt: parseDbTimestamp(row.updated_at),
  };
}

function isDuplicateDate(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    error.code === 'SQLITE_CONSTRAINT_UNIQUE' &&
    error.message.includes('entries.date')
  );
}

export class EntryRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Inserts the entry or updates the row with the same id. Updating in place
   * (rather than INSERT OR REPLACE) keeps the cascade from wiping the entry's
   * history and attachments.
   * @throws DuplicateDateError when another entry already uses the date
   */
  upsert(entry: EntryRecord): void {
    const stmt = this.db.prepare(`
      INSERT INTO entries (id, date, content, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        date = excluded.date,
        content = excluded.content,
        created_at = excluded.created_at,
        updated_at = excluded.updated_at
    `);

    try {
      stmt.run(
        entry.id,
        entry.date,
        entry.content,
        toDbTimestamp(entry.createdAt),
        toDbTimestamp(entry.updatedAt)
      );
    } catch (error) {
      if (isDuplicateDate(error)) {
        throw new DuplicateDateError(entry.date, { cause: error });
      }
      throw error;
    }
  }

  /** Newest date first. */
  listAll(): EntryRecord[] {
    const rows = this.db
      .prepare('SELECT id, date, content, created_at, updated_at FROM entries ORDER BY date DESC')
      .all() as EntryRow[];
    return rows.map(rowToEntry);
  }

  delete(id: string): boolean {
    return this.db.prepare('DELETE FROM entries WHERE id = ?').run(id).changes > 0;
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM entries').get() as { count: number };
    return row.count;
  }
}
