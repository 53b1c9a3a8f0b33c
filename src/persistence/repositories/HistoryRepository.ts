import type { Database } from 'better-sqlite3';
import type { SaveRecord } from '../../model/journal.js';
import { parseDbTimestamp, toDbTimestamp } from '../timestamps.js';

const NAME_SEPARATOR = '|';

export class HistoryRepository {
  private readonly db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  /**
   * Inserts the record unless one already exists for the same entry and
   * timestamp, so repeated saves never duplicate a snapshot.
   * @returns whether a row was written
   */
  append(entryId: string, record: SaveRecord): boolean {
    const savedAt = toDbTimestamp(record.savedAt);
    const existing = this.db
      .prepare('SELECT COUNT(*) AS count FROM history WHERE entry_id = ? AND saved_at = ?')
      .get(entryId, savedAt) as { count: number };
    if (existing.count > 0) {
      return false;
    }

    this.db
      .prepare(
        'INSERT INTO history (entry_id, content, saved_at, attachment_names) VALUES (?, ?, ?, ?)'
      )
      .run(entryId, record.content, savedAt, record.attachments.join(NAME_SEPARATOR));
    return true;
  }

  /** Newest first. */
  listForEntry(entryId: string): SaveRecord[] {
    const rows = this.db
      .prepare(
        `SELECT content, saved_at, COALESCE(attachment_names, '') AS attachment_names
         FROM history WHERE entry_id = ? ORDER BY saved_at DESC`
      )
      .all(entryId) as Array<{
      content: string;
      saved_at: string;
      attachment_names: string;
    }>;

    return rows.map((row) => ({
      content: row.content,
      savedAt: parseDbTimestamp(row.saved_at),
      attachments: row.attachment_names === '' ? [] : row.attachment_names.split(NAME_SEPARATOR),
    }));
  }

  deleteForEntry(entryId: string): number {
    return this.db.prepare('DELETE FROM history WHERE entry_id = ?').run(entryId).changes;
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM history').get() as { count: number };
    return row.count;
  }
}
