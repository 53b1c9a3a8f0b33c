import type { Database } from 'better-sqlite3';
import type { Attachment } from '../../model/journal.js';
import { parseDbTimestamp, toDbTimestamp } from '../timestamps.js';

interface AttachmentRow {
  id: string;
  entry_id: string;
  filename: string;
  mime_type: string;
  size: number;
  created_at: string;
  data?: Buffer;
}

function rowToAttachment(row: AttachmentRow): Attachment {
  const attachment: Attachment = {
    id: row.id,
    entryId: row.entry_id,
    filename: row.filename,
    mimeType: row.mime_type,
    size: row.size,
    createdAt: parseDbTimestamp(row.created_at),
  };
  if (row.data !== undefined) {
    attachment.data = row.data;
  }
  return attachment;
}

export class AttachmentRepository {
  private readonly db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  insert(attachment: Attachment & { data: Buffer }): void {
    this.db
      .prepare(
        `INSERT INTO attachments (id, entry_id, filename, mime_type, size, data, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        attachment.id,
        attachment.entryId,
        attachment.filename,
        attachment.mimeType,
        attachment.size,
        attachment.data,
        toDbTimestamp(attachment.createdAt)
      );
  }

  exists(id: string): boolean {
    return this.db.prepare('SELECT 1 FROM attachments WHERE id = ?').get(id) !== undefined;
  }

  /** Metadata only; the payload column is never read. */
  listMetadata(entryId: string): Attachment[] {
    const rows = this.db
      .prepare(
        `SELECT id, entry_id, filename, mime_type, size, created_at
         FROM attachments WHERE entry_id = ? ORDER BY created_at ASC`
      )
      .all(entryId) as AttachmentRow[];
    return rows.map(rowToAttachment);
  }

  /** Every attachment of the entry, payload included. */
  listWithData(entryId: string): Attachment[] {
    const rows = this.db
      .prepare(
        `SELECT id, entry_id, filename, mime_type, size, data, created_at
         FROM attachments WHERE entry_id = ? ORDER BY created_at ASC`
      )
      .all(entryId) as AttachmentRow[];
    return rows.map(rowToAttachment);
  }

  get(id: string): Attachment | undefined {
    const row = this.db
      .prepare(
        `SELECT id, entry_id, filename, mime_type, size, data, created_at
         FROM attachments WHERE id = ?`
      )
      .get(id) as AttachmentRow | undefined;
    return row ? rowToAttachment(row) : undefined;
  }

  getPayload(id: string): Buffer | undefined {
    const row = this.db.prepare('SELECT data FROM attachments WHERE id = ?').get(id) as
      | { data: Buffer }
      | undefined;
    return row?.data;
  }

  delete(id: string): boolean {
    return this.db.prepare('DELETE FROM attachments WHERE id = ?').run(id).changes > 0;
  }

  deleteForEntry(entryId: string): number {
    return this.db.prepare('DELETE FROM attachments WHERE entry_id = ?').run(entryId).changes;
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM attachments').get() as {
      count: number;
    };
    return row.count;
  }
}
