import type { Database } from 'better-sqlite3';
import type { Attachment, Entry, Journal, SaveRecord } from '../../model/journal.js';
import { NotFoundError } from '../../utils/errors.js';
import { AttachmentRepository } from './AttachmentRepository.js';
import { EntryRepository } from './EntryRepository.js';
import { HistoryRepository } from './HistoryRepository.js';

export interface LoadOptions {
  /** Also read attachment payloads. Off by default; listing never needs them. */
  includeAttachmentData?: boolean;
}

/** Supplies a payload for an attachment held in memory without its data. */
export type PayloadResolver = (attachmentId: string) => Buffer | undefined;

/**
 * Whole-journal operations over one open database. Each write runs in a
 * single transaction: any thrown error rolls all of it back.
 */
export class JournalRepository {
  readonly entries: EntryRepository;
  readonly history: HistoryRepository;
  readonly attachments: AttachmentRepository;
  private readonly db: Database;

  constructor(db: Database) {
    this.db = db;
    this.entries = new EntryRepository(db);
    this.history = new HistoryRepository(db);
    this.attachments = new AttachmentRepository(db);
  }

  load(options: LoadOptions = {}): Journal {
    const entries: Entry[] = this.entries.listAll().map((record) => ({
      ...record,
      history: this.history.listForEntry(record.id),
      attachments: options.includeAttachmentData
        ? this.attachments.listWithData(record.id)
        : this.attachments.listMetadata(record.id),
    }));
    return { entries };
  }

  /**
   * Upserts every entry and appends any history record not yet stored.
   * Attachments carrying a payload that are missing from the store are
   * inserted; metadata-only attachments are assumed to be stored already.
   */
  save(journal: Journal): void {
    this.db.transaction(() => {
      for (const entry of journal.entries) {
        this.writeEntry(entry);
        for (const attachment of entry.attachments) {
          if (attachment.data && !this.attachments.exists(attachment.id)) {
            this.attachments.insert({ ...attachment, data: attachment.data });
          }
        }
      }
    })();
  }

  /**
   * Clears the store and writes `journal` in full. Payloads not held in memory
   * are looked up through `resolvePayload`, by default in this store before it
   * is cleared.
   * @throws NotFoundError when an attachment's payload cannot be found anywhere
   */
  rebuild(journal: Journal, resolvePayload?: PayloadResolver): void {
    const resolve = resolvePayload ?? ((id: string) => this.attachments.getPayload(id));

    this.db.transaction(() => {
      const payloads = new Map<string, Buffer>();
      for (const entry of journal.entries) {
        for (const attachment of entry.attachments) {
          const data = attachment.data ?? resolve(attachment.id);
          if (!data) {
            throw new NotFoundError('attachment', attachment.id);
          }
          payloads.set(attachment.id, data);
        }
      }

      this.db.exec('DELETE FROM history; DELETE FROM attachments; DELETE FROM entries;');

      for (const entry of journal.entries) {
        this.writeEntry(entry);
        for (const attachment of entry.attachments) {
          const data = payloads.get(attachment.id);
          if (data) {
            this.attachments.insert({ ...attachment, data });
          }
        }
      }
    })();
  }

  /**
   * Removes the entry's history, its attachments and the entry itself as one
   * unit.
   * @throws NotFoundError when no entry has the id; nothing is removed
   */
  deleteEntry(id: string): void {
    this.db.transaction(() => {
      this.history.deleteForEntry(id);
      this.attachments.deleteForEntry(id);
      if (!this.entries.delete(id)) {
        throw new NotFoundError('entry', id);
      }
    })();
  }

  appendHistory(entryId: string, record: SaveRecord): boolean {
    return this.history.append(entryId, record);
  }

  /**
   * Stores the attachment, preceded by the snapshot when one is given. Both
   * rows persist or neither does.
   * @returns whether the snapshot was written
   */
  addAttachment(attachment: Attachment & { data: Buffer }, snapshot?: SaveRecord): boolean {
    return this.db.transaction(() => {
      const written = snapshot ? this.history.append(attachment.entryId, snapshot) : false;
      this.attachments.insert(attachment);
      return written;
    })();
  }

  /** @throws NotFoundError */
  deleteAttachment(id: string): void {
    if (!this.attachments.delete(id)) {
      throw new NotFoundError('attachment', id);
    }
  }

  /** @throws NotFoundError */
  getAttachment(id: string): Attachment {
    const attachment = this.attachments.get(id);
    if (!attachment) {
      throw new NotFoundError('attachment', id);
    }
    return attachment;
  }

  /** Reclaims space left by deleted rows. */
  compact(): void {
    this.db.exec('VACUUM');
  }

  private writeEntry(entry: Entry): void {
    this.entries.upsert(entry);
    for (const record of entry.history) {
      this.history.append(entry.id, record);
    }
  }
}
