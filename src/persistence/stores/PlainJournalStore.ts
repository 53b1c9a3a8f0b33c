import { existsSync } from 'node:fs';
import type { Attachment, Journal, SaveRecord } from '../../model/journal.js';
import { emptyJournal } from '../../model/journal.js';
import type {
  JournalStorePort,
  LoadJournalOptions,
  NewAttachment,
} from '../../ports/JournalStorePort.js';
import { createLogger } from '../../utils/logger.js';
import { expandPath } from '../../utils/paths.js';
import { withDatabase } from '../database.js';
import { JournalRepository } from '../repositories/JournalRepository.js';

const logger = createLogger({ component: 'plain-store' });

/** A journal kept as a plain SQLite file. Each call opens and closes its own handle. */
export class PlainJournalStore implements JournalStorePort {
  readonly path: string;
  readonly encrypted = false;

  constructor(path: string) {
    this.path = expandPath(path);
  }

  initialize(): void {
    withDatabase(this.path, () => undefined, { wal: true });
    logger.info({ path: this.path }, 'Initialized journal');
  }

  load(options: LoadJournalOptions = {}): Journal {
    if (!existsSync(this.path)) {
      return emptyJournal();
    }
    return this.run((repo) => repo.load(options));
  }

  save(journal: Journal): void {
    this.run((repo) => repo.save(journal));
    logger.debug({ entries: journal.entries.length }, 'Saved journal');
  }

  replace(journal: Journal): void {
    this.run((repo) => repo.rebuild(journal));
    logger.info({ path: this.path, entries: journal.entries.length }, 'Replaced journal contents');
  }

  deleteEntry(entryId: string): void {
    this.run((repo) => repo.deleteEntry(entryId));
  }

  appendHistory(entryId: string, record: SaveRecord): boolean {
    return this.run((repo) => repo.appendHistory(entryId, record));
  }

  addAttachment(attachment: NewAttachment, snapshot?: SaveRecord): boolean {
    return this.run((repo) => repo.addAttachment(attachment, snapshot));
  }

  getAttachment(attachmentId: string): Attachment {
    return this.run((repo) => repo.getAttachment(attachmentId));
  }

  listAttachments(entryId: string): Attachment[] {
    return this.run((repo) => repo.attachments.listMetadata(entryId));
  }

  deleteAttachment(attachmentId: string): void {
    this.run((repo) => repo.deleteAttachment(attachmentId));
  }

  compact(): void {
    this.run((repo) => repo.compact());
    logger.info({ path: this.path }, 'Compacted journal');
  }

  private run<T>(work: (repo: JournalRepository) => T): T {
    return withDatabase(this.path, (db) => work(new JournalRepository(db)), { wal: true });
  }
}
