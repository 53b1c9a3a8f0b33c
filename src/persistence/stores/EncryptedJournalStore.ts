import { existsSync, readFileSync } from 'node:fs';
import { decrypt, encrypt } from '../../crypto/envelope.js';
import type { Attachment, Journal, SaveRecord } from '../../model/journal.js';
import { emptyJournal } from '../../model/journal.js';
import type {
  JournalStorePort,
  LoadJournalOptions,
  NewAttachment,
} from '../../ports/JournalStorePort.js';
import { ioOperation } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { expandPath } from '../../utils/paths.js';
import { writeFileAtomic } from '../atomicWrite.js';
import { JournalRepository } from '../repositories/JournalRepository.js';
import type { TransientOptions } from '../transientDatabase.js';
import { captureTransientDatabase, withTransientDatabase } from '../transientDatabase.js';

const logger = createLogger({ component: 'encrypted-store' });

/**
 * A journal whose whole SQLite file is sealed with the password. Every call
 * decrypts into a transient working copy; every write re-encrypts the full
 * store and atomically replaces the file, so cost follows store size rather
 * than the size of the change.
 */
export class EncryptedJournalStore implements JournalStorePort {
  readonly path: string;
  readonly encrypted = true;
  private readonly password: string;
  private readonly transient: TransientOptions;

  constructor(path: string, password: string, transient: TransientOptions = {}) {
    this.path = expandPath(path);
    this.password = password;
    this.transient = transient;
  }

  initialize(): void {
    if (this.readPlaintext()) {
      return;
    }
    this.seal(captureTransientDatabase(null, () => undefined, this.transient).bytes);
    logger.info({ path: this.path }, 'Initialized encrypted journal');
  }

  load(options: LoadJournalOptions = {}): Journal {
    const plaintext = this.readPlaintext();
    if (!plaintext) {
      return emptyJournal();
    }
    return withTransientDatabase(
      plaintext,
      (db) => new JournalRepository(db).load(options),
      this.transient
    );
  }

  /**
   * Rebuilds the store from scratch out of `journal`. Attachments held as
   * metadata only take their payloads from the currently sealed copy.
   */
  save(journal: Journal): void {
    const missing = journal.entries
      .flatMap((entry) => entry.attachments)
      .filter((attachment) => !attachment.data)
      .map((attachment) => attachment.id);
    const payloads = this.readPayloads(missing);

    const { bytes } = captureTransientDatabase(
      null,
      (db) => new JournalRepository(db).rebuild(journal, (id) => payloads.get(id)),
      this.transient
    );
    this.seal(bytes);
    logger.debug({ entries: journal.entries.length }, 'Saved encrypted journal');
  }

  replace(journal: Journal): void {
    this.save(journal);
  }

  deleteEntry(entryId: string): void {
    this.mutate((repo) => repo.deleteEntry(entryId));
  }

  appendHistory(entryId: string, record: SaveRecord): boolean {
    return this.mutate((repo) => repo.appendHistory(entryId, record));
  }

  addAttachment(attachment: NewAttachment, snapshot?: SaveRecord): boolean {
    return this.mutate((repo) => repo.addAttachment(attachment, snapshot));
  }

  getAttachment(attachmentId: string): Attachment {
    return this.read((repo) => repo.getAttachment(attachmentId));
  }

  listAttachments(entryId: string): Attachment[] {
    return this.read((repo) => repo.attachments.listMetadata(entryId));
  }

  deleteAttachment(attachmentId: string): void {
    this.mutate((repo) => repo.deleteAttachment(attachmentId));
  }

  compact(): void {
    this.mutate((repo) => repo.compact());
    logger.info({ path: this.path }, 'Compacted encrypted journal');
  }

  /** Decrypted store bytes, or null when there is no sealed file or it is empty. */
  private readPlaintext(): Buffer | null {
    if (!existsSync(this.path)) {
      return null;
    }
    const blob = ioOperation('read', this.path, () => readFileSync(this.path));
    if (blob.length === 0) {
      return null;
    }
    return decrypt(blob, this.password);
  }

  private readPayloads(ids: string[]): Map<string, Buffer> {
    const payloads = new Map<string, Buffer>();
    if (ids.length === 0) {
      return payloads;
    }
    const plaintext = this.readPlaintext();
    if (!plaintext) {
      return payloads;
    }
    withTransientDatabase(
      plaintext,
      (db) => {
        const repo = new JournalRepository(db);
        for (const id of ids) {
          const data = repo.attachments.getPayload(id);
          if (data) {
            payloads.set(id, data);
          }
        }
      },
      this.transient
    );
    return payloads;
  }

  private read<T>(work: (repo: JournalRepository) => T): T {
    return withTransientDatabase(
      this.readPlaintext(),
      (db) => work(new JournalRepository(db)),
      this.transient
    );
  }

  /** Decrypt, apply `work`, re-seal. If `work` throws, the sealed file is untouched. */
  private mutate<T>(work: (repo: JournalRepository) => T): T {
    const { result, bytes } = captureTransientDatabase(
      this.readPlaintext(),
      (db) => work(new JournalRepository(db)),
      this.transient
    );
    this.seal(bytes);
    return result;
  }

  private seal(plaintext: Buffer): void {
    writeFileAtomic(this.path, encrypt(plaintext, this.password));
  }
}
