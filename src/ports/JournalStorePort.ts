import type { Attachment, Journal, SaveRecord } from '../model/journal.js';

export interface LoadJournalOptions {
  /** Read attachment payloads as well as their metadata. */
  includeAttachmentData?: boolean;
}

/** A new attachment, payload included. */
export type NewAttachment = Attachment & { data: Buffer };

export interface JournalStorePort {
  readonly path: string;
  readonly encrypted: boolean;

  /** Creates an empty store if nothing exists at the path yet. */
  initialize(): void;
  /** Entries newest date first; an absent store loads as an empty journal. */
  load(options?: LoadJournalOptions): Journal;
  save(journal: Journal): void;
  /** Discards whatever the store holds and writes `journal` in its place. */
  replace(journal: Journal): void;
  deleteEntry(entryId: string): void;
  /** @returns false when the entry already has a record with that timestamp */
  appendHistory(entryId: string, record: SaveRecord): boolean;
  /**
   * Writes the snapshot and the attachment together, or neither.
   * @returns whether the snapshot was written
   */
  addAttachment(attachment: NewAttachment, snapshot?: SaveRecord): boolean;
  getAttachment(attachmentId: string): Attachment;
  listAttachments(entryId: string): Attachment[];
  deleteAttachment(attachmentId: string): void;
  /** Reclaims space freed by deletions. Never run implicitly. */
  compact(): void;
}
