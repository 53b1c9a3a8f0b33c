import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Attachment, Entry, Journal, JournalDescriptor } from '../../model/journal.js';
import { sortEntriesNewestFirst } from '../../model/journal.js';
import type { OpenStoreOptions } from '../../persistence/stores/index.js';
import { openJournalStore } from '../../persistence/stores/index.js';
import type { JournalStorePort } from '../../ports/JournalStorePort.js';
import { DuplicateDateError, InvalidEntryError, NotFoundError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { AttachmentService } from '../attachments/AttachmentService.js';
import type { EntryVersion } from '../history/historyTracker.js';
import { applyEdit, timeline } from '../history/historyTracker.js';

const logger = createLogger({ component: 'journal-session' });

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

const entryDraftSchema = z.object({
  id: z.string().min(1).optional(),
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
    .refine(isCalendarDate, 'not a calendar date'),
  content: z.string(),
});

export type EntryDraft = z.infer<typeof entryDraftSchema>;

/**
 * One open journal: its descriptor, the store behind it and the entries held
 * in memory. Front ends pass this around instead of keeping global state.
 */
export class JournalSession {
  readonly attachments: AttachmentService;
  private journal: Journal;

  constructor(
    readonly descriptor: JournalDescriptor,
    private readonly store: JournalStorePort,
    journal: Journal
  ) {
    this.journal = journal;
    sortEntriesNewestFirst(this.journal);
    this.attachments = new AttachmentService(store);
  }

  /** Opens the store described by `descriptor` and loads its entries. */
  static open(descriptor: JournalDescriptor, options: OpenStoreOptions = {}): JournalSession {
    const store = openJournalStore(descriptor, options);
    const journal = store.load();
    logger.info(
      { path: descriptor.path, encrypted: descriptor.encrypted, entries: journal.entries.length },
      'Opened journal'
    );
    return new JournalSession(descriptor, store, journal);
  }

  get entries(): readonly Entry[] {
    return this.journal.entries;
  }

  findEntry(id: string): Entry | undefined {
    return this.journal.entries.find((entry) => entry.id === id);
  }

  findByDate(date: string): Entry | undefined {
    return this.journal.entries.find((entry) => entry.date === date);
  }

  /**
   * Creates the entry, or updates the one with `draft.id`, and persists the
   * journal. Changing the content of an existing entry keeps the old content
   * as a history record. On failure the in-memory journal is left as it was.
   * @throws InvalidEntryError for a malformed draft
   * @throws DuplicateDateError when a different entry already has the date
   */
  saveEntry(draft: EntryDraft, now: Date = new Date()): Entry {
    const parsed = entryDraftSchema.safeParse(draft);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new InvalidEntryError(`Invalid entry: ${issues.join('; ')}`);
    }
    const { id, date, content } = parsed.data;

    const conflict = this.findByDate(date);
    if (conflict && conflict.id !== id) {
      throw new DuplicateDateError(date);
    }

    let entry: Entry;
    if (id !== undefined) {
      const previous = this.findEntry(id);
      if (!previous) {
        throw new NotFoundError('entry', id);
      }
      entry = applyEdit(previous, { date, content, updatedAt: now });
    } else {
      entry = {
        id: randomUUID(),
        date,
        content,
        createdAt: now,
        updatedAt: now,
        history: [],
        attachments: [],
      };
    }

    const before = this.journal.entries;
    this.journal.entries = [...before.filter((existing) => existing.id !== entry.id), entry];
    sortEntriesNewestFirst(this.journal);

    try {
      this.store.save(this.journal);
    } catch (error) {
      this.journal.entries = before;
      throw error;
    }

    logger.debug({ entryId: entry.id, date }, 'Saved entry');
    return entry;
  }

  /** Removes the entry with its history and attachments. */
  deleteEntry(id: string): void {
    this.store.deleteEntry(id);
    this.journal.entries = this.journal.entries.filter((entry) => entry.id !== id);
    logger.info({ entryId: id }, 'Deleted entry');
  }

  addAttachment(entryId: string, sourcePath: string, now?: Date): Attachment {
    return this.attachments.add(this.requireEntry(entryId), sourcePath, now);
  }

  deleteAttachment(entryId: string, attachmentId: string): void {
    this.attachments.delete(this.requireEntry(entryId), attachmentId);
  }

  exportAttachment(attachmentId: string, destination: string): string {
    return this.attachments.export(attachmentId, destination);
  }

  timeline(entryId: string): EntryVersion[] {
    return timeline(this.requireEntry(entryId));
  }

  /** Reclaims space left behind by deleted attachments and entries. */
  compact(): void {
    this.store.compact();
  }

  reload(): void {
    this.journal = this.store.load();
    sortEntriesNewestFirst(this.journal);
  }

  private requireEntry(id: string): Entry {
    const entry = this.findEntry(id);
    if (!entry) {
      throw new NotFoundError('entry', id);
    }
    return entry;
  }
}
