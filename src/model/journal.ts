/** A file attached to an entry. `data` is only present when the payload was fetched. */
export interface Attachment {
  id: string;
  entryId: string;
  filename: string;
  mimeType: string;
  size: number;
  createdAt: Date;
  data?: Buffer;
}

/** A previous version of an entry, captured before a content or attachment change. */
export interface SaveRecord {
  content: string;
  savedAt: Date;
  /** Attachment filenames at the time of the save. */
  attachments: string[];
}

export interface Entry {
  id: string;
  /** Calendar day, YYYY-MM-DD. At most one entry per date. */
  date: string;
  content: string;
  createdAt: Date;
  updatedAt: Date;
  history: SaveRecord[];
  attachments: Attachment[];
}

export interface Journal {
  entries: Entry[];
}

export interface JournalDescriptor {
  name: string;
  path: string;
  encrypted: boolean;
  lastOpened?: Date;
}

export function emptyJournal(): Journal {
  return { entries: [] };
}

export function entryPreview(entry: Entry, maxLength: number): string {
  if (entry.content.length > maxLength) {
    return entry.content.slice(0, maxLength) + '...';
  }
  return entry.content;
}

export function attachmentFilenames(entry: Entry): string[] {
  return entry.attachments.map((attachment) => attachment.filename);
}

export function sortEntriesNewestFirst(journal: Journal): void {
  journal.entries.sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
}
