import type { Entry, SaveRecord } from '../../model/journal.js';
import { attachmentFilenames } from '../../model/journal.js';

export interface EntryVersion {
  /** 0 is the current state, then older versions. */
  index: number;
  label: string;
  content: string;
  savedAt: Date;
  attachments: string[];
  current: boolean;
}

/**
 * Produces the entry that results from saving `edited` over `previous`.
 * When the content changed, the previous content is kept as one new
 * SaveRecord stamped with the previous update time (moved just past the
 * latest existing record if it would not be newer); otherwise history is
 * left as it was. Attachments always carry over from `previous`.
 */
export function applyEdit(
  previous: Entry,
  edited: Pick<Entry, 'date' | 'content' | 'updatedAt'>
): Entry {
  const history =
    previous.content !== edited.content
      ? [...previous.history, snapshotOf(previous, nextSavedAt(previous, previous.updatedAt))]
      : previous.history;

  return {
    id: previous.id,
    date: edited.date,
    content: edited.content,
    createdAt: previous.createdAt,
    updatedAt: edited.updatedAt,
    history,
    attachments: previous.attachments,
  };
}

/** The record to keep before an attachment is added: current content, attachments before the new one. */
export function snapshotBeforeAttachment(entry: Entry, now: Date): SaveRecord {
  return snapshotOf(entry, nextSavedAt(entry, now));
}

/**
 * `candidate`, or one millisecond after the entry's newest record when that
 * is not earlier. Records of one entry never share a timestamp, which the
 * store uses to recognize a record it already holds.
 */
export function nextSavedAt(entry: Entry, candidate: Date): Date {
  const latest = entry.history.reduce(
    (max, record) => Math.max(max, record.savedAt.getTime()),
    Number.NEGATIVE_INFINITY
  );
  return candidate.getTime() > latest ? candidate : new Date(latest + 1);
}

/** Current state first, then saved versions newest first, numbered v{n} down to v1. */
export function timeline(entry: Entry): EntryVersion[] {
  const sorted = [...entry.history].sort((a, b) => b.savedAt.getTime() - a.savedAt.getTime());

  const versions: EntryVersion[] = [
    {
      index: 0,
      label: 'Current',
      content: entry.content,
      savedAt: entry.updatedAt,
      attachments: attachmentFilenames(entry),
      current: true,
    },
  ];

  sorted.forEach((record, i) => {
    versions.push({
      index: i + 1,
      label: `v${sorted.length - i}`,
      content: record.content,
      savedAt: record.savedAt,
      attachments: [...record.attachments],
      current: false,
    });
  });

  return versions;
}

function snapshotOf(entry: Entry, savedAt: Date): SaveRecord {
  return {
    content: entry.content,
    savedAt,
    attachments: attachmentFilenames(entry),
  };
}
