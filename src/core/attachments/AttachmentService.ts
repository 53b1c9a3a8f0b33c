import { randomUUID } from 'node:crypto';
import { readFileSync, statSync, writeFileSync } from 'node:fs';
import { basename, join } from 'node:path';
import type { Attachment, Entry } from '../../model/journal.js';
import type { JournalStorePort, NewAttachment } from '../../ports/JournalStorePort.js';
import { ioOperation, NotFoundError } from '../../utils/errors.js';
import { detectMimeType } from '../../utils/files.js';
import { createLogger } from '../../utils/logger.js';
import { expandPath } from '../../utils/paths.js';
import { snapshotBeforeAttachment } from '../history/historyTracker.js';

const logger = createLogger({ component: 'attachments' });

export class AttachmentService {
  constructor(private readonly store: JournalStorePort) {}

  /**
   * Reads `sourcePath` fully into memory and attaches it to `entry`.
   *
   * A snapshot of the entry as it was before the attachment is written with
   * it in one transaction. The snapshot joins `entry.history` only once the
   * store reports it written, so memory never holds a record the store lacks.
   *
   * @returns the new attachment's metadata, also appended to `entry.attachments`
   */
  add(entry: Entry, sourcePath: string, now: Date = new Date()): Attachment {
    const path = expandPath(sourcePath);
    const data = ioOperation('read', path, () => readFileSync(path));
    const filename = basename(path);

    const attachment: NewAttachment = {
      id: randomUUID(),
      entryId: entry.id,
      filename,
      mimeType: detectMimeType(filename),
      size: data.length,
      createdAt: now,
      data,
    };

    const snapshot = snapshotBeforeAttachment(entry, now);
    if (this.store.addAttachment(attachment, snapshot)) {
      entry.history.push(snapshot);
    } else {
      logger.warn({ entryId: entry.id, savedAt: snapshot.savedAt }, 'Snapshot already stored');
    }

    const { data: _payload, ...metadata } = attachment;
    entry.attachments.push(metadata);
    logger.info(
      { entryId: entry.id, filename, mimeType: attachment.mimeType, size: attachment.size },
      'Added attachment'
    );
    return metadata;
  }

  listMetadata(entryId: string): Attachment[] {
    return this.store.listAttachments(entryId);
  }

  /** Full record including the payload. */
  fetch(attachmentId: string): Attachment {
    return this.store.getAttachment(attachmentId);
  }

  /** Removes the row. The file does not shrink until the store is compacted. */
  delete(entry: Entry, attachmentId: string): void {
    this.store.deleteAttachment(attachmentId);
    entry.attachments = entry.attachments.filter((attachment) => attachment.id !== attachmentId);
  }

  /**
   * Writes the payload to `destination`, or into it under the original
   * filename when it is an existing directory. An existing file is overwritten.
   * @returns the path written
   */
  export(attachmentId: string, destination: string): string {
    const attachment = this.fetch(attachmentId);
    let target = expandPath(destination);

    const info = ioOperation('stat', target, () => statSync(target, { throwIfNoEntry: false }));
    if (info?.isDirectory()) {
      target = join(target, attachment.filename);
    }

    const { data } = attachment;
    if (!data) {
      throw new NotFoundError('attachment', attachmentId);
    }
    ioOperation('write', target, () => writeFileSync(target, data));
    logger.info({ attachmentId, target }, 'Exported attachment');
    return target;
  }
}
