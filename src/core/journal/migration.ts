import type { OpenStoreOptions } from '../../persistence/stores/index.js';
import { openJournalStore } from '../../persistence/stores/index.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger({ component: 'migration' });

export interface MigrateOptions extends OpenStoreOptions {
  encrypted: boolean;
}

/**
 * Copies everything stored at `fromPath`, attachment payloads included, to
 * `toPath` using the same representation. Whatever `toPath` held before is
 * replaced.
 */
export function migrateJournal(fromPath: string, toPath: string, options: MigrateOptions): void {
  const { encrypted, ...storeOptions } = options;
  const source = openJournalStore({ path: fromPath, encrypted }, storeOptions);
  const target = openJournalStore({ path: toPath, encrypted }, storeOptions);

  const journal = source.load({ includeAttachmentData: true });
  target.replace(journal);

  logger.info(
    { from: source.path, to: target.path, encrypted, entries: journal.entries.length },
    'Migrated journal'
  );
}

/** Creates an empty store at `path`; an existing store there is left untouched. */
export function createEmptyJournal(path: string, options: MigrateOptions): void {
  const { encrypted, ...storeOptions } = options;
  openJournalStore({ path, encrypted }, storeOptions).initialize();
}
