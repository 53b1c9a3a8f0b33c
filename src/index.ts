export { config, loadConfig, manifestPath, defaultDatabasePath } from './config/index.js';
export type { Config } from './config/index.js';

export * from './model/journal.js';
export * from './utils/errors.js';
export { detectMimeType, formatFileSize, DEFAULT_MIME_TYPE } from './utils/files.js';
export { expandPath } from './utils/paths.js';
export { createLogger } from './utils/logger.js';

export { encrypt, decrypt, deriveKey } from './crypto/envelope.js';

export { openDatabase, withDatabase, runMigrations } from './persistence/database.js';
export { JournalRepository } from './persistence/repositories/JournalRepository.js';
export {
  openJournalStore,
  PlainJournalStore,
  EncryptedJournalStore,
} from './persistence/stores/index.js';
export type { OpenStoreOptions } from './persistence/stores/index.js';
export type {
  JournalStorePort,
  LoadJournalOptions,
  NewAttachment,
} from './ports/JournalStorePort.js';

export { applyEdit, snapshotBeforeAttachment, timeline } from './core/history/historyTracker.js';
export type { EntryVersion } from './core/history/historyTracker.js';
export { AttachmentService } from './core/attachments/AttachmentService.js';
export { JournalSession } from './core/journal/JournalSession.js';
export type { EntryDraft } from './core/journal/JournalSession.js';
export { migrateJournal, createEmptyJournal } from './core/journal/migration.js';
export type { MigrateOptions } from './core/journal/migration.js';

export { JournalRegistry, LEGACY_JOURNAL_NAME } from './registry/JournalRegistry.js';
