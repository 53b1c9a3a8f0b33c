import type { JournalDescriptor } from '../../model/journal.js';
import type { JournalStorePort } from '../../ports/JournalStorePort.js';
import { ConfigError } from '../../utils/errors.js';
import type { TransientOptions } from '../transientDatabase.js';
import { EncryptedJournalStore } from './EncryptedJournalStore.js';
import { PlainJournalStore } from './PlainJournalStore.js';

export { EncryptedJournalStore } from './EncryptedJournalStore.js';
export { PlainJournalStore } from './PlainJournalStore.js';

export interface OpenStoreOptions extends TransientOptions {
  password?: string;
}

export function openJournalStore(
  descriptor: Pick<JournalDescriptor, 'path' | 'encrypted'>,
  options: OpenStoreOptions = {}
): JournalStorePort {
  if (!descriptor.encrypted) {
    return new PlainJournalStore(descriptor.path);
  }
  if (options.password === undefined || options.password === '') {
    throw new ConfigError(`Journal at ${descriptor.path} is encrypted; a password is required`);
  }
  return new EncryptedJournalStore(descriptor.path, options.password, { tmpDir: options.tmpDir });
}
