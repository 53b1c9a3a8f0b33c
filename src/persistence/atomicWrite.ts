import { randomBytes } from 'node:crypto';
import { mkdirSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { ioOperation } from '../utils/errors.js';

/**
 * Replaces `path` with `data` by writing a sibling temp file and renaming it
 * over the destination. Until the rename the previous file stays intact.
 */
export function writeFileAtomic(path: string, data: Buffer): void {
  const dir = dirname(path);
  const tmpPath = join(dir, `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`);

  ioOperation('create directory for', path, () => mkdirSync(dir, { recursive: true }));
  try {
    ioOperation('write', tmpPath, () => writeFileSync(tmpPath, data, { mode: 0o600 }));
    ioOperation('replace', path, () => renameSync(tmpPath, path));
  } catch (error) {
    rmSync(tmpPath, { force: true });
    throw error;
  }
}
