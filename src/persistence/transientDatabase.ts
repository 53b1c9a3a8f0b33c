import type { Database } from 'better-sqlite3';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { config } from '../config/index.js';
import { ioOperation } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { openDatabase } from './database.js';

const logger = createLogger({ component: 'transient-database' });

export interface TransientOptions {
  /** Directory the private working directory is created in. */
  tmpDir?: string;
}

export interface CapturedResult<T> {
  result: T;
  /** The working copy's bytes after the database was closed. */
  bytes: Buffer;
}

/**
 * Materializes `seed` (or nothing, for a fresh store) as a plaintext database
 * in a private temp directory, runs `work` against it, then `finish` once the
 * handle is closed. The directory, journal side files included, is removed on
 * every exit path.
 */
function runTransient<T, R>(
  seed: Buffer | null,
  work: (db: Database) => T,
  finish: (dbPath: string, result: T) => R,
  options: TransientOptions
): R {
  const base = options.tmpDir ?? config.tmpDir;
  const dir = ioOperation('create temp directory in', base, () =>
    mkdtempSync(join(base, 'journal-'))
  );
  const dbPath = join(dir, 'working.db');

  try {
    if (seed) {
      ioOperation('write', dbPath, () => writeFileSync(dbPath, seed, { mode: 0o600 }));
    }

    const db = openDatabase(dbPath);
    let result: T;
    try {
      result = work(db);
    } finally {
      db.close();
    }
    return finish(dbPath, result);
  } finally {
    rmSync(dir, { recursive: true, force: true });
    logger.debug('Removed transient working copy');
  }
}

export function withTransientDatabase<T>(
  seed: Buffer | null,
  work: (db: Database) => T,
  options: TransientOptions = {}
): T {
  return runTransient(seed, work, (_dbPath, result) => result, options);
}

/** Like {@link withTransientDatabase}, also returning the file's final bytes. */
export function captureTransientDatabase<T>(
  seed: Buffer | null,
  work: (db: Database) => T,
  options: TransientOptions = {}
): CapturedResult<T> {
  return runTransient(
    seed,
    work,
    (dbPath, result) => ({
      result,
      bytes: ioOperation('read', dbPath, () => readFileSync(dbPath)),
    }),
    options
  );
}
