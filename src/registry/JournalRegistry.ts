import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { JournalDescriptor } from '../model/journal.js';
import { ConfigError, ioOperation } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { expandPath } from '../utils/paths.js';

const logger = createLogger({ component: 'registry' });

export const LEGACY_JOURNAL_NAME = 'Default Journal';

// Zero timestamp written by earlier versions for journals never opened
const ZERO_TIME_PREFIX = '0001-01-01';

const journalRecordSchema = z
  .object({
    name: z.string(),
    path: z.string(),
    encrypted: z.boolean().default(false),
    last_opened: z.string().optional(),
  })
  .passthrough();

/** Only the journal list and the active path are ours; other keys belong to the front end. */
const manifestSchema = z
  .object({
    database_path: z.string().optional(),
    encrypted: z.boolean().optional(),
    journals: z.array(journalRecordSchema).optional(),
    active_journal: z.string().optional(),
  })
  .passthrough();

type JournalRecord = z.infer<typeof journalRecordSchema>;
type Manifest = z.infer<typeof manifestSchema>;

function toDescriptor(record: JournalRecord): JournalDescriptor {
  const descriptor: JournalDescriptor = {
    name: record.name,
    path: record.path,
    encrypted: record.encrypted,
  };
  if (record.last_opened !== undefined && !record.last_opened.startsWith(ZERO_TIME_PREFIX)) {
    const lastOpened = new Date(record.last_opened);
    if (!Number.isNaN(lastOpened.getTime())) {
      descriptor.lastOpened = lastOpened;
    }
  }
  return descriptor;
}

/**
 * The list of known journals, kept in a small JSON manifest. Adding a journal
 * here does not create its store.
 */
export class JournalRegistry {
  private manifest: Manifest;

  constructor(
    readonly manifestPath: string,
    manifest: Manifest = {}
  ) {
    this.manifest = manifest;
  }

  static exists(manifestPath: string): boolean {
    return existsSync(expandPath(manifestPath));
  }

  /**
   * @throws ConfigError when the file is not valid JSON or has the wrong shape
   * @throws IOFailureError when it cannot be read
   */
  static load(manifestPath: string): JournalRegistry {
    const path = expandPath(manifestPath);
    const raw = ioOperation('read', path, () => readFileSync(path, 'utf-8'));

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`Invalid JSON in ${path}`, { cause: error });
    }

    const result = manifestSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Invalid journal manifest ${path}:\n${issues.join('\n')}`);
    }
    return new JournalRegistry(path, result.data);
  }

  /** Loads the manifest, or starts an empty registry when there is none yet. */
  static loadOrCreate(manifestPath: string): JournalRegistry {
    return JournalRegistry.exists(manifestPath)
      ? JournalRegistry.load(manifestPath)
      : new JournalRegistry(expandPath(manifestPath));
  }

  save(): void {
    const path = expandPath(this.manifestPath);
    ioOperation('create directory for', path, () => mkdirSync(dirname(path), { recursive: true }));
    ioOperation('write', path, () =>
      writeFileSync(path, JSON.stringify(this.manifest, null, 2) + '\n', 'utf-8')
    );
    logger.debug({ path, journals: this.records().length }, 'Saved journal manifest');
  }

  list(): JournalDescriptor[] {
    return this.records().map(toDescriptor);
  }

  add(name: string, path: string, encrypted: boolean): JournalDescriptor {
    const record: JournalRecord = { name, path, encrypted };
    this.manifest.journals = [...this.records(), record];
    return toDescriptor(record);
  }

  find(path: string): JournalDescriptor | undefined {
    const record = this.records().find((r) => r.path === path);
    return record ? toDescriptor(record) : undefined;
  }

  /** @returns whether a journal with that path was found */
  updateLastOpened(path: string, time: Date): boolean {
    const record = this.records().find((r) => r.path === path);
    if (!record) {
      return false;
    }
    record.last_opened = time.toISOString();
    return true;
  }

  remove(path: string): boolean {
    const records = this.records();
    const remaining = records.filter((r) => r.path !== path);
    this.manifest.journals = remaining;
    if (this.manifest.active_journal === path) {
      delete this.manifest.active_journal;
    }
    return remaining.length !== records.length;
  }

  /** Most recently opened first; journals never opened come last, in list order. */
  sortedByRecency(): JournalDescriptor[] {
    const openedAt = (d: JournalDescriptor): number => d.lastOpened?.getTime() ?? Number.NEGATIVE_INFINITY;
    return this.list().sort((a, b) => {
      const diff = openedAt(b) - openedAt(a);
      return Number.isNaN(diff) ? 0 : diff;
    });
  }

  setActive(path: string): void {
    this.manifest.active_journal = path;
  }

  active(): JournalDescriptor | undefined {
    const path = this.manifest.active_journal;
    return path === undefined ? undefined : this.find(path);
  }

  get activePath(): string | undefined {
    return this.manifest.active_journal;
  }

  /** Moves a path's descriptor (after a migration) and keeps it active if it was. */
  relocate(fromPath: string, toPath: string): boolean {
    const record = this.records().find((r) => r.path === fromPath);
    if (!record) {
      return false;
    }
    record.path = toPath;
    if (this.manifest.active_journal === fromPath) {
      this.manifest.active_journal = toPath;
    }
    return true;
  }

  /**
   * Converts a manifest from the single-database layout (`database_path`,
   * `encrypted`) to the journal list.
   * @returns whether anything changed
   */
  migrateLegacyFormat(): boolean {
    const legacyPath = this.manifest.database_path;
    if (!legacyPath || this.records().length > 0) {
      return false;
    }

    this.manifest.journals = [
      { name: LEGACY_JOURNAL_NAME, path: legacyPath, encrypted: this.manifest.encrypted ?? false },
    ];
    this.manifest.active_journal = legacyPath;
    delete this.manifest.database_path;
    delete this.manifest.encrypted;
    logger.info({ path: legacyPath }, 'Migrated legacy journal manifest');
    return true;
  }

  private records(): JournalRecord[] {
    return this.manifest.journals ?? [];
  }
}
