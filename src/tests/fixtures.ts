import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Entry } from '../model/journal.js';

export function createTempDir(prefix = 'dayvault-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function makeEntry(overrides: Partial<Entry> = {}): Entry {
  return {
    id: 'entry-1',
    date: '2024-01-01',
    content: 'first day',
    createdAt: new Date('2024-01-01T08:00:00.000Z'),
    updatedAt: new Date('2024-01-01T08:00:00.000Z'),
    history: [],
    attachments: [],
    ...overrides,
  };
}
