import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdirSync } from 'node:fs';
import {
  captureTransientDatabase,
  withTransientDatabase,
} from '../../persistence/transientDatabase.js';
import { createTempDir, removeTempDir } from '../fixtures.js';

describe('transient databases', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(tmpDir);
  });

  it('creates the journal schema in a fresh working copy', () => {
    const row = withTransientDatabase(
      null,
      (db) => db.prepare('SELECT COUNT(*) AS count FROM entries').get() as { count: number },
      { tmpDir }
    );
    expect(row.count).toBe(0);
    expect(readdirSync(tmpDir)).toEqual([]);
  });

  it('captures the file bytes after closing', () => {
    const { bytes } = captureTransientDatabase(null, () => undefined, { tmpDir });
    expect(bytes.subarray(0, 16).toString('latin1')).toBe('SQLite format 3\u0000');
    expect(readdirSync(tmpDir)).toEqual([]);
  });

  it('reopens captured bytes as a seed', () => {
    const { bytes } = captureTransientDatabase(
      null,
      (db) => {
        db.prepare(
          'INSERT INTO entries (id, date, content, created_at, updated_at) VALUES (?, ?, ?, ?, ?)'
        ).run('e1', '2024-01-01', 'seeded', '2024-01-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z');
      },
      { tmpDir }
    );

    const content = withTransientDatabase(
      bytes,
      (db) => (db.prepare('SELECT content FROM entries').get() as { content: string }).content,
      { tmpDir }
    );
    expect(content).toBe('seeded');
  });

  it('removes the working copy when the work throws', () => {
    expect(() =>
      withTransientDatabase(
        null,
        () => {
          throw new Error('boom');
        },
        { tmpDir }
      )
    ).toThrow('boom');
    expect(readdirSync(tmpDir)).toEqual([]);
  });
});
