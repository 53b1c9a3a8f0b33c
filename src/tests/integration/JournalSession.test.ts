import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { JournalSession } from '../../core/journal/JournalSession.js';
import type { JournalDescriptor } from '../../model/journal.js';
import type { JournalStorePort } from '../../ports/JournalStorePort.js';
import {
  ConfigError,
  DuplicateDateError,
  InvalidCredentialError,
  InvalidEntryError,
  NotFoundError,
} from '../../utils/errors.js';
import { createTempDir, makeEntry, removeTempDir } from '../fixtures.js';

const T1 = new Date('2024-01-01T08:00:00.000Z');
const T2 = new Date('2024-01-01T09:00:00.000Z');
const T3 = new Date('2024-01-01T10:00:00.000Z');

describe('JournalSession', () => {
  let dir: string;
  let descriptor: JournalDescriptor;

  beforeEach(() => {
    dir = createTempDir();
    descriptor = { name: 'Test', path: join(dir, 'journal.db'), encrypted: false };
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('creates an entry with a generated id and no history', () => {
    const session = JournalSession.open(descriptor);

    const entry = session.saveEntry({ date: '2024-01-01', content: 'A' }, T1);

    expect(entry.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(entry).toMatchObject({ content: 'A', createdAt: T1, updatedAt: T1, history: [] });
    expect(session.findByDate('2024-01-01')).toBe(entry);
  });

  it('keeps the previous content when it changes, and only then', () => {
    const session = JournalSession.open(descriptor);
    const { id } = session.saveEntry({ date: '2024-01-01', content: 'A' }, T1);

    session.saveEntry({ id, date: '2024-01-01', content: 'B' }, T2);
    const unchanged = session.saveEntry({ id, date: '2024-01-01', content: 'B' }, T3);

    expect(unchanged.history).toEqual([{ content: 'A', savedAt: T1, attachments: [] }]);
    expect(unchanged.updatedAt).toEqual(T3);

    const reopened = JournalSession.open(descriptor);
    const stored = reopened.findEntry(id);
    expect(stored?.content).toBe('B');
    expect(stored?.createdAt).toEqual(T1);
    expect(stored?.history).toEqual([{ content: 'A', savedAt: T1, attachments: [] }]);
  });

  it('moves an entry to a free date', () => {
    const session = JournalSession.open(descriptor);
    const { id } = session.saveEntry({ date: '2024-01-01', content: 'A' }, T1);

    session.saveEntry({ id, date: '2024-01-03', content: 'A' }, T2);

    expect(session.findByDate('2024-01-01')).toBeUndefined();
    expect(JournalSession.open(descriptor).findByDate('2024-01-03')?.id).toBe(id);
  });

  it('rejects a second entry on a taken date and keeps memory as it was', () => {
    const session = JournalSession.open(descriptor);
    const first = session.saveEntry({ date: '2024-01-01', content: 'A' }, T1);

    expect(() => session.saveEntry({ date: '2024-01-01', content: 'other' }, T2)).toThrow(
      DuplicateDateError
    );
    expect(session.entries).toEqual([first]);
  });

  it('rejects malformed drafts', () => {
    const session = JournalSession.open(descriptor);

    expect(() => session.saveEntry({ date: '2024-02-30', content: 'x' })).toThrow(InvalidEntryError);
    expect(() => session.saveEntry({ date: '01/02/2024', content: 'x' })).toThrow(InvalidEntryError);
    expect(() => session.saveEntry({ id: 'nope', date: '2024-01-01', content: 'x' })).toThrow(
      NotFoundError
    );
    expect(session.entries).toEqual([]);
  });

  it('orders entries newest date first', () => {
    const session = JournalSession.open(descriptor);
    session.saveEntry({ date: '2024-01-02', content: 'b' }, T1);
    session.saveEntry({ date: '2024-03-01', content: 'c' }, T1);
    session.saveEntry({ date: '2023-12-31', content: 'a' }, T1);

    expect(session.entries.map((e) => e.date)).toEqual(['2024-03-01', '2024-01-02', '2023-12-31']);
  });

  it('restores memory when the store fails to save', () => {
    const existing = makeEntry();
    const store: JournalStorePort = {
      path: '/unused',
      encrypted: false,
      initialize: vi.fn(),
      load: vi.fn(),
      save: vi.fn(() => {
        throw new Error('disk full');
      }),
      replace: vi.fn(),
      deleteEntry: vi.fn(),
      appendHistory: vi.fn(),
      addAttachment: vi.fn(),
      getAttachment: vi.fn(),
      listAttachments: vi.fn(),
      deleteAttachment: vi.fn(),
      compact: vi.fn(),
    };
    const session = new JournalSession(descriptor, store, { entries: [existing] });

    expect(() =>
      session.saveEntry({ id: 'entry-1', date: '2024-01-01', content: 'changed' }, T2)
    ).toThrow('disk full');

    expect(session.entries).toEqual([existing]);
    expect(session.findEntry('entry-1')?.history).toEqual([]);
  });

  it('deletes an entry with everything attached to it', () => {
    const session = JournalSession.open(descriptor);
    const { id } = session.saveEntry({ date: '2024-01-01', content: 'A' }, T1);
    const source = join(dir, 'note.txt');
    writeFileSync(source, 'hi');
    const attachment = session.addAttachment(id, source, T2);

    session.deleteEntry(id);

    expect(session.entries).toEqual([]);
    expect(JournalSession.open(descriptor).entries).toEqual([]);
    expect(() => session.attachments.fetch(attachment.id)).toThrow(NotFoundError);
    expect(() => session.deleteEntry(id)).toThrow(NotFoundError);
  });

  it('builds a timeline from edits and attachments', () => {
    const session = JournalSession.open(descriptor);
    const { id } = session.saveEntry({ date: '2024-01-01', content: 'A' }, T1);
    const source = join(dir, 'photo.jpg');
    writeFileSync(source, 'jpg');
    session.addAttachment(id, source, T2);
    session.saveEntry({ id, date: '2024-01-01', content: 'B' }, T3);

    const versions = session.timeline(id);

    expect(versions.map((v) => [v.label, v.content, v.attachments])).toEqual([
      ['Current', 'B', ['photo.jpg']],
      ['v2', 'A', ['photo.jpg']],
      ['v1', 'A', []],
    ]);
    expect(versions.map((v) => v.savedAt)).toEqual([T3, new Date(T2.getTime() + 1), T2]);
    expect(() => session.timeline('missing')).toThrow(NotFoundError);
  });

  it('keeps both snapshots when an attachment lands in the same millisecond as the entry', () => {
    const session = JournalSession.open(descriptor);
    const { id } = session.saveEntry({ date: '2024-01-01', content: 'A' }, T1);
    const source = join(dir, 'photo.png');
    writeFileSync(source, 'png');
    session.addAttachment(id, source, T1);
    session.saveEntry({ id, date: '2024-01-01', content: 'B' }, T2);

    const inMemory = session.findEntry(id)?.history ?? [];
    session.reload();
    const onDisk = session.findEntry(id)?.history ?? [];

    expect(inMemory).toHaveLength(2);
    expect(onDisk).toHaveLength(2);
    expect(onDisk.map((h) => [h.content, h.savedAt, h.attachments])).toEqual([
      ['A', new Date(T1.getTime() + 1), ['photo.png']],
      ['A', T1, []],
    ]);
  });

  it('does not duplicate history read from an older store when saving again', () => {
    const seed = new Database(descriptor.path);
    seed.exec(`
      CREATE TABLE entries (
        id TEXT PRIMARY KEY, date TEXT NOT NULL UNIQUE, content TEXT NOT NULL,
        created_at DATETIME NOT NULL, updated_at DATETIME NOT NULL
      );
      CREATE TABLE history (
        id INTEGER PRIMARY KEY AUTOINCREMENT, entry_id TEXT NOT NULL,
        content TEXT NOT NULL, saved_at DATETIME NOT NULL
      );
      INSERT INTO entries VALUES ('e1', '2024-01-01', 'B',
        '2024-01-01 07:00:00+00:00', '2024-01-01 09:00:00.5+00:00');
      INSERT INTO history (entry_id, content, saved_at)
        VALUES ('e1', 'A', '2024-01-01 08:00:00.123456789+00:00');
    `);
    seed.close();

    const session = JournalSession.open(descriptor);
    session.saveEntry({ id: 'e1', date: '2024-01-01', content: 'B' }, T3);
    session.saveEntry({ date: '2024-01-02', content: 'other' }, T3);

    const history = JournalSession.open(descriptor).findEntry('e1')?.history;
    expect(history).toEqual([
      { content: 'A', savedAt: new Date('2024-01-01T08:00:00.123Z'), attachments: [] },
    ]);
  });

  it('exports and deletes attachments through the entry', () => {
    const session = JournalSession.open(descriptor);
    const { id } = session.saveEntry({ date: '2024-01-01', content: 'A' }, T1);
    const source = join(dir, 'note.txt');
    writeFileSync(source, 'hi');
    const attachment = session.addAttachment(id, source, T2);

    const exported = session.exportAttachment(attachment.id, join(dir, 'copy.txt'));
    session.deleteAttachment(id, attachment.id);
    session.compact();
    session.reload();

    expect(exported).toBe(join(dir, 'copy.txt'));
    expect(session.findEntry(id)?.attachments).toEqual([]);
  });

  describe('encrypted', () => {
    let tmpDir: string;
    let encrypted: JournalDescriptor;

    beforeEach(() => {
      tmpDir = createTempDir('dayvault-work-');
      encrypted = { name: 'Secret', path: join(dir, 'journal.enc'), encrypted: true };
    });

    afterEach(() => {
      removeTempDir(tmpDir);
    });

    it('persists entries under the password', () => {
      const session = JournalSession.open(encrypted, { password: 'test-secret', tmpDir });
      session.saveEntry({ date: '2024-01-01', content: 'hidden' }, T1);

      const reopened = JournalSession.open(encrypted, { password: 'test-secret', tmpDir });
      expect(reopened.entries.map((e) => e.content)).toEqual(['hidden']);
    });

    it('refuses the wrong password', () => {
      JournalSession.open(encrypted, { password: 'test-secret', tmpDir }).saveEntry(
        { date: '2024-01-01', content: 'hidden' },
        T1
      );

      expect(() => JournalSession.open(encrypted, { password: 'not-it', tmpDir })).toThrow(
        InvalidCredentialError
      );
    });

    it('needs a password', () => {
      expect(() => JournalSession.open(encrypted, { tmpDir })).toThrow(ConfigError);
    });
  });
});
