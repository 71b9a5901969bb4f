import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { noopLogger } from '@kinesync/core';
import { FileKeyValueStorage } from '../storage/file-storage.js';
import { MMKVKeyValueStorage, type MMKVInterface } from '../storage/mmkv-adapter.js';
import { createSyncQueue } from '../sync-queue.js';
import { createSyncItem } from '../sync-item.js';

function fakeMMKV(): MMKVInterface & { values: Map<string, string> } {
  const values = new Map<string, string>();
  return {
    values,
    getString: (key) => values.get(key),
    set: (key, value) => {
      values.set(key, String(value));
    },
    delete: (key) => {
      values.delete(key);
    },
  };
}

describe('MMKVKeyValueStorage', () => {
  it('reads, writes and deletes through the MMKV instance', () => {
    const mmkv = fakeMMKV();
    const storage = new MMKVKeyValueStorage(mmkv, noopLogger);

    expect(storage.getItem('a')).toBeNull();
    expect(storage.setItem('a', '1')).toBe(true);
    expect(mmkv.values.get('a')).toBe('1');
    expect(storage.getItem('a')).toBe('1');

    storage.removeItem('a');
    expect(storage.getItem('a')).toBeNull();
  });

  it('reports a throwing write as failed', () => {
    const mmkv = fakeMMKV();
    mmkv.set = vi.fn(() => {
      throw new Error('disk full');
    });
    const storage = new MMKVKeyValueStorage(mmkv, noopLogger);

    expect(storage.setItem('a', '1')).toBe(false);
  });
});

describe('FileKeyValueStorage', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kinesync-storage-'));
    filePath = join(dir, 'nested', 'sync.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', () => {
    const storage = new FileKeyValueStorage(filePath, { logger: noopLogger });

    expect(storage.getItem('a')).toBeNull();
  });

  it('writes every key into one JSON file', () => {
    const storage = new FileKeyValueStorage(filePath, { logger: noopLogger });

    expect(storage.setItem('a', '1')).toBe(true);
    expect(storage.setItem('b', '[]')).toBe(true);
    storage.removeItem('a');

    expect(JSON.parse(readFileSync(filePath, 'utf8'))).toEqual({ b: '[]' });
  });

  it('reads back what an earlier instance wrote', () => {
    new FileKeyValueStorage(filePath, { logger: noopLogger }).setItem('a', 'hello');

    const reopened = new FileKeyValueStorage(filePath, { logger: noopLogger });

    expect(reopened.getItem('a')).toBe('hello');
  });

  it('recovers from a corrupt file', () => {
    new FileKeyValueStorage(filePath, { logger: noopLogger }).setItem('a', '1');
    writeFileSync(filePath, '{oops', 'utf8');

    const storage = new FileKeyValueStorage(filePath, { logger: noopLogger });

    expect(storage.getItem('a')).toBeNull();
    expect(storage.setItem('a', '2')).toBe(true);
    expect(storage.getItem('a')).toBe('2');
  });

  it('ignores non-string values', () => {
    writeFileSync(join(dir, 'flat.json'), JSON.stringify({ a: '1', b: 2 }), 'utf8');

    const storage = new FileKeyValueStorage(join(dir, 'flat.json'), { logger: noopLogger });

    expect(storage.getItem('a')).toBe('1');
    expect(storage.getItem('b')).toBeNull();
  });

  it('returns false and keeps the old value when the write fails', () => {
    const blocked = join(dir, 'blocked');
    writeFileSync(blocked, 'a file, not a directory', 'utf8');
    const storage = new FileKeyValueStorage(join(blocked, 'sync.json'), { logger: noopLogger });

    expect(storage.setItem('a', '1')).toBe(false);
    expect(storage.getItem('a')).toBeNull();
  });

  it('persists a sync queue across restarts', () => {
    const first = createSyncQueue({
      storage: new FileKeyValueStorage(filePath, { logger: noopLogger }),
      logger: noopLogger,
    });
    first.enqueue(
      createSyncItem({
        id: 'session-1',
        entityType: 'session',
        operationType: 'create',
        data: { notes: 'squats' },
        createdAt: 0,
      })
    );
    first.destroy();

    const second = createSyncQueue({
      storage: new FileKeyValueStorage(filePath, { logger: noopLogger }),
      logger: noopLogger,
    });
    second.load();

    expect(second.peek()?.data).toEqual({ notes: 'squats' });
    second.destroy();
  });
});
