/**
 * Tests for Storage implementations.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import type { Storage } from './types.js';
import { LocalStorage } from './LocalStorage.js';
import { MemoryStorage } from './MemoryStorage.js';
import { StorageKeyError, StorageNotFoundError } from '../core/errors.js';
import { HELLO, HELLO_SHA256 } from '../testing/fixtures.js';

interface StorageHarness {
  name: string;
  create(): Promise<Storage>;
  cleanup(): Promise<void>;
}

let testDir = '';

const harnesses: StorageHarness[] = [
  {
    name: 'LocalStorage',
    async create() {
      testDir = join(tmpdir(), `storage-test-${randomUUID()}`);
      await mkdir(testDir, { recursive: true });
      return new LocalStorage({ rootDir: testDir });
    },
    async cleanup() {
      await rm(testDir, { recursive: true, force: true });
    },
  },
  {
    name: 'MemoryStorage',
    async create() {
      return new MemoryStorage();
    },
    async cleanup() {},
  },
];

describe.each(harnesses)('$name', (harness) => {
  let storage: Storage;

  beforeEach(async () => {
    storage = await harness.create();
  });

  afterEach(async () => {
    await harness.cleanup();
  });

  it('saves and loads bytes under nested keys', async () => {
    const result = await storage.save(HELLO, 'edinet/99990/2024/doc.xbrl');

    expect(result.key).toBe('edinet/99990/2024/doc.xbrl');
    expect(result.size).toBe(5);
    expect(result.location).toBe(storage.locate('edinet/99990/2024/doc.xbrl'));
    expect((await storage.load('edinet/99990/2024/doc.xbrl')).toString()).toBe('hello');
  });

  it('overwrites an existing key', async () => {
    await storage.save(HELLO, 'a/doc.xbrl');
    await storage.save(Buffer.from('second'), 'a/doc.xbrl');

    expect((await storage.load('a/doc.xbrl')).toString()).toBe('second');
  });

  it('falls back to a checksum-named zip without a key', async () => {
    const result = await storage.save(HELLO);

    expect(result.key).toBe(`${HELLO_SHA256}.zip`);
    expect(await storage.exists(`${HELLO_SHA256}.zip`)).toBe(true);
  });

  it('reports missing keys', async () => {
    await expect(storage.load('missing/doc.xbrl')).rejects.toThrow(StorageNotFoundError);
    expect(await storage.exists('missing/doc.xbrl')).toBe(false);
    expect(await storage.delete('missing/doc.xbrl')).toBe(false);
  });

  it('deletes payloads', async () => {
    await storage.save(HELLO, 'a/doc.xbrl');

    expect(await storage.delete('a/doc.xbrl')).toBe(true);
    expect(await storage.exists('a/doc.xbrl')).toBe(false);
  });

  it('lists keys by prefix in sorted order', async () => {
    await storage.save(HELLO, 'edinet/b.xbrl');
    await storage.save(HELLO, 'edgar/x.htm');
    await storage.save(HELLO, 'edinet/a/c.xbrl');

    expect(await storage.list()).toEqual(['edgar/x.htm', 'edinet/a/c.xbrl', 'edinet/b.xbrl']);
    expect(await storage.list('edinet/')).toEqual(['edinet/a/c.xbrl', 'edinet/b.xbrl']);
    expect(await storage.list('none/')).toEqual([]);
  });

  it('does not share buffers with callers', async () => {
    const content = Buffer.from('hello');
    await storage.save(content, 'doc.xbrl');
    content.write('J');

    const loaded = await storage.load('doc.xbrl');
    loaded.write('Y');

    expect((await storage.load('doc.xbrl')).toString()).toBe('hello');
  });

  it.each(['', '/etc/passwd', '../outside.xbrl', 'a//b.xbrl', 'a/./b.xbrl', 'a\\b.xbrl'])(
    'rejects invalid key %j',
    async (key) => {
      await expect(storage.save(HELLO, key)).rejects.toThrow(StorageKeyError);
    }
  );
});

describe('LocalStorage on disk', () => {
  beforeEach(async () => {
    testDir = join(tmpdir(), `storage-test-${randomUUID()}`);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('creates the root and intermediate directories on write', async () => {
    const storage = new LocalStorage({ rootDir: join(testDir, 'not-yet') });
    const result = await storage.save(HELLO, 'x/y/z.xbrl');

    expect(result.location).toBe(join(testDir, 'not-yet', 'x', 'y', 'z.xbrl'));
    expect(await readFile(result.location, 'utf-8')).toBe('hello');
  });

  it('lists nothing when the root does not exist', async () => {
    const storage = new LocalStorage({ rootDir: join(testDir, 'absent') });

    expect(await storage.list()).toEqual([]);
  });
});
