/**
 * Tests for the Collection facade.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { Collection, manifestKey } from './Collection.js';
import { MemoryCatalog } from '../catalog/MemoryCatalog.js';
import { MemoryStorage } from '../storage/MemoryStorage.js';
import {
  ChecksumMismatchError,
  FilingVaultError,
  LocatorPathResolutionError,
} from '../core/errors.js';
import { field } from '../filing/Field.js';
import { Filing } from '../filing/Filing.js';
import { EdinetFiling } from '../filing/EdinetFiling.js';
import { EdgarFiling } from '../filing/EdgarFiling.js';
import { sha256Hex } from '../filing/FilingId.js';
import { HELLO, HELLO_SHA256, edgarFor, edinetFor, makeEdgar, makeEdinet } from '../testing/fixtures.js';

const E1 = 'edinet:S100TEST:abcd';
const G1 = 'edgar:0000000001-24-000001:2cf24dba';
const E1_KEY = 'edinet/edinet_S100TEST_abcd.xbrl';
const G1_KEY = 'edgar/edgar_0000000001-24-000001_2cf24dba.htm';

describe('Collection', () => {
  let storage: MemoryStorage;
  let catalog: MemoryCatalog;
  let collection: Collection;

  beforeEach(() => {
    storage = new MemoryStorage();
    catalog = new MemoryCatalog();
    collection = new Collection({ storage, catalog });
  });

  afterEach(async () => {
    await collection.close();
  });

  describe('add', () => {
    it('stores the payload, its manifest and the catalog record', async () => {
      const filing = makeEdinet();
      const result = await collection.add(filing, HELLO);

      expect(result).toEqual({ filing, storageKey: E1_KEY, location: `memory://${E1_KEY}` });
      expect(await storage.list()).toEqual([E1_KEY, manifestKey(E1_KEY)]);
      expect((await catalog.get(E1))?.storageKey).toBe(E1_KEY);

      const manifest: unknown = JSON.parse((await storage.load(manifestKey(E1_KEY))).toString('utf8'));
      expect(manifest).toEqual(filing.toDict());
    });

    it('writes nothing when the checksum does not match', async () => {
      const filing = makeEdinet();

      await expect(collection.add(filing, Buffer.from('other'))).rejects.toMatchObject({
        filingId: E1,
        expected: HELLO_SHA256,
        actual: sha256Hex('other'),
      });
      await expect(collection.add(filing, Buffer.from('other'))).rejects.toThrow(ChecksumMismatchError);
      expect(await collection.has(E1)).toBe(false);
      expect(await storage.list()).toEqual([]);
    });

    it('compares checksums case-insensitively', async () => {
      const filing = makeEdinet({ checksum: HELLO_SHA256.toUpperCase() });
      await collection.add(filing, HELLO);

      expect((await collection.getContent(E1))?.toString()).toBe('hello');
    });

    it('writes nothing when no storage key can be derived', async () => {
      const edinetLayout = new Collection({ storage, catalog, spec: 'edinet' });
      const filing = Filing.fromDict({
        id: 'misc:doc-1:2cf24dba',
        source: 'misc',
        name: 'doc-1.pdf',
        checksum: HELLO_SHA256,
        isZip: false,
      });

      await expect(edinetLayout.add(filing, HELLO)).rejects.toThrow(LocatorPathResolutionError);
      expect(await catalog.count()).toBe(0);
      expect(await storage.list()).toEqual([]);
    });

    it('overwrites bytes and metadata when an id is added again', async () => {
      await collection.add(makeEdinet(), HELLO);
      await collection.add(makeEdinet(), HELLO);
      const replacement = edinetFor('world', { docDescription: 'Amended Annual Securities Report' });
      await collection.add(replacement, Buffer.from('world'));

      expect(await collection.count()).toBe(1);
      expect((await collection.getContent(E1))?.toString()).toBe('world');
      const stored = await collection.getFiling(E1);
      expect(stored).toBeInstanceOf(EdinetFiling);
      expect(stored?.get('docDescription')).toBe('Amended Annual Securities Report');
      expect(stored?.equals(replacement)).toBe(true);
    });

    it('removes the old payload when an overwrite moves the key', async () => {
      const edinetLayout = new Collection({ storage, catalog, spec: 'edinet' });
      await edinetLayout.add(makeEdinet(), HELLO);
      const moved = await edinetLayout.add(makeEdinet({ secCode: '11110' }), HELLO);

      expect(moved.storageKey).toBe('edinet/11110/2024/edinet_S100TEST_abcd.xbrl');
      expect(await storage.list()).toEqual([
        'edinet/11110/2024/edinet_S100TEST_abcd.xbrl',
        'edinet/11110/2024/edinet_S100TEST_abcd.xbrl.filing.json',
      ]);
    });

    it('keeps a base filing stored under a registered source readable', async () => {
      const filing = new Filing({
        id: E1,
        source: 'edinet',
        name: 'S100TEST.xbrl',
        checksum: HELLO_SHA256,
        isZip: false,
        createdAt: new Date('2024-06-20T06:00:00.000Z'),
      });
      expect((await collection.add(filing, HELLO)).storageKey).toBe(E1_KEY);

      const stored = await collection.getFiling(E1);
      expect(stored?.constructor).toBe(Filing);
      expect(stored?.equals(filing)).toBe(true);
      expect((await collection.getContent(E1))?.toString()).toBe('hello');
      expect((await collection.search()).map((f) => f.id)).toEqual([E1]);

      await collection.add(filing, HELLO);
      expect(await collection.count()).toBe(1);
    });

    it('skips manifests when disabled', async () => {
      const bare = new Collection({ storage, catalog, manifests: false });
      await bare.add(makeEdinet(), HELLO);

      expect(await storage.list()).toEqual([E1_KEY]);
      await expect(bare.rebuildIndex()).rejects.toThrow(FilingVaultError);
    });
  });

  describe('reads', () => {
    beforeEach(async () => {
      await collection.add(makeEdinet(), HELLO);
      await collection.add(makeEdgar(), HELLO);
    });

    it('returns null for an unknown id', async () => {
      expect(await collection.getFiling('nonexistent')).toBeNull();
      expect(await collection.getContent('nonexistent')).toBeNull();
      expect(await collection.get('nonexistent')).toEqual({ filing: null, content: null, location: null });
    });

    it('rebuilds filings as their registered classes', async () => {
      const edinet = await collection.getFiling(E1);
      const edgar = await collection.getFiling(G1);

      expect(edinet).toBeInstanceOf(EdinetFiling);
      expect(edinet?.get('secCode')).toBe('99990');
      expect(edinet?.get('periodEnd')).toEqual(new Date('2024-03-31T00:00:00.000Z'));
      expect(edgar).toBeInstanceOf(EdgarFiling);
      expect(edgar?.get('formType')).toBe('10-K');
    });

    it('returns metadata, content and location together', async () => {
      const result = await collection.get(G1);

      expect(result.filing?.id).toBe(G1);
      expect(result.content?.toString()).toBe('hello');
      expect(result.location).toBe(`memory://${G1_KEY}`);
    });

    it('returns null content when the payload is gone', async () => {
      await storage.delete(E1_KEY);

      expect(await collection.getContent(E1)).toBeNull();
      const result = await collection.get(E1);
      expect(result.filing?.id).toBe(E1);
      expect(result.content).toBeNull();
      expect(result.location).toBeNull();
    });

    it('rejects a payload altered in storage', async () => {
      await storage.save(Buffer.from('hellx'), G1_KEY);

      await expect(collection.getContent(G1)).rejects.toThrow(ChecksumMismatchError);
      await expect(collection.get(G1)).rejects.toThrow(ChecksumMismatchError);
    });

    it('derives the key for records indexed without one', async () => {
      await catalog.index(makeEdinet());

      expect((await collection.getContent(E1))?.toString()).toBe('hello');
    });

    it('searches and counts through the catalog', async () => {
      const edinet = await collection.search(field('source').eq('edinet'));

      expect(edinet.map((f) => f.id)).toEqual([E1]);
      expect(await collection.count()).toBe(2);
      expect(await collection.count(field('formType').eq('10-K'))).toBe(1);
      expect((await collection.search(null, { order: [{ field: 'source' }] })).map((f) => f.id)).toEqual([G1, E1]);
    });
  });

  describe('verifyIntegrity', () => {
    it('reports a consistent collection as clean', async () => {
      await collection.add(makeEdinet(), HELLO);

      expect(await collection.verifyIntegrity()).toEqual({
        checked: 1,
        missingPayload: [],
        checksumMismatch: [],
        orphanedPayload: [],
      });
    });

    it('reports missing, altered and orphaned payloads', async () => {
      await collection.add(makeEdinet(), HELLO);
      await collection.add(makeEdgar(), HELLO);
      await storage.delete(E1_KEY);
      await storage.save(Buffer.from('x'), G1_KEY);
      await storage.save(Buffer.from('stray'), 'edinet/stray.xbrl');

      expect(await collection.verifyIntegrity()).toEqual({
        checked: 2,
        missingPayload: [E1],
        checksumMismatch: [G1],
        orphanedPayload: ['edinet/stray.xbrl'],
      });
    });
  });

  describe('rebuildIndex', () => {
    it('restores the catalog from manifests', async () => {
      await collection.add(makeEdinet(), HELLO);
      await collection.add(edgarFor('world'), Buffer.from('world'));
      await catalog.clear();

      expect(await collection.rebuildIndex()).toBe(2);
      expect((await collection.search()).map((f) => f.id)).toEqual([G1, E1]);
      expect(await collection.getFiling(E1)).toBeInstanceOf(EdinetFiling);
      expect((await collection.getContent(G1))?.toString()).toBe('world');
      expect((await catalog.get(G1))?.storageKey).toBe(G1_KEY);
    });

    it('skips manifests whose payload is gone', async () => {
      await collection.add(makeEdinet(), HELLO);
      await collection.add(makeEdgar(), HELLO);
      await storage.delete(G1_KEY);

      expect(await collection.rebuildIndex()).toBe(1);
      expect(await collection.has(G1)).toBe(false);
    });

    it('recovers a payload stored without its catalog record', async () => {
      const unindexed = makeEdinet();
      await storage.save(HELLO, E1_KEY);
      await storage.save(Buffer.from(JSON.stringify(unindexed.toDict())), manifestKey(E1_KEY));

      expect((await collection.verifyIntegrity()).orphanedPayload).toEqual([E1_KEY]);
      expect(await collection.rebuildIndex()).toBe(1);
      expect((await collection.getFiling(E1))?.equals(unindexed)).toBe(true);
    });
  });
});

describe('Collection on disk', () => {
  let dir: string;
  let collection: Collection;

  beforeEach(async () => {
    dir = join(tmpdir(), `collection-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
    collection = new Collection({ rootDir: dir, spec: 'edinet' });
  });

  afterEach(async () => {
    await collection.close();
    await rm(dir, { recursive: true, force: true });
  });

  it('detects bytes corrupted after they were stored', async () => {
    const result = await collection.add(makeEdinet(), Buffer.from('hello'));

    expect(result.storageKey).toBe('edinet/99990/2024/edinet_S100TEST_abcd.xbrl');
    expect(result.location).toBe(join(dir, 'files', 'edinet', '99990', '2024', 'edinet_S100TEST_abcd.xbrl'));
    expect((await collection.getContent(E1))?.toString()).toBe('hello');

    await writeFile(result.location, 'hellx');

    await expect(collection.getContent(E1)).rejects.toThrow(ChecksumMismatchError);
  });

  it('persists records across instances', async () => {
    const result = await collection.add(makeEdinet(), HELLO);
    await collection.close();

    collection = new Collection({ rootDir: dir, spec: 'edinet' });
    const reread = await collection.get(E1);

    expect(reread.filing).toBeInstanceOf(EdinetFiling);
    expect(reread.content?.toString()).toBe('hello');
    expect(reread.location).toBe(result.location);
    expect(await readFile(join(dir, 'files', `${result.storageKey}.filing.json`), 'utf8')).toContain(
      '"secCode": "99990"'
    );
  });
});
