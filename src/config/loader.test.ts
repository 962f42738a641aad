/**
 * Tests for configuration loading and Collection wiring.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { defaultConfig, loadConfig, parseConfig, validateConfig } from './loader.js';
import { createCollectionFromConfig, specFromConfig } from './factory.js';
import { ConfigValidationError, FilingVaultError } from '../core/errors.js';
import { MemoryCatalog } from '../catalog/MemoryCatalog.js';
import { SqliteCatalog } from '../catalog/SqliteCatalog.js';
import { LocalStorage } from '../storage/LocalStorage.js';
import { MemoryStorage } from '../storage/MemoryStorage.js';
import { HELLO, makeEdgar, makeEdinet } from '../testing/fixtures.js';

describe('parseConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('returns the defaults for an empty document', () => {
    expect(parseConfig('')).toEqual({
      rootDir: '.filing-vault/collection',
      storage: { type: 'local' },
      catalog: { engine: 'sqlite' },
      locator: { preset: 'default' },
      manifests: true,
    });
  });

  it('merges sections over the defaults', () => {
    const config = parseConfig(
      [
        'rootDir: data/vault',
        'catalog:',
        '  path: index/meta.db',
        'locator:',
        '  preset: edinet',
        '  partitions:',
        '    - source',
        '    - field: submitDatetime',
        '      format: month',
        'manifests: false',
        'logLevel: warn',
      ].join('\n')
    );

    expect(config).toEqual({
      rootDir: 'data/vault',
      storage: { type: 'local' },
      catalog: { engine: 'sqlite', path: 'index/meta.db' },
      locator: {
        preset: 'edinet',
        partitions: ['source', { field: 'submitDatetime', format: 'month' }],
      },
      manifests: false,
      logLevel: 'warn',
    });
  });

  it('substitutes environment variables', () => {
    vi.stubEnv('VAULT_ROOT', '/srv/vault');

    const config = parseConfig(
      ['rootDir: ${VAULT_ROOT}', 'catalog:', '  path: ${VAULT_DB:-catalog-test.db}'].join('\n')
    );

    expect(config.rootDir).toBe('/srv/vault');
    expect(config.catalog.path).toBe('catalog-test.db');
  });

  it('names the offending path', () => {
    expect.assertions(3);
    try {
      parseConfig(['storage:', '  type: disk'].join('\n'));
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      expect(err).toMatchObject({ path: 'storage.type', value: 'disk' });
      expect(err).toHaveProperty('message', expect.stringMatching(/^Config validation error at 'storage\.type': /));
    }
  });

  it('rejects unknown keys and malformed partitions', () => {
    expect(() => parseConfig('colour: blue')).toThrow(ConfigValidationError);
    expect(() => validateConfig({ locator: { partitions: [] } })).toThrow(ConfigValidationError);
    expect(() => validateConfig({ locator: { partitions: [{ field: 'periodEnd', format: 'week' }] } })).toThrow(
      ConfigValidationError
    );
    expect(() => validateConfig({ locator: { defaultExtension: '../x' } })).toThrow(ConfigValidationError);
    expect(() => validateConfig(['not', 'an', 'object'])).toThrow(ConfigValidationError);
  });

  it('reports YAML syntax errors', () => {
    expect(() => parseConfig('rootDir: [unclosed')).toThrow(FilingVaultError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `config-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the file at configPath', async () => {
    const configPath = join(dir, 'filing-vault.yaml');
    await writeFile(configPath, 'catalog:\n  engine: memory\n');

    const config = await loadConfig({ configPath });
    expect(config.catalog).toEqual({ engine: 'memory' });
  });

  it('falls back to FILING_VAULT_CONFIG', async () => {
    const configPath = join(dir, 'custom.yaml');
    await writeFile(configPath, 'storage:\n  type: memory\n');
    vi.stubEnv('FILING_VAULT_CONFIG', configPath);

    expect((await loadConfig()).storage).toEqual({ type: 'memory' });
  });

  it('returns the defaults when the file is missing', async () => {
    expect(await loadConfig({ configPath: join(dir, 'absent.yaml') })).toEqual(defaultConfig());
  });
});

describe('specFromConfig', () => {
  it('applies overrides to the preset', () => {
    expect(specFromConfig({ preset: 'edgar', defaultExtension: 'txt' })).toMatchObject({
      partitions: ['source', 'cik', { field: 'filingDate', format: 'year' }],
      defaultExtension: 'txt',
      zipExtension: 'zip',
    });
  });
});

describe('createCollectionFromConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `config-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('wires local storage and a SQLite catalog under rootDir', async () => {
    const collection = createCollectionFromConfig(defaultConfig(), { cwd: dir });

    expect(collection.rootDir).toBe(join(dir, '.filing-vault', 'collection'));
    expect(collection.storage).toBeInstanceOf(LocalStorage);
    expect(collection.catalog).toBeInstanceOf(SqliteCatalog);

    const result = await collection.add(makeEdinet(), HELLO);
    expect(result.location).toBe(
      join(dir, '.filing-vault', 'collection', 'files', 'edinet', 'edinet_S100TEST_abcd.xbrl')
    );
    await collection.close();
  });

  it('wires in-memory backends and the configured layout', async () => {
    const config = parseConfig(
      ['storage:', '  type: memory', 'catalog:', '  engine: memory', 'locator:', '  preset: edgar'].join('\n')
    );
    const collection = createCollectionFromConfig(config, { cwd: dir });

    expect(collection.storage).toBeInstanceOf(MemoryStorage);
    expect(collection.catalog).toBeInstanceOf(MemoryCatalog);

    const result = await collection.add(makeEdgar(), HELLO);
    expect(result.storageKey).toBe('edgar/0000000001/2024/edgar_0000000001-24-000001_2cf24dba.htm');
    await collection.close();
  });
});
