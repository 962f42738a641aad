/**
 * Builds a Collection from loaded configuration.
 */

import { resolve } from 'node:path';
import type { Catalog } from '../catalog/types.js';
import { MemoryCatalog } from '../catalog/MemoryCatalog.js';
import { MEMORY_DATABASE, SqliteCatalog } from '../catalog/SqliteCatalog.js';
import { Collection } from '../collection/Collection.js';
import type { CollectionSpec } from '../collection/Locator.js';
import { COLLECTION_SPEC_PRESETS, Locator } from '../collection/Locator.js';
import type { FilingResolver } from '../filing/FilingResolver.js';
import { createDefaultResolver } from '../filing/FilingResolver.js';
import { setLogLevel } from '../logging/logger.js';
import { LocalStorage } from '../storage/LocalStorage.js';
import { MemoryStorage } from '../storage/MemoryStorage.js';
import type { Storage } from '../storage/types.js';
import type { LocatorConfig, VaultConfig } from './types.js';

export interface CreateFromConfigOptions {
  /** Directory relative paths resolve against (default: process.cwd()) */
  cwd?: string;
  resolver?: FilingResolver;
}

/**
 * Collection spec for a locator section: the preset with its overrides.
 */
export function specFromConfig(config: LocatorConfig): CollectionSpec {
  return {
    ...COLLECTION_SPEC_PRESETS[config.preset],
    ...(config.partitions !== undefined && { partitions: config.partitions }),
    ...(config.defaultExtension !== undefined && { defaultExtension: config.defaultExtension }),
    ...(config.zipExtension !== undefined && { zipExtension: config.zipExtension }),
  };
}

/**
 * Create a Collection wired as the configuration describes.
 */
export function createCollectionFromConfig(
  config: VaultConfig,
  options: CreateFromConfigOptions = {}
): Collection {
  if (config.logLevel !== undefined) {
    setLogLevel(config.logLevel);
  }

  const rootDir = resolve(options.cwd ?? process.cwd(), config.rootDir);
  const resolver = options.resolver ?? createDefaultResolver();

  const storage: Storage =
    config.storage.type === 'memory'
      ? new MemoryStorage()
      : new LocalStorage({ rootDir: resolve(rootDir, config.storage.rootDir ?? 'files') });

  let catalog: Catalog;
  if (config.catalog.engine === 'memory') {
    catalog = new MemoryCatalog({ resolver });
  } else {
    const path = config.catalog.path ?? 'catalog.db';
    catalog = new SqliteCatalog({
      path: path === MEMORY_DATABASE ? MEMORY_DATABASE : resolve(rootDir, path),
      resolver,
    });
  }

  return new Collection({
    rootDir,
    storage,
    catalog,
    locator: new Locator(specFromConfig(config.locator)),
    resolver,
    manifests: config.manifests,
  });
}
