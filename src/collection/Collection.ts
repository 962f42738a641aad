/**
 * Collection: facade over Locator, Storage and Catalog.
 *
 * This class orchestrates:
 * - Checksum verification of payloads (on write and on read)
 * - Storage key derivation (via Locator)
 * - Payload persistence (via Storage)
 * - Metadata indexing and search (via Catalog)
 *
 * `add` writes the payload, then its manifest, then the catalog record.
 * These are separate steps: a crash in between leaves a payload without a
 * record, which `verifyIntegrity` reports and `rebuildIndex` recovers.
 */

import { join, resolve } from 'node:path';
import type { Catalog, CatalogRecord, SearchOptions } from '../catalog/types.js';
import { SqliteCatalog } from '../catalog/SqliteCatalog.js';
import { parseDocument } from '../catalog/records.js';
import {
  ChecksumMismatchError,
  FilingVaultError,
  StorageNotFoundError,
} from '../core/errors.js';
import type { Expr } from '../filing/Expr.js';
import type { Filing } from '../filing/Filing.js';
import type { FilingResolver } from '../filing/FilingResolver.js';
import { createDefaultResolver } from '../filing/FilingResolver.js';
import { checksumsMatch, sha256Hex } from '../filing/FilingId.js';
import { componentLogger } from '../logging/logger.js';
import { LocalStorage } from '../storage/LocalStorage.js';
import type { Storage } from '../storage/types.js';
import type { Locator } from './Locator.js';
import { createLocator } from './Locator.js';
import type { AddResult, CollectionOptions, GetResult, IntegrityReport } from './types.js';
import { MANIFEST_SUFFIX } from './types.js';

const log = componentLogger('collection');

/**
 * Catalog page size used when walking every record.
 */
const SCAN_PAGE_SIZE = 500;

/**
 * Default root, relative to the working directory.
 */
export const DEFAULT_ROOT_DIR = join('.filing-vault', 'collection');

export function manifestKey(storageKey: string): string {
  return `${storageKey}${MANIFEST_SUFFIX}`;
}

function isManifestKey(key: string): boolean {
  return key.endsWith(MANIFEST_SUFFIX);
}

export class Collection {
  readonly rootDir: string;
  readonly storage: Storage;
  readonly catalog: Catalog;
  readonly locator: Locator;
  readonly resolver: FilingResolver;
  private readonly manifests: boolean;

  constructor(options: CollectionOptions = {}) {
    this.rootDir = resolve(options.rootDir ?? DEFAULT_ROOT_DIR);
    this.resolver = options.resolver ?? createDefaultResolver();
    this.storage = options.storage ?? new LocalStorage({ rootDir: join(this.rootDir, 'files') });
    this.catalog =
      options.catalog ??
      new SqliteCatalog({ path: join(this.rootDir, 'catalog.db'), resolver: this.resolver });
    this.locator = options.locator ?? createLocator(options.spec ?? 'default');
    this.manifests = options.manifests ?? true;
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Store a filing and its payload. Re-adding an id replaces both.
   *
   * @throws ChecksumMismatchError when `content` does not hash to `filing.checksum`
   * @throws LocatorPathResolutionError when no storage key can be derived
   */
  async add(filing: Filing, content: Uint8Array): Promise<AddResult> {
    const actual = sha256Hex(content);
    if (!checksumsMatch(filing.checksum, actual)) {
      throw new ChecksumMismatchError(filing.id, filing.checksum, actual);
    }

    const key = this.locator.resolve(filing);
    const previous = await this.catalog.get(filing.id);

    const saved = await this.storage.save(content, key);
    if (this.manifests) {
      await this.storage.save(
        Buffer.from(JSON.stringify(filing.toDict(), null, 2)),
        manifestKey(saved.key)
      );
    }
    await this.catalog.index(filing, { storageKey: saved.key });

    if (previous !== null && previous.storageKey !== null && previous.storageKey !== saved.key) {
      await this.removePayload(previous.storageKey);
    }

    log.info(
      { id: filing.id, key: saved.key, size: saved.size },
      previous === null ? 'added filing' : 'replaced filing'
    );
    return { filing, storageKey: saved.key, location: saved.location };
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Metadata for an id, rebuilt as its registered class; null when absent.
   */
  async getFiling(id: string): Promise<Filing | null> {
    const record = await this.catalog.get(id);
    return record?.filing ?? null;
  }

  /**
   * Payload for an id; null when the id is unknown or its payload is gone.
   *
   * @throws ChecksumMismatchError when the stored bytes were altered
   */
  async getContent(id: string): Promise<Buffer | null> {
    const record = await this.catalog.get(id);
    if (record === null) {
      return null;
    }
    const loaded = await this.loadPayload(record);
    return loaded?.content ?? null;
  }

  /**
   * Metadata, payload and location for an id.
   *
   * @throws ChecksumMismatchError when the stored bytes were altered
   */
  async get(id: string): Promise<GetResult> {
    const record = await this.catalog.get(id);
    if (record === null) {
      return { filing: null, content: null, location: null };
    }
    const loaded = await this.loadPayload(record);
    return {
      filing: record.filing,
      content: loaded?.content ?? null,
      location: loaded === null ? null : this.storage.locate(loaded.key),
    };
  }

  async has(id: string): Promise<boolean> {
    return this.catalog.has(id);
  }

  async search(expr?: Expr | null, options?: SearchOptions): Promise<Filing[]> {
    return this.catalog.search(expr, options);
  }

  async count(expr?: Expr | null): Promise<number> {
    return this.catalog.count(expr);
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /**
   * Check every catalog record against storage and list stored payloads
   * no record points to.
   */
  async verifyIntegrity(): Promise<IntegrityReport> {
    const report: IntegrityReport = {
      checked: 0,
      missingPayload: [],
      checksumMismatch: [],
      orphanedPayload: [],
    };
    const referenced = new Set<string>();

    await this.eachRecord(async (record) => {
      report.checked++;
      const key = this.storageKeyOf(record);
      referenced.add(key);
      try {
        const content = await this.storage.load(key);
        if (!checksumsMatch(record.filing.checksum, sha256Hex(content))) {
          report.checksumMismatch.push(record.filing.id);
        }
      } catch (err) {
        if (!(err instanceof StorageNotFoundError)) throw err;
        report.missingPayload.push(record.filing.id);
      }
    });

    for (const key of await this.storage.list()) {
      if (!isManifestKey(key) && !referenced.has(key)) {
        report.orphanedPayload.push(key);
      }
    }

    if (report.missingPayload.length > 0 || report.checksumMismatch.length > 0) {
      log.error(
        { missing: report.missingPayload, mismatched: report.checksumMismatch },
        'collection integrity check failed'
      );
    } else if (report.orphanedPayload.length > 0) {
      log.warn({ orphaned: report.orphanedPayload }, 'payloads without catalog records');
    }
    return report;
  }

  /**
   * Rebuild the catalog from the manifests stored beside payloads. Manifests
   * whose payload is gone are skipped.
   *
   * @returns the number of records indexed
   */
  async rebuildIndex(): Promise<number> {
    if (!this.manifests) {
      throw new FilingVaultError('Cannot rebuild the index of a collection without manifests', {
        rootDir: this.rootDir,
      });
    }

    const entries: Array<{ filing: Filing; storageKey: string }> = [];
    for (const key of await this.storage.list()) {
      if (!isManifestKey(key)) continue;
      const storageKey = key.slice(0, -MANIFEST_SUFFIX.length);
      if (!(await this.storage.exists(storageKey))) {
        log.warn({ manifest: key }, 'manifest without payload skipped');
        continue;
      }
      try {
        const raw = await this.storage.load(key);
        const filing = this.resolver.reconstruct(parseDocument(raw.toString('utf8')));
        entries.push({ filing, storageKey });
      } catch (err) {
        log.warn({ manifest: key, err }, 'unreadable manifest skipped');
      }
    }

    await this.catalog.clear();
    const result = await this.catalog.indexBatch(entries);
    log.info({ indexed: result.indexed, failed: result.failed.length }, 'rebuilt catalog');
    return result.indexed;
  }

  async close(): Promise<void> {
    await this.catalog.close();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private storageKeyOf(record: CatalogRecord): string {
    return record.storageKey ?? this.locator.resolve(record.filing);
  }

  private async loadPayload(record: CatalogRecord): Promise<{ key: string; content: Buffer } | null> {
    const key = this.storageKeyOf(record);
    let content: Buffer;
    try {
      content = await this.storage.load(key);
    } catch (err) {
      if (!(err instanceof StorageNotFoundError)) throw err;
      log.warn({ id: record.filing.id, key }, 'catalog record has no payload');
      return null;
    }

    const actual = sha256Hex(content);
    if (!checksumsMatch(record.filing.checksum, actual)) {
      log.error({ id: record.filing.id, key, expected: record.filing.checksum, actual }, 'payload checksum mismatch');
      throw new ChecksumMismatchError(record.filing.id, record.filing.checksum, actual);
    }
    return { key, content };
  }

  private async removePayload(key: string): Promise<void> {
    await this.storage.delete(key);
    if (this.manifests) {
      await this.storage.delete(manifestKey(key));
    }
    log.debug({ key }, 'removed superseded payload');
  }

  private async eachRecord(visit: (record: CatalogRecord) => Promise<void>): Promise<void> {
    for (let offset = 0; ; offset += SCAN_PAGE_SIZE) {
      const page = await this.catalog.find(null, { limit: SCAN_PAGE_SIZE, offset });
      for (const record of page) {
        await visit(record);
      }
      if (page.length < SCAN_PAGE_SIZE) return;
    }
  }
}

/**
 * Create a Collection.
 */
export function createCollection(options: CollectionOptions = {}): Collection {
  return new Collection(options);
}
