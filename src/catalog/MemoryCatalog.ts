/**
 * MemoryCatalog: in-process Catalog.
 *
 * Records are kept as JSON snapshots in insertion order and rebuilt through
 * the FilingResolver on every read, so callers never share instances with
 * the catalog. Query semantics match SqliteCatalog.
 */

import type { Expr } from '../filing/Expr.js';
import type { Filing } from '../filing/Filing.js';
import type { FilingResolver } from '../filing/FilingResolver.js';
import { createDefaultResolver } from '../filing/FilingResolver.js';
import { FilingVaultError } from '../core/errors.js';
import { componentLogger } from '../logging/logger.js';
import type {
  BatchResult,
  Catalog,
  CatalogConfig,
  CatalogRecord,
  CatalogStats,
  IndexEntry,
  IndexOptions,
  SearchOptions,
} from './types.js';
import { declaredFieldTypes, resolveWindow } from './operands.js';
import { compareValues, evaluateExpr, validateExpr } from './evaluateExpr.js';
import { toIndexEntry, parseDocument, summarize } from './records.js';

const log = componentLogger('catalog');

interface StoredRecord {
  document: Record<string, unknown>;
  json: string;
  storageKey: string | null;
  indexedAt: Date;
}

export class MemoryCatalog implements Catalog {
  private readonly resolver: FilingResolver;
  private readonly records: Map<string, StoredRecord> = new Map();
  private closed = false;

  constructor(config: CatalogConfig = {}) {
    this.resolver = config.resolver ?? createDefaultResolver();
  }

  async index(filing: Filing, options: IndexOptions = {}): Promise<void> {
    this.assertOpen();
    const json = JSON.stringify(filing.toDict());
    this.records.set(filing.id, {
      document: parseDocument(json),
      json,
      storageKey: options.storageKey ?? null,
      indexedAt: new Date(),
    });
  }

  async indexBatch(entries: ReadonlyArray<Filing | IndexEntry>): Promise<BatchResult> {
    this.assertOpen();
    const result: BatchResult = { indexed: 0, failed: [] };
    for (const item of entries) {
      const entry = toIndexEntry(item);
      try {
        await this.index(
          entry.filing,
          entry.storageKey !== undefined ? { storageKey: entry.storageKey } : {}
        );
        result.indexed++;
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        log.warn({ id: entry.filing.id, err: error }, 'failed to index filing');
        result.failed.push({ id: entry.filing.id, error });
      }
    }
    return result;
  }

  async search(expr?: Expr | null, options?: SearchOptions): Promise<Filing[]> {
    const records = await this.find(expr, options);
    return records.map((record) => record.filing);
  }

  async find(expr?: Expr | null, options?: SearchOptions): Promise<CatalogRecord[]> {
    this.assertOpen();
    const { limit, offset, order } = resolveWindow(options);
    let matches = this.matching(expr);

    if (order.length > 0) {
      matches = [...matches].sort((a, b) => {
        for (const term of order) {
          const diff = compareValues(a.document[term.field], b.document[term.field]);
          if (diff !== 0) {
            return term.direction === 'desc' ? -diff : diff;
          }
        }
        return 0;
      });
    }

    const window = matches.slice(offset, limit === null ? undefined : offset + limit);
    return window.map((stored) => this.toRecord(stored));
  }

  async count(expr?: Expr | null): Promise<number> {
    this.assertOpen();
    return this.matching(expr).length;
  }

  async get(id: string): Promise<CatalogRecord | null> {
    this.assertOpen();
    const stored = this.records.get(id);
    return stored === undefined ? null : this.toRecord(stored);
  }

  async has(id: string): Promise<boolean> {
    this.assertOpen();
    return this.records.has(id);
  }

  async clear(): Promise<void> {
    this.assertOpen();
    this.records.clear();
  }

  async stats(): Promise<CatalogStats> {
    this.assertOpen();
    return summarize(
      [...this.records.values()].map((stored) => ({
        source: stored.document['source'],
        createdAt: stored.document['createdAt'],
      }))
    );
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private matching(expr: Expr | null | undefined): StoredRecord[] {
    const all = [...this.records.values()];
    if (expr === undefined || expr === null) {
      return all;
    }
    const declared = declaredFieldTypes(this.resolver);
    validateExpr(expr, declared);
    return all.filter((stored) => evaluateExpr(expr, stored.document, declared) === true);
  }

  private toRecord(stored: StoredRecord): CatalogRecord {
    return {
      filing: this.resolver.reconstruct(parseDocument(stored.json)),
      storageKey: stored.storageKey,
      indexedAt: new Date(stored.indexedAt.getTime()),
    };
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new FilingVaultError('Catalog is closed');
    }
  }
}
