/**
 * Types for the Catalog (metadata index).
 *
 * The Catalog answers metadata queries without touching payloads. It is
 * NOT the source of truth for bytes: Storage is.
 */

import type { Expr } from '../filing/Expr.js';
import type { Filing } from '../filing/Filing.js';
import type { FilingResolver } from '../filing/FilingResolver.js';

/**
 * Default page size for `search`.
 */
export const DEFAULT_SEARCH_LIMIT = 100;

export type OrderDirection = 'asc' | 'desc';

/**
 * One ordering term. Requested orders always get `id asc` appended.
 */
export interface OrderBy {
  field: string;
  direction?: OrderDirection;
}

/**
 * Window and ordering for `search` / `find`.
 */
export interface SearchOptions {
  /** Maximum rows (default: 100; null: unlimited) */
  limit?: number | null;
  /** Rows to skip (default: 0) */
  offset?: number;
  /** Ordering (default: insertion order) */
  order?: readonly OrderBy[];
}

/**
 * Options for indexing one filing.
 */
export interface IndexOptions {
  /** Storage key of the filing's payload */
  storageKey?: string;
}

/**
 * One element of a batch.
 */
export interface IndexEntry {
  filing: Filing;
  storageKey?: string;
}

/**
 * Stored catalog row.
 */
export interface CatalogRecord {
  filing: Filing;
  /** Storage key recorded at index time, null when indexed without one */
  storageKey: string | null;
  indexedAt: Date;
}

export interface BatchFailure {
  id: string;
  error: Error;
}

/**
 * Outcome of `indexBatch`. Records before and after a failure stay indexed.
 */
export interface BatchResult {
  indexed: number;
  failed: BatchFailure[];
}

export interface CatalogStats {
  total: number;
  /** Record count per source */
  sources: Record<string, number>;
  /** Earliest `createdAt` */
  earliest: Date | null;
  /** Latest `createdAt` */
  latest: Date | null;
}

/**
 * Queryable index of filing metadata, keyed by filing id.
 */
export interface Catalog {
  /** Insert or replace the record for `filing.id` */
  index(filing: Filing, options?: IndexOptions): Promise<void>;

  /** Index many filings, committing each one separately */
  indexBatch(entries: ReadonlyArray<Filing | IndexEntry>): Promise<BatchResult>;

  /** Filings matching an expression (all filings without one) */
  search(expr?: Expr | null, options?: SearchOptions): Promise<Filing[]>;

  /** Like `search`, with storage keys and index times */
  find(expr?: Expr | null, options?: SearchOptions): Promise<CatalogRecord[]>;

  /** Number of filings matching an expression */
  count(expr?: Expr | null): Promise<number>;

  /** Record for an id, or null */
  get(id: string): Promise<CatalogRecord | null>;

  has(id: string): Promise<boolean>;

  /** Remove every record */
  clear(): Promise<void>;

  stats(): Promise<CatalogStats>;

  /** Release resources; further calls fail */
  close(): Promise<void>;
}

/**
 * Options shared by Catalog implementations.
 */
export interface CatalogConfig {
  /** Resolver used to rebuild filings from stored rows */
  resolver?: FilingResolver;
}
