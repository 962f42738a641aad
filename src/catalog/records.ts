/**
 * Helpers shared by Catalog implementations for stored records.
 */

import { FilingVaultError } from '../core/errors.js';
import { Filing } from '../filing/Filing.js';
import type { CatalogStats, IndexEntry } from './types.js';

export function toIndexEntry(item: Filing | IndexEntry): IndexEntry {
  return item instanceof Filing ? { filing: item } : item;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a stored filing document.
 */
export function parseDocument(json: string): Record<string, unknown> {
  const value: unknown = JSON.parse(json);
  if (!isRecord(value)) {
    throw new FilingVaultError('Stored filing document is not a JSON object', { json });
  }
  return value;
}

/**
 * Aggregate per-source counts and the `createdAt` range.
 */
export function summarize(rows: ReadonlyArray<{ source: unknown; createdAt: unknown }>): CatalogStats {
  const sources: Record<string, number> = {};
  let earliest: string | null = null;
  let latest: string | null = null;

  for (const row of rows) {
    if (typeof row.source === 'string') {
      sources[row.source] = (sources[row.source] ?? 0) + 1;
    }
    if (typeof row.createdAt === 'string') {
      if (earliest === null || row.createdAt < earliest) earliest = row.createdAt;
      if (latest === null || row.createdAt > latest) latest = row.createdAt;
    }
  }

  return {
    total: rows.length,
    sources,
    earliest: earliest === null ? null : new Date(earliest),
    latest: latest === null ? null : new Date(latest),
  };
}
