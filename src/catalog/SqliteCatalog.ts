/**
 * SqliteCatalog: Catalog backed by an embedded SQLite database.
 *
 * Each filing is one row of `filings`: base fields as typed columns, the
 * storage key, and the full `toDict()` document as JSON in `data`. Indexed
 * fields declared by subtypes get their own columns the first time a filing
 * of that type is indexed; their names and types are kept in
 * `filing_columns`. A new column is backfilled from the documents already
 * stored. Any other attribute is queried through `json_extract(data, ...)`.
 *
 * Extra columns carry no declared SQL type, so a value keeps the kind it has
 * in the JSON document and compares the way MemoryCatalog compares it.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { FilingVaultError } from '../core/errors.js';
import type { Expr } from '../filing/Expr.js';
import type { Filing } from '../filing/Filing.js';
import type { FilingResolver } from '../filing/FilingResolver.js';
import { createDefaultResolver } from '../filing/FilingResolver.js';
import type { FieldType } from '../filing/types.js';
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
import type { ColumnInfo, SqlParam } from './compileExpr.js';
import { compileExpr } from './compileExpr.js';
import { assertIdentifier, declaredFieldTypes, isIdentifier, resolveWindow } from './operands.js';
import { parseDocument, toIndexEntry } from './records.js';

const log = componentLogger('catalog');

/**
 * In-memory database path.
 */
export const MEMORY_DATABASE = ':memory:';

/**
 * Configuration for SqliteCatalog.
 */
export interface SqliteCatalogConfig extends CatalogConfig {
  /** Database file, or ':memory:' (default) */
  path?: string;
}

interface ColumnDef {
  column: string;
  type: FieldType;
}

const BASE_COLUMNS: ReadonlyMap<string, ColumnDef> = new Map([
  ['id', { column: 'id', type: 'string' }],
  ['source', { column: 'source', type: 'string' }],
  ['name', { column: 'name', type: 'string' }],
  ['checksum', { column: 'checksum', type: 'string' }],
  ['format', { column: 'format', type: 'string' }],
  ['isZip', { column: 'is_zip', type: 'boolean' }],
  ['createdAt', { column: 'created_at', type: 'date' }],
]);

const RESERVED_COLUMNS = new Set([
  'seq',
  'storage_key',
  'indexed_at',
  'data',
  ...[...BASE_COLUMNS.values()].map((def) => def.column),
]);

/** JSON kinds copied into a new column; containers stay in the document */
const SCALAR_JSON_TYPES = "('integer', 'real', 'text', 'true', 'false')";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS filings (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  source TEXT NOT NULL,
  name TEXT NOT NULL,
  checksum TEXT NOT NULL,
  format TEXT,
  is_zip INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  storage_key TEXT,
  indexed_at TEXT NOT NULL,
  data TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_filings_source ON filings (source);
CREATE INDEX IF NOT EXISTS idx_filings_created_at ON filings (created_at);
CREATE TABLE IF NOT EXISTS filing_columns (
  field TEXT PRIMARY KEY,
  column_name TEXT NOT NULL UNIQUE,
  type TEXT NOT NULL
);
`;

function quote(identifier: string): string {
  return `"${identifier}"`;
}

function toSnakeCase(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

function isFieldType(value: unknown): value is FieldType {
  return value === 'string' || value === 'number' || value === 'boolean' || value === 'date';
}

/**
 * Column form of a filing value.
 */
function toColumnValue(value: unknown): SqlParam {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' || typeof value === 'number') return value;
  return null;
}

interface RecordRow {
  data: string;
  storageKey: string | null;
  indexedAt: string;
}

function readRecordRow(row: unknown): RecordRow {
  if (
    typeof row === 'object' &&
    row !== null &&
    'data' in row &&
    typeof row.data === 'string' &&
    'indexed_at' in row &&
    typeof row.indexed_at === 'string' &&
    'storage_key' in row
  ) {
    return {
      data: row.data,
      storageKey: typeof row.storage_key === 'string' ? row.storage_key : null,
      indexedAt: row.indexed_at,
    };
  }
  throw new FilingVaultError('Unexpected row shape in filings table');
}

function readColumn(row: unknown, column: string): unknown {
  if (typeof row === 'object' && row !== null && column in row) {
    return Object.getOwnPropertyDescriptor(row, column)?.value;
  }
  return undefined;
}

function readCount(row: unknown): number {
  const value = readColumn(row, 'n');
  if (typeof value !== 'number') {
    throw new FilingVaultError('Unexpected count row in filings table');
  }
  return value;
}

export class SqliteCatalog implements Catalog {
  readonly path: string;
  private readonly db: Database.Database;
  private readonly resolver: FilingResolver;
  private readonly columns: Map<string, ColumnDef> = new Map();

  constructor(config: SqliteCatalogConfig = {}) {
    this.path = config.path ?? MEMORY_DATABASE;
    this.resolver = config.resolver ?? createDefaultResolver();

    if (this.path !== MEMORY_DATABASE) {
      mkdirSync(dirname(this.path), { recursive: true });
    }
    this.db = new Database(this.path);
    if (this.path !== MEMORY_DATABASE) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(SCHEMA);
    this.loadColumns();
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  async index(filing: Filing, options: IndexOptions = {}): Promise<void> {
    this.assertOpen();
    const document = JSON.stringify(filing.toDict());

    // Other handles on the same file may have added columns since we last looked.
    const write = this.db.transaction((): Array<[string, ColumnDef]> => {
      this.loadColumns();
      const pending = this.newColumns(filing);
      for (const [field, def] of pending) {
        this.addColumn(field, def);
      }
      this.upsert(filing, document, options.storageKey ?? null, [...this.columns, ...pending]);
      return pending;
    });
    const pending = write.immediate();

    for (const [field, def] of pending) {
      this.columns.set(field, def);
      log.info({ field, column: def.column, type: def.type }, 'added catalog column');
    }
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

  async clear(): Promise<void> {
    this.assertOpen();
    this.db.prepare('DELETE FROM filings').run();
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  async search(expr?: Expr | null, options?: SearchOptions): Promise<Filing[]> {
    const records = await this.find(expr, options);
    return records.map((record) => record.filing);
  }

  async find(expr?: Expr | null, options?: SearchOptions): Promise<CatalogRecord[]> {
    this.assertOpen();
    const { limit, offset, order } = resolveWindow(options);
    const where = this.where(expr);
    const declared = declaredFieldTypes(this.resolver);

    const orderSql =
      order.length > 0
        ? order
            .map((term) => `${this.columnInfo(term.field, undefined, declared).sql} ${term.direction.toUpperCase()}`)
            .join(', ')
        : 'seq ASC';

    const sql =
      `SELECT data, storage_key, indexed_at FROM filings${where.sql}` +
      ` ORDER BY ${orderSql} LIMIT ? OFFSET ?`;
    const rows = this.db.prepare(sql).all(...where.params, limit ?? -1, offset);
    return rows.map((row) => this.toRecord(readRecordRow(row)));
  }

  async count(expr?: Expr | null): Promise<number> {
    this.assertOpen();
    const where = this.where(expr);
    const row = this.db.prepare(`SELECT COUNT(*) AS n FROM filings${where.sql}`).get(...where.params);
    return readCount(row);
  }

  async get(id: string): Promise<CatalogRecord | null> {
    this.assertOpen();
    const row = this.db
      .prepare('SELECT data, storage_key, indexed_at FROM filings WHERE id = ?')
      .get(id);
    return row === undefined ? null : this.toRecord(readRecordRow(row));
  }

  async has(id: string): Promise<boolean> {
    this.assertOpen();
    return this.db.prepare('SELECT 1 AS n FROM filings WHERE id = ?').get(id) !== undefined;
  }

  async stats(): Promise<CatalogStats> {
    this.assertOpen();
    const sources: Record<string, number> = {};
    for (const row of this.db
      .prepare('SELECT source, COUNT(*) AS n FROM filings GROUP BY source ORDER BY source')
      .all()) {
      const source = readColumn(row, 'source');
      if (typeof source === 'string') {
        sources[source] = readCount(row);
      }
    }

    const range = this.db
      .prepare('SELECT COUNT(*) AS n, MIN(created_at) AS earliest, MAX(created_at) AS latest FROM filings')
      .get();
    const earliest = readColumn(range, 'earliest');
    const latest = readColumn(range, 'latest');

    return {
      total: readCount(range),
      sources,
      earliest: typeof earliest === 'string' ? new Date(earliest) : null,
      latest: typeof latest === 'string' ? new Date(latest) : null,
    };
  }

  /**
   * Columns added for subtype fields, keyed by field name.
   */
  extraColumns(): Record<string, { column: string; type: FieldType }> {
    return Object.fromEntries([...this.columns].map(([field, def]) => [field, { ...def }]));
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private assertOpen(): void {
    if (!this.db.open) {
      throw new FilingVaultError('Catalog is closed', { path: this.path });
    }
  }

  private loadColumns(): void {
    for (const row of this.db.prepare('SELECT field, column_name, type FROM filing_columns').all()) {
      const field = readColumn(row, 'field');
      const column = readColumn(row, 'column_name');
      const type = readColumn(row, 'type');
      if (typeof field === 'string' && typeof column === 'string' && isFieldType(type)) {
        this.columns.set(field, { column, type });
      }
    }
  }

  /**
   * Typed indexed fields of a filing that have no column yet.
   */
  private newColumns(filing: Filing): Array<[string, ColumnDef]> {
    const pending: Array<[string, ColumnDef]> = [];
    const taken = new Set([...RESERVED_COLUMNS, ...[...this.columns.values()].map((def) => def.column)]);

    for (const decl of Object.values(filing.fields)) {
      if (!decl.indexed || BASE_COLUMNS.has(decl.name) || !isIdentifier(decl.name)) continue;

      const existing = this.columns.get(decl.name);
      if (existing !== undefined) {
        if (decl.type !== undefined && existing.type !== decl.type) {
          log.warn(
            { field: decl.name, column: existing.column, columnType: existing.type, declared: decl.type },
            'indexed field declared with a different type than its column'
          );
        }
        continue;
      }
      if (decl.type === undefined) continue;

      let column = toSnakeCase(decl.name);
      if (taken.has(column)) column = `f_${column}`;
      if (taken.has(column)) {
        log.warn({ field: decl.name }, 'no free column name; field stays in the JSON document');
        continue;
      }
      taken.add(column);
      pending.push([decl.name, { column, type: decl.type }]);
    }
    return pending;
  }

  private addColumn(field: string, def: ColumnDef): void {
    assertIdentifier(field);
    const path = `'$.${field}'`;
    this.db.exec(`ALTER TABLE filings ADD COLUMN ${quote(def.column)}`);
    this.db.exec(
      `UPDATE filings SET ${quote(def.column)} = json_extract(data, ${path}) ` +
        `WHERE json_type(data, ${path}) IN ${SCALAR_JSON_TYPES}`
    );
    this.db.exec(
      `CREATE INDEX IF NOT EXISTS ${quote(`idx_filings_${def.column}`)} ON filings (${quote(def.column)})`
    );
    this.db
      .prepare('INSERT INTO filing_columns (field, column_name, type) VALUES (?, ?, ?)')
      .run(field, def.column, def.type);
  }

  private upsert(
    filing: Filing,
    document: string,
    storageKey: string | null,
    extra: ReadonlyArray<[string, ColumnDef]>
  ): void {
    const columns = [
      'id',
      'source',
      'name',
      'checksum',
      'format',
      'is_zip',
      'created_at',
      'storage_key',
      'indexed_at',
      'data',
      ...extra.map(([, def]) => def.column),
    ];
    const values: SqlParam[] = [
      filing.id,
      filing.source,
      filing.name,
      filing.checksum,
      filing.format,
      filing.isZip ? 1 : 0,
      filing.createdAt.toISOString(),
      storageKey,
      new Date().toISOString(),
      document,
      ...extra.map(([field]) => toColumnValue(filing.get(field))),
    ];

    const updates = columns
      .filter((column) => column !== 'id')
      .map((column) => `${quote(column)} = excluded.${quote(column)}`)
      .join(', ');
    const sql =
      `INSERT INTO filings (${columns.map(quote).join(', ')}) ` +
      `VALUES (${columns.map(() => '?').join(', ')}) ` +
      `ON CONFLICT (id) DO UPDATE SET ${updates}`;

    this.db.prepare(sql).run(...values);
  }

  private where(expr: Expr | null | undefined): { sql: string; params: SqlParam[] } {
    if (expr === undefined || expr === null) {
      return { sql: '', params: [] };
    }
    const declared = declaredFieldTypes(this.resolver);
    const compiled = compileExpr(expr, (name, hint) => this.columnInfo(name, hint, declared));
    return { sql: ` WHERE ${compiled.sql}`, params: compiled.params };
  }

  private columnInfo(
    name: string,
    hint: FieldType | undefined,
    declared: ReadonlyMap<string, FieldType | null>
  ): ColumnInfo {
    const def = BASE_COLUMNS.get(name) ?? this.columns.get(name);
    if (def !== undefined) {
      return { sql: quote(def.column), type: hint ?? def.type };
    }
    assertIdentifier(name);
    const path = `'$.${name}'`;
    return {
      sql: `json_extract(data, ${path})`,
      type: hint ?? declared.get(name) ?? undefined,
      jsonTypeSql: `json_type(data, ${path})`,
    };
  }

  private toRecord(row: RecordRow): CatalogRecord {
    return {
      filing: this.resolver.reconstruct(parseDocument(row.data)),
      storageKey: row.storageKey,
      indexedAt: new Date(row.indexedAt),
    };
  }
}

/**
 * Create a SqliteCatalog for a database file (or ':memory:').
 */
export function createSqliteCatalog(path: string, resolver?: FilingResolver): SqliteCatalog {
  return new SqliteCatalog(resolver !== undefined ? { path, resolver } : { path });
}
