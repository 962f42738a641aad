/**
 * Catalog module: queryable metadata index over filings.
 */

export * from './types.js';
export { compileExpr, escapeGlob } from './compileExpr.js';
export type { ColumnInfo, ColumnResolver, CompiledExpr, SqlParam } from './compileExpr.js';
export { evaluateExpr, compareValues } from './evaluateExpr.js';
export type { Truth } from './evaluateExpr.js';
export { MemoryCatalog } from './MemoryCatalog.js';
export { SqliteCatalog, createSqliteCatalog, MEMORY_DATABASE } from './SqliteCatalog.js';
export type { SqliteCatalogConfig } from './SqliteCatalog.js';
