/**
 * Filing module: record model, query DSL and source resolution.
 */

export * from './types.js';
export * from './Expr.js';
export * from './Field.js';
export * from './Filing.js';
export * from './EdinetFiling.js';
export * from './EdgarFiling.js';
export * from './FilingId.js';
export * from './FilingResolver.js';
