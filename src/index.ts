/**
 * filing-vault: local content-addressed store for regulatory filings.
 *
 * This is the main entry point for the library.
 */

// Errors
export * from './core/errors.js';

// Logging
export { logger, componentLogger, setLogLevel } from './logging/logger.js';
export type { Logger } from './logging/logger.js';

// Record model, query DSL and source resolution
export * from './filing/index.js';

// Payload storage
export * from './storage/index.js';

// Metadata catalog
export * from './catalog/index.js';

// Storage layout and the Collection facade
export * from './collection/index.js';

// Configuration
export * from './config/index.js';
