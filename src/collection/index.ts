/**
 * Collection module: storage layout and the Collection facade.
 */

export * from './types.js';
export * from './Locator.js';
export { Collection, createCollection, manifestKey, DEFAULT_ROOT_DIR } from './Collection.js';
