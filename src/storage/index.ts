/**
 * Storage module: byte persistence under opaque keys.
 */

export * from './types.js';
export { keySegments, legacyKey, LEGACY_EXTENSION } from './keys.js';
export { LocalStorage, createLocalStorage } from './LocalStorage.js';
export { MemoryStorage } from './MemoryStorage.js';
