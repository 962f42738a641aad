/**
 * Types for payload Storage.
 *
 * Storage moves bytes in and out under opaque keys. It has NO filing
 * semantics: deriving keys is the Locator's job.
 */

/**
 * Result of saving a payload.
 */
export interface SaveResult {
  /** Key the payload was stored under */
  key: string;
  /** Backend-specific location (absolute path, URI, ...) */
  location: string;
  /** Payload size in bytes */
  size: number;
}

/**
 * Byte-oriented persistence keyed by `a/b/c.ext` strings.
 */
export interface Storage {
  /**
   * Store a payload, replacing any previous payload under the key.
   * Without a key the payload is stored as `<sha256>.zip` at the root.
   */
  save(content: Uint8Array, key?: string): Promise<SaveResult>;

  /**
   * Read a payload.
   *
   * @throws StorageNotFoundError when nothing is stored under the key
   */
  load(key: string): Promise<Buffer>;

  /** Whether a payload is stored under the key */
  exists(key: string): Promise<boolean>;

  /** Remove a payload; false when there was nothing to remove */
  delete(key: string): Promise<boolean>;

  /** Stored keys starting with a prefix, sorted */
  list(prefix?: string): Promise<string[]>;

  /** Location a key maps to, whether or not it exists */
  locate(key: string): string;
}

/**
 * Configuration for LocalStorage.
 */
export interface LocalStorageConfig {
  /** Directory all keys are resolved against */
  rootDir: string;
}
