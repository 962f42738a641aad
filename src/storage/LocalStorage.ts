/**
 * LocalStorage: filesystem implementation of Storage.
 *
 * Keys map to files under `rootDir`; intermediate directories are created on
 * write. Keys that would escape the root are rejected.
 */

import { readFile, writeFile, mkdir, unlink, readdir, stat } from 'node:fs/promises';
import { join, dirname, resolve, sep } from 'node:path';
import type { Storage, SaveResult, LocalStorageConfig } from './types.js';
import { keySegments, legacyKey, hasErrorCode } from './keys.js';
import { StorageKeyError, StorageNotFoundError } from '../core/errors.js';
import { componentLogger } from '../logging/logger.js';

const log = componentLogger('storage');

export class LocalStorage implements Storage {
  readonly rootDir: string;

  constructor(config: LocalStorageConfig) {
    this.rootDir = resolve(config.rootDir);
  }

  /**
   * Ensure the root directory exists.
   */
  async initialize(): Promise<void> {
    await mkdir(this.rootDir, { recursive: true });
  }

  /**
   * Absolute path for a key.
   */
  locate(key: string): string {
    const fullPath = join(this.rootDir, ...keySegments(key));
    if (!fullPath.startsWith(this.rootDir + sep)) {
      throw new StorageKeyError(key, 'key escapes the storage root');
    }
    return fullPath;
  }

  async save(content: Uint8Array, key?: string): Promise<SaveResult> {
    const storageKey = key ?? legacyKey(content);
    const fullPath = this.locate(storageKey);

    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content);
    log.debug({ key: storageKey, size: content.byteLength }, 'payload written');

    return { key: storageKey, location: fullPath, size: content.byteLength };
  }

  async load(key: string): Promise<Buffer> {
    try {
      return await readFile(this.locate(key));
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT') || hasErrorCode(err, 'EISDIR')) {
        throw new StorageNotFoundError(key);
      }
      throw err;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      const stats = await stat(this.locate(key));
      return stats.isFile();
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT') || hasErrorCode(err, 'ENOTDIR')) {
        return false;
      }
      throw err;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.locate(key));
      return true;
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        return false;
      }
      throw err;
    }
  }

  async list(prefix = ''): Promise<string[]> {
    const results: string[] = [];
    try {
      await this.listFilesRecursive(this.rootDir, '', results);
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        return [];
      }
      throw err;
    }
    return results.filter((key) => key.startsWith(prefix)).sort();
  }

  /**
   * Recursive helper for listing files.
   */
  private async listFilesRecursive(absDir: string, relDir: string, results: string[]): Promise<void> {
    const entries = await readdir(absDir, { withFileTypes: true });

    for (const entry of entries) {
      const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        await this.listFilesRecursive(join(absDir, entry.name), relPath, results);
      } else if (entry.isFile()) {
        results.push(relPath);
      }
    }
  }
}

/**
 * Create a LocalStorage rooted at a directory.
 */
export function createLocalStorage(rootDir: string): LocalStorage {
  return new LocalStorage({ rootDir });
}
