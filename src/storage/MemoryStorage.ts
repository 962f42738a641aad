/**
 * MemoryStorage: in-process implementation of Storage.
 *
 * Payloads are copied on the way in and out, so callers cannot mutate stored
 * bytes through a retained buffer.
 */

import type { Storage, SaveResult } from './types.js';
import { keySegments, legacyKey } from './keys.js';
import { StorageNotFoundError } from '../core/errors.js';

export class MemoryStorage implements Storage {
  private readonly payloads = new Map<string, Buffer>();

  locate(key: string): string {
    keySegments(key);
    return `memory://${key}`;
  }

  async save(content: Uint8Array, key?: string): Promise<SaveResult> {
    const storageKey = key ?? legacyKey(content);
    const location = this.locate(storageKey);
    this.payloads.set(storageKey, Buffer.from(content));
    return { key: storageKey, location, size: content.byteLength };
  }

  async load(key: string): Promise<Buffer> {
    keySegments(key);
    const payload = this.payloads.get(key);
    if (payload === undefined) {
      throw new StorageNotFoundError(key);
    }
    return Buffer.from(payload);
  }

  async exists(key: string): Promise<boolean> {
    keySegments(key);
    return this.payloads.has(key);
  }

  async delete(key: string): Promise<boolean> {
    keySegments(key);
    return this.payloads.delete(key);
  }

  async list(prefix = ''): Promise<string[]> {
    return [...this.payloads.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  /** Number of stored payloads */
  get size(): number {
    return this.payloads.size;
  }
}
