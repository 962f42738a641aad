/**
 * Storage key validation shared by Storage implementations.
 */

import { StorageKeyError } from '../core/errors.js';
import { sha256Hex } from '../filing/FilingId.js';

/**
 * Extension of keys derived from content when no key is given.
 */
export const LEGACY_EXTENSION = 'zip';

/**
 * Validate a storage key and return its segments.
 *
 * Keys are relative, `/`-separated, and may not contain empty, `.` or `..`
 * segments or backslashes.
 */
export function keySegments(key: string): string[] {
  if (key.length === 0) {
    throw new StorageKeyError(key, 'key is empty');
  }
  if (key.startsWith('/') || /^[A-Za-z]:/.test(key)) {
    throw new StorageKeyError(key, 'key must be relative');
  }
  if (key.includes('\\') || key.includes('\0')) {
    throw new StorageKeyError(key, 'key contains a forbidden character');
  }
  const segments = key.split('/');
  for (const segment of segments) {
    if (segment === '' || segment === '.' || segment === '..') {
      throw new StorageKeyError(key, `invalid segment '${segment}'`);
    }
  }
  return segments;
}

/**
 * Key used when a payload is saved without one: `<sha256>.zip`.
 */
export function legacyKey(content: Uint8Array): string {
  return `${sha256Hex(content)}.${LEGACY_EXTENSION}`;
}

/**
 * Whether an error is a Node.js system error with the given code.
 */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
