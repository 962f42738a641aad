/**
 * Filing id and checksum helpers.
 *
 * Ids follow `source:externalId:checksumPrefix`, where the prefix is the
 * first 8 hex characters of the payload's SHA-256.
 */

import { createHash } from 'node:crypto';
import { FieldValidationError } from '../core/errors.js';

export const CHECKSUM_PREFIX_LENGTH = 8;

const SHA256_HEX = /^[0-9a-f]{64}$/i;

/**
 * Lowercase hex SHA-256 of a payload.
 */
export function sha256Hex(content: Uint8Array | string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Compare two hex checksums, ignoring case.
 */
export function checksumsMatch(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function isSha256Hex(value: string): boolean {
  return SHA256_HEX.test(value);
}

/**
 * Parts of a composite filing id.
 */
export interface FilingIdParts {
  source: string;
  externalId: string;
  checksumPrefix: string;
}

/**
 * Build a composite filing id.
 *
 * @example
 * generateFilingId('edinet', 'S100TEST', sha256Hex('hello'))
 * // 'edinet:S100TEST:2cf24dba'
 */
export function generateFilingId(source: string, externalId: string, checksum: string): string {
  if (!source || source.includes(':')) {
    throw new FieldValidationError('source', 'non-empty string without ":"', JSON.stringify(source));
  }
  if (!externalId) {
    throw new FieldValidationError('externalId', 'non-empty string', JSON.stringify(externalId));
  }
  if (checksum.length < CHECKSUM_PREFIX_LENGTH) {
    throw new FieldValidationError(
      'checksum',
      `at least ${CHECKSUM_PREFIX_LENGTH} hex characters`,
      JSON.stringify(checksum)
    );
  }
  return `${source}:${externalId}:${checksum.slice(0, CHECKSUM_PREFIX_LENGTH).toLowerCase()}`;
}

/**
 * Split a composite filing id. The external id may itself contain ":".
 */
export function parseFilingId(id: string): FilingIdParts {
  const first = id.indexOf(':');
  const last = id.lastIndexOf(':');
  if (first <= 0 || last === first || last === id.length - 1 || last - first < 2) {
    throw new FieldValidationError('id', 'source:externalId:checksumPrefix', JSON.stringify(id));
  }
  return {
    source: id.slice(0, first),
    externalId: id.slice(first + 1, last),
    checksumPrefix: id.slice(last + 1),
  };
}
