/**
 * Types for the Collection facade.
 */

import type { Catalog } from '../catalog/types.js';
import type { Filing } from '../filing/Filing.js';
import type { FilingResolver } from '../filing/FilingResolver.js';
import type { Storage } from '../storage/types.js';
import type { CollectionSpec, CollectionSpecPreset, Locator } from './Locator.js';

/**
 * Suffix of the metadata manifest written beside each payload.
 */
export const MANIFEST_SUFFIX = '.filing.json';

/**
 * Options for a Collection. Omitted parts default to a local store under
 * `rootDir`.
 */
export interface CollectionOptions {
  /** Root directory (default: `<cwd>/.filing-vault/collection`) */
  rootDir?: string;
  /** Payload storage (default: LocalStorage at `<rootDir>/files`) */
  storage?: Storage;
  /** Metadata catalog (default: SqliteCatalog at `<rootDir>/catalog.db`) */
  catalog?: Catalog;
  /** Layout of storage keys (ignored when `locator` is given) */
  spec?: CollectionSpec | CollectionSpecPreset;
  locator?: Locator;
  /** Resolver for the default catalog and manifest reads */
  resolver?: FilingResolver;
  /** Write `<key>.filing.json` beside each payload (default: true) */
  manifests?: boolean;
}

/**
 * Outcome of `add`.
 */
export interface AddResult {
  filing: Filing;
  storageKey: string;
  /** Backend location of the payload */
  location: string;
}

/**
 * Outcome of `get`. Every part is null when the id is unknown; `content` and
 * `location` are null when the payload is missing.
 */
export interface GetResult {
  filing: Filing | null;
  content: Buffer | null;
  location: string | null;
}

/**
 * Outcome of `verifyIntegrity`.
 */
export interface IntegrityReport {
  /** Catalog records checked */
  checked: number;
  /** Ids whose payload is missing from storage */
  missingPayload: string[];
  /** Ids whose payload no longer matches its checksum */
  checksumMismatch: string[];
  /** Stored payload keys no catalog record points to */
  orphanedPayload: string[];
}
