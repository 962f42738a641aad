/**
 * Configuration types for filing-vault.
 *
 * These types define the structure of filing-vault.yaml and provide
 * type-safe access to collection configuration.
 */

import type { CollectionSpecPreset, DatePart } from '../collection/Locator.js';

export type StorageType = 'local' | 'memory';
export type CatalogEngine = 'sqlite' | 'memory';
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * Top-level configuration.
 */
export interface VaultConfig {
  /** Collection root, relative to the working directory */
  rootDir: string;
  storage: StorageConfig;
  catalog: CatalogSettings;
  locator: LocatorConfig;
  /** Write `<key>.filing.json` manifests beside payloads */
  manifests: boolean;
  /** Overrides the logger level when set */
  logLevel?: LogLevel;
}

/**
 * Payload storage backend.
 */
export interface StorageConfig {
  type: StorageType;
  /** Directory for payloads, relative to rootDir (default: "files") */
  rootDir?: string;
}

/**
 * Metadata catalog backend.
 */
export interface CatalogSettings {
  engine: CatalogEngine;
  /** Database file relative to rootDir, or ":memory:" (default: "catalog.db") */
  path?: string;
}

/**
 * Partition as written in YAML: a field name or `{ field, format }`.
 */
export type PartitionConfig = string | { field: string; format?: DatePart };

/**
 * Storage key layout.
 */
export interface LocatorConfig {
  preset: CollectionSpecPreset;
  /** Replaces the preset's partitions */
  partitions?: PartitionConfig[];
  defaultExtension?: string;
  zipExtension?: string;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: VaultConfig = {
  rootDir: '.filing-vault/collection',
  storage: { type: 'local' },
  catalog: { engine: 'sqlite' },
  locator: { preset: 'default' },
  manifests: true,
};
