/**
 * Configuration loader for filing-vault.
 *
 * Loads config from a YAML file with support for:
 * - Environment variable substitution (${VAR_NAME}, ${VAR_NAME:-default})
 * - Schema validation
 * - Default values
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigValidationError, FilingVaultError } from '../core/errors.js';
import { componentLogger } from '../logging/logger.js';
import type { PartitionConfig, VaultConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

const log = componentLogger('config');

/**
 * Config file used when neither an option nor FILING_VAULT_CONFIG names one.
 */
export const DEFAULT_CONFIG_PATH = './filing-vault.yaml';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.FILING_VAULT_CONFIG or './filing-vault.yaml') */
  configPath?: string;
}

const partitionSchema = z.union([
  z.string().min(1),
  z
    .object({
      field: z.string().min(1),
      format: z.enum(['year', 'month', 'date']).optional(),
    })
    .strict(),
]);

const extensionSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'must be a plain file extension');

export const configSchema = z
  .object({
    rootDir: z.string().min(1).optional(),
    storage: z
      .object({
        type: z.enum(['local', 'memory']).optional(),
        rootDir: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    catalog: z
      .object({
        engine: z.enum(['sqlite', 'memory']).optional(),
        path: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    locator: z
      .object({
        preset: z.enum(['default', 'edinet', 'edgar']).optional(),
        partitions: z.array(partitionSchema).min(1).optional(),
        defaultExtension: extensionSchema.optional(),
        zipExtension: extensionSchema.optional(),
      })
      .strict()
      .optional(),
    manifests: z.boolean().optional(),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  })
  .strict();

type ParsedConfig = z.infer<typeof configSchema>;
type ParsedPartition = z.infer<typeof partitionSchema>;

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match: string, name: string, fallback: string | undefined) => {
    const envValue = process.env[name];
    if (envValue !== undefined) {
      return envValue;
    }
    if (fallback !== undefined) {
      return fallback;
    }
    log.warn({ variable: name }, 'environment variable is not set and has no default');
    return '';
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively substitute environment variables in parsed YAML.
 */
export function substituteEnvVarsRecursive(value: unknown): unknown {
  if (typeof value === 'string') {
    return substituteEnvVars(value);
  }
  if (Array.isArray(value)) {
    return value.map(substituteEnvVarsRecursive);
  }
  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = substituteEnvVarsRecursive(item);
    }
    return result;
  }
  return value;
}

function valueAt(root: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = root;
  for (const key of path) {
    if (Array.isArray(current) && typeof key === 'number') {
      current = current[key];
    } else if (isRecord(current)) {
      current = current[String(key)];
    } else {
      return undefined;
    }
  }
  return current;
}

function toPartition(partition: ParsedPartition): PartitionConfig {
  if (typeof partition === 'string') {
    return partition;
  }
  return partition.format === undefined
    ? { field: partition.field }
    : { field: partition.field, format: partition.format };
}

/**
 * Fresh copy of the defaults.
 */
export function defaultConfig(): VaultConfig {
  return structuredClone(DEFAULT_CONFIG);
}

function applyDefaults(parsed: ParsedConfig): VaultConfig {
  const config = defaultConfig();

  if (parsed.rootDir !== undefined) config.rootDir = parsed.rootDir;
  if (parsed.manifests !== undefined) config.manifests = parsed.manifests;
  if (parsed.logLevel !== undefined) config.logLevel = parsed.logLevel;

  if (parsed.storage?.type !== undefined) config.storage.type = parsed.storage.type;
  if (parsed.storage?.rootDir !== undefined) config.storage.rootDir = parsed.storage.rootDir;

  if (parsed.catalog?.engine !== undefined) config.catalog.engine = parsed.catalog.engine;
  if (parsed.catalog?.path !== undefined) config.catalog.path = parsed.catalog.path;

  const locator = parsed.locator;
  if (locator?.preset !== undefined) config.locator.preset = locator.preset;
  if (locator?.partitions !== undefined) config.locator.partitions = locator.partitions.map(toPartition);
  if (locator?.defaultExtension !== undefined) config.locator.defaultExtension = locator.defaultExtension;
  if (locator?.zipExtension !== undefined) config.locator.zipExtension = locator.zipExtension;

  return config;
}

/**
 * Validate a parsed configuration object and apply defaults.
 *
 * @throws ConfigValidationError naming the first offending path
 */
export function validateConfig(raw: unknown): VaultConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const [issue] = result.error.issues;
    if (issue === undefined) {
      throw new ConfigValidationError('invalid configuration', '', raw);
    }
    throw new ConfigValidationError(issue.message, issue.path.join('.'), valueAt(raw, issue.path));
  }
  return applyDefaults(result.data);
}

/**
 * Parse YAML configuration text.
 */
export function parseConfig(content: string, source = '<inline>'): VaultConfig {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new FilingVaultError(
      `Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`,
      { source }
    );
  }
  return validateConfig(substituteEnvVarsRecursive(parsed ?? {}));
}

/**
 * Load configuration from a YAML file. A missing file yields the defaults.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<VaultConfig> {
  const configPath = options.configPath ?? process.env.FILING_VAULT_CONFIG ?? DEFAULT_CONFIG_PATH;
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    log.warn({ path: absolutePath }, 'config file not found, using defaults');
    return defaultConfig();
  }

  const content = await readFile(absolutePath, 'utf-8');
  const config = parseConfig(content, absolutePath);
  log.debug({ path: absolutePath }, 'loaded config');
  return config;
}
