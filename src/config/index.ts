/**
 * Config module: YAML configuration and Collection wiring.
 */

export * from './types.js';
export {
  loadConfig,
  parseConfig,
  validateConfig,
  defaultConfig,
  configSchema,
  DEFAULT_CONFIG_PATH,
} from './loader.js';
export type { LoadConfigOptions } from './loader.js';
export { createCollectionFromConfig, specFromConfig } from './factory.js';
export type { CreateFromConfigOptions } from './factory.js';
