/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `gochunk config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  OutputConfigSchema,
  LoaderConfigSchema,
  ExtractConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  resetConfig,
  listConfig,
  deepMerge,
  parseValue,
} from './loader.js';

// Paths
export { getGochunkDir, getConfigPath } from './paths.js';

// Environment variables
export { loadEnv, getEnv, parseGoflagsTags, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';

// Build context
export { resolveBuildContext } from './build-context.js';
