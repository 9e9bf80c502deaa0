/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `lens config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  ScanSettingsSchema,
  OutputSettingsSchema,
  describeConfigKey,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  resetConfig,
  mergeWithDefaults,
  parseValue,
} from './loader.js';

// Paths
export { getLensDir, getConfigPath } from './paths.js';

// Environment variables
export { loadEnv, getEnv, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';

// Scan settings resolution
export {
  resolveScanSettings,
  normalizeExtensions,
  type ScanOverrides,
  type ResolvedScanSettings,
} from './settings.js';
