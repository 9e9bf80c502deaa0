/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory (~/.lens or $LENS_HOME)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';

import { ConfigError } from '../errors/index.js';
import { CONFIG_TEMPLATE, DEFAULT_CONFIG } from './defaults.js';
import { getConfigPath, getLensDir } from './paths.js';
import {
  ConfigSchema,
  PartialConfigSchema,
  type Config,
  type PartialConfig,
} from './schema.js';

/**
 * Ensure the config directory exists
 */
function ensureLensDir(): void {
  const lensDir = getLensDir();
  if (!fs.existsSync(lensDir)) {
    fs.mkdirSync(lensDir, { recursive: true });
  }
}

/**
 * Merge a sparse user config over the defaults, section by section
 */
export function mergeWithDefaults(user: PartialConfig): Config {
  return {
    scan: { ...DEFAULT_CONFIG.scan, ...user.scan },
    output: { ...DEFAULT_CONFIG.output, ...user.output },
  };
}

function isTable(value: unknown): value is TOML.JsonMap {
  return (
    value !== null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Read and parse the raw TOML document
 */
function readConfigFile(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: lens config reset --force`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the default template on first run
 * @throws ConfigError if the config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureLensDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return mergeWithDefaults({});
  }

  const parsed = readConfigFile(configPath);

  // Validate against the partial schema (allows missing fields)
  const validationResult = PartialConfigSchema.safeParse(parsed);

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validationResult.error.issues)}`,
      'Run: lens config reset --force  to restore defaults'
    );
  }

  return mergeWithDefaults(validationResult.data);
}

/**
 * Look up a value by dot-notation path in any nested object
 */
function getAtPath(source: unknown, key: string): unknown {
  let current: unknown = source;
  for (const part of key.split('.')) {
    if (current === null || typeof current !== 'object' || Array.isArray(current)) {
      return undefined;
    }
    current = Object.prototype.hasOwnProperty.call(current, part)
      ? Reflect.get(current, part)
      : undefined;
  }
  return current;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('scan.workers') => 0
 */
export function getConfigValue(key: string): unknown {
  return getAtPath(loadConfig(), key);
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file
 */
export function setConfigValue(key: string, value: string): void {
  const defaultValue = getAtPath(DEFAULT_CONFIG, key);
  if (defaultValue === undefined || isTable(defaultValue)) {
    throw new ConfigError(
      `Unknown config key: ${key}`,
      'Run: lens config list  to see available keys'
    );
  }

  const configPath = getConfigPath();
  ensureLensDir();

  const config: TOML.JsonMap = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  // Walk to the parent table, creating sections as needed
  const parts = key.split('.');
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isTable(next)) {
      current = next;
    } else {
      const table: TOML.JsonMap = {};
      current[part] = table;
      current = table;
    }
  }
  current[lastPart] = parseValue(value, Array.isArray(defaultValue));

  // Validate the complete config before saving
  const partial = PartialConfigSchema.safeParse(config);
  const validationResult = partial.success
    ? ConfigSchema.safeParse(mergeWithDefaults(partial.data))
    : partial;

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validationResult.error.issues)}`,
      'Run: lens config list  to see current values and types'
    );
  }

  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Parse a CLI string into the appropriate TOML value.
 * Array keys take a comma-separated list.
 */
export function parseValue(value: string, asList = false): TOML.AnyJson {
  if (asList) {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item !== '');
  }

  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Remove the config file so the next load starts from defaults
 */
export function resetConfig(): void {
  const configPath = getConfigPath();
  if (fs.existsSync(configPath)) {
    fs.unlinkSync(configPath);
  }
  loadConfig(true);
}

/**
 * List all config values in a flat format
 * Returns entries like ['scan.workers', 0]
 */
export function listConfig(): Array<[string, unknown]> {
  const config = loadConfig();
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: object, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
