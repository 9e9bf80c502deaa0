/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.lens/            (or $LENS_HOME)
 * └── config.toml     (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

import { getEnv } from './env.js';

/**
 * Get the lens directory path ($LENS_HOME, or ~/.lens)
 * @returns Absolute path to the lens directory
 */
export function getLensDir(): string {
  return getEnv('LENS_HOME') ?? join(homedir(), '.lens');
}

/**
 * Get the config file path (~/.lens/config.toml)
 * @returns Absolute path to the TOML config file
 */
export function getConfigPath(): string {
  return join(getLensDir(), 'config.toml');
}
