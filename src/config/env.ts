/**
 * Environment Variable Handler
 *
 * Reads the few environment variables repo-lens understands.
 * Supports .env files for local development via dotenv.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

import { ConfigError } from '../errors/index.js';

// Load .env file (no-op if it doesn't exist)
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

export const EnvSchema = z.object({
  /** Directory holding config.toml (defaults to ~/.lens) */
  LENS_HOME: z.string().min(1).optional(),
  /** Worker count, overriding scan.workers from the config file */
  LENS_WORKERS: z.coerce.number().int().min(1).optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Cleared in tests with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 *
 * @throws ConfigError when a variable is set to an invalid value
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const result = EnvSchema.safeParse({
    LENS_HOME: process.env.LENS_HOME || undefined,
    LENS_WORKERS: process.env.LENS_WORKERS || undefined,
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(
      `Invalid environment variables:\n${issues}`,
      'LENS_WORKERS must be a positive integer'
    );
  }

  _envCache = result.data;
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  const env = loadEnv();
  return env[key];
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
