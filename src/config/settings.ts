/**
 * Scan Settings Resolution
 *
 * Combines the config file, environment and command-line overrides into
 * the arguments of createScanConfig() and scan().
 *
 * Precedence (highest first): CLI flags, environment, config.toml, defaults.
 */

import { availableParallelism } from 'node:os';

import type { ScanConfigInput } from '../scanner/config.js';
import { getEnv } from './env.js';
import type { Config } from './schema.js';

/**
 * Values a caller (usually the CLI) may override for one scan.
 */
export interface ScanOverrides {
  extensions?: string[];
  ignoreFile?: string;
  patterns?: string[];
  ignoredDirs?: string[];
  workers?: number;
  maxBytes?: number;
}

/**
 * Everything needed to run one scan.
 */
export interface ResolvedScanSettings {
  input: ScanConfigInput;
  workerCount: number;
  queueCapacity: number;
  /** Bundle size limit in bytes; undefined when unlimited */
  maxBytes?: number;
}

/**
 * Normalize user-supplied extensions: trimmed, with a leading dot added
 * where it was left out ("ts" -> ".ts"). Case is preserved.
 */
export function normalizeExtensions(extensions: string[]): string[] {
  return extensions
    .map((ext) => ext.trim())
    .filter((ext) => ext !== '')
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

/**
 * Resolve the settings for a scan of `root`.
 */
export function resolveScanSettings(
  root: string,
  config: Config,
  overrides: ScanOverrides = {}
): ResolvedScanSettings {
  const configuredWorkers = config.scan.workers > 0 ? config.scan.workers : undefined;
  const workerCount =
    overrides.workers ?? getEnv('LENS_WORKERS') ?? configuredWorkers ?? availableParallelism();

  const maxBytes = overrides.maxBytes ?? config.output.max_bytes;

  return {
    input: {
      root,
      ignoreFile: overrides.ignoreFile ?? config.scan.ignore_file,
      globPatterns: [...config.scan.extra_patterns, ...(overrides.patterns ?? [])],
      allowedExtensions: normalizeExtensions(overrides.extensions ?? config.scan.extensions),
      ignoredDirNames: overrides.ignoredDirs ?? config.scan.ignored_dirs,
    },
    workerCount,
    queueCapacity: config.scan.queue_capacity,
    maxBytes: maxBytes > 0 ? maxBytes : undefined,
  };
}
