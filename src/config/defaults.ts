/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import {
  DEFAULT_ALLOWED_EXTENSIONS,
  DEFAULT_IGNORE_FILE,
  DEFAULT_IGNORED_DIR_NAMES,
  DEFAULT_QUEUE_CAPACITY,
} from '../scanner/types.js';
import type { Config } from './schema.js';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = {
  scan: {
    extensions: [...DEFAULT_ALLOWED_EXTENSIONS],
    ignored_dirs: [...DEFAULT_IGNORED_DIR_NAMES],
    ignore_file: DEFAULT_IGNORE_FILE,
    extra_patterns: [],
    workers: 0, // host parallelism
    queue_capacity: DEFAULT_QUEUE_CAPACITY,
  },

  output: {
    max_bytes: 0, // unlimited
  },
};

const tomlList = (values: string[]): string =>
  `[${values.map((value) => JSON.stringify(value)).join(', ')}]`;

/**
 * Config file template (TOML format)
 * Written to ~/.lens/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# repo-lens Configuration
# Location: ~/.lens/config.toml (override the directory with LENS_HOME)

# Scan Settings
[scan]
extensions = ${tomlList(DEFAULT_CONFIG.scan.extensions)}
ignored_dirs = ${tomlList(DEFAULT_CONFIG.scan.ignored_dirs)}

# Base-name glob patterns, one per line; resolved against the scanned root
ignore_file = "${DEFAULT_CONFIG.scan.ignore_file}"
# extra_patterns = ["*.min.ts", "*_test.go"]

# 0 uses every available CPU; LENS_WORKERS overrides this value
workers = ${DEFAULT_CONFIG.scan.workers}
queue_capacity = ${DEFAULT_CONFIG.scan.queue_capacity}

# Output Settings
[output]
max_bytes = ${DEFAULT_CONFIG.output.max_bytes}  # 0 = unlimited
`;
