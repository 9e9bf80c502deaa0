/**
 * Scan Configuration Factory
 *
 * Validates scan inputs with Zod, loads the ignore file once, and freezes
 * the result into a ScanConfig.
 */

import { isAbsolute, join } from 'node:path';
import { z } from 'zod';

import { ValidationError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { loadIgnoreFile } from './ignore.js';
import {
  DEFAULT_ALLOWED_EXTENSIONS,
  DEFAULT_IGNORE_FILE,
  DEFAULT_IGNORED_DIR_NAMES,
  type ScanConfig,
} from './types.js';

/**
 * Schema for the inputs accepted by createScanConfig.
 */
export const ScanConfigInputSchema = z.object({
  root: z.string().min(1, 'root must not be empty'),
  ignoreFile: z
    .string()
    .min(1)
    .nullable()
    .optional()
    .describe('Ignore file path, relative to root unless absolute; null disables it'),
  globPatterns: z
    .array(z.string())
    .optional()
    .describe('Extra base-name glob patterns, added after the ignore file'),
  allowedExtensions: z
    .array(z.string().startsWith('.', 'extensions must start with "."'))
    .optional(),
  ignoredDirNames: z
    .array(z.string().min(1, 'directory names must not be empty'))
    .optional(),
});

export type ScanConfigInput = z.infer<typeof ScanConfigInputSchema>;

/**
 * Build an immutable ScanConfig.
 *
 * The ignore file is read here, once; a missing or unreadable file
 * contributes no patterns. A relative `ignoreFile` is resolved against
 * `root`, not the working directory, so `'.gitignore'` means the one at the
 * top of the scanned tree. Pass an absolute path to use a file elsewhere.
 *
 * @param input - Root, ignore file, patterns, extensions and directory names
 * @param logger - Receives debug output about the ignore file
 * @throws ValidationError when the input does not match the schema
 *
 * @example
 * ```ts
 * const config = createScanConfig({
 *   root: './project',
 *   allowedExtensions: ['.ts', '.go'],
 * });
 * ```
 */
export function createScanConfig(input: ScanConfigInput, logger?: Logger): ScanConfig {
  const result = ScanConfigInputSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      'Invalid scan configuration',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const {
    root,
    ignoreFile = DEFAULT_IGNORE_FILE,
    globPatterns = [],
    allowedExtensions = DEFAULT_ALLOWED_EXTENSIONS,
    ignoredDirNames = DEFAULT_IGNORED_DIR_NAMES,
  } = result.data;

  const filePatterns =
    ignoreFile === null ? [] : loadIgnoreFile(resolveIgnoreFile(root, ignoreFile), logger);

  return Object.freeze({
    root,
    ignoredDirNames: new Set(ignoredDirNames),
    globPatterns: Object.freeze([...filePatterns, ...globPatterns]),
    allowedExtensions: new Set(allowedExtensions),
  });
}

/**
 * Resolve an ignore file path: absolute paths are kept, relative ones are
 * taken relative to the scanned root.
 */
export function resolveIgnoreFile(root: string, ignoreFile: string): string {
  return isAbsolute(ignoreFile) ? ignoreFile : join(root, ignoreFile);
}
