/**
 * Ignore File Handling
 *
 * Loads glob patterns from a line-oriented ignore file. Patterns are matched
 * against file base names only: there are no directory-scoped, anchored or
 * negated forms.
 */

import { readFileSync } from 'node:fs';

import type { Logger } from '../utils/logger.js';

/**
 * Parse ignore file content into an array of patterns.
 * Lines are trimmed; blank lines and `#` comments are dropped.
 *
 * @param content - Raw ignore file content
 * @returns Patterns in file order
 */
export function parseIgnoreContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Load patterns from an ignore file.
 *
 * Missing or unreadable files yield an empty list: a scan never fails
 * because its ignore file is absent.
 *
 * @param ignoreFilePath - Path to the ignore file
 * @param logger - Receives a debug line when the file is skipped
 * @returns Array of glob patterns
 */
export function loadIgnoreFile(ignoreFilePath: string, logger?: Logger): string[] {
  let content: string;
  try {
    content = readFileSync(ignoreFilePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger?.debug?.(`No ignore patterns loaded from ${ignoreFilePath} (${reason})`);
    return [];
  }

  const patterns = parseIgnoreContent(content);
  logger?.debug?.(`Loaded ${patterns.length} ignore pattern(s) from ${ignoreFilePath}`);
  return patterns;
}
