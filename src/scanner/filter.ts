/**
 * Path Filter
 *
 * Pure decision functions used by the walker: whether to descend into a
 * directory, and whether a file should be read. No I/O.
 */

import { basename } from 'node:path';
import { Minimatch, type MinimatchOptions } from 'minimatch';

import type { Logger } from '../utils/logger.js';
import type { ScanConfig } from './types.js';

/**
 * Filter decisions for one scan.
 */
export interface PathFilter {
  /** False iff the directory name is in the ignored set */
  shouldDescend(dirName: string): boolean;

  /** True iff the extension is allowed and no pattern matches the base name */
  shouldInclude(filePath: string, fileName?: string): boolean;
}

/**
 * Shell-glob semantics for base names: `*`, `?` and `[...]` classes,
 * wildcards match leading dots, no braces, extglobs, globstar or negation.
 */
export const GLOB_OPTIONS: MinimatchOptions = {
  dot: true,
  nobrace: true,
  noext: true,
  noglobstar: true,
  nocomment: true,
  nonegate: true,
  matchBase: false,
};

/**
 * Extension of a file name: from the last `.` to the end, dot included.
 * Unlike path.extname, a leading dot counts (`.gitignore` -> `.gitignore`).
 *
 * @param fileName - Base name of the file
 * @returns The extension, or '' when the name has no dot
 */
export function getFileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot === -1 ? '' : fileName.slice(dot);
}

/**
 * Check a pattern's syntax. minimatch reads an unterminated class or a
 * dangling escape as literal text; here they make the pattern invalid.
 *
 * @returns What is wrong with the pattern, or undefined when it is well formed
 */
export function findPatternError(pattern: string): string | undefined {
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === '\\') {
      if (i + 1 >= pattern.length) {
        return 'trailing backslash';
      }
      i += 2;
      continue;
    }
    if (ch === '[') {
      let j = i + 1;
      if (pattern[j] === '!' || pattern[j] === '^') {
        j++;
      }
      if (pattern[j] === ']') {
        return 'empty character class';
      }
      while (j < pattern.length && pattern[j] !== ']') {
        if (pattern[j] === '\\') {
          if (j + 1 >= pattern.length) {
            return 'trailing backslash';
          }
          j++;
        }
        j++;
      }
      if (j >= pattern.length) {
        return 'unterminated character class';
      }
      i = j + 1;
      continue;
    }
    i++;
  }
  return undefined;
}

/**
 * Compile glob patterns once. Malformed patterns are dropped with a warning,
 * so they never match.
 */
export function compileGlobPatterns(
  patterns: readonly string[],
  logger?: Logger
): Minimatch[] {
  const compiled: Minimatch[] = [];
  for (const pattern of patterns) {
    const matcher = new Minimatch(pattern, GLOB_OPTIONS);
    const problem =
      findPatternError(pattern) ?? (matcher.makeRe() === false ? 'cannot be compiled' : undefined);
    if (problem !== undefined) {
      logger?.warn(`Ignoring invalid glob pattern: ${pattern} (${problem})`);
      continue;
    }
    compiled.push(matcher);
  }
  return compiled;
}

/**
 * Create the filter for a scan configuration.
 *
 * @example
 * ```ts
 * const filter = createPathFilter(config);
 * filter.shouldDescend('.git');            // false
 * filter.shouldInclude('src/main.go');     // true when '.go' is allowed
 * ```
 */
export function createPathFilter(config: ScanConfig, logger?: Logger): PathFilter {
  const matchers = compileGlobPatterns(config.globPatterns, logger);

  return {
    shouldDescend(dirName: string): boolean {
      return !config.ignoredDirNames.has(dirName);
    },

    shouldInclude(filePath: string, fileName: string = basename(filePath)): boolean {
      if (!config.allowedExtensions.has(getFileExtension(fileName))) {
        return false;
      }
      return !matchers.some((matcher) => matcher.match(fileName));
    },
  };
}
