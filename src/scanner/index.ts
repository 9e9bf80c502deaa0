/**
 * Scanner Module
 *
 * Concurrent discovery and reading of source files. A single walk feeds a
 * bounded queue; a fixed pool of workers reads each accepted file and
 * streams it to a caller-supplied sink.
 *
 * @example
 * ```ts
 * import { createScanConfig, scan } from './scanner/index.js';
 *
 * const config = createScanConfig({ root: '.', allowedExtensions: ['.ts'] });
 * const stats = await scan(config, 4, (path, content) => {
 *   console.log(`${path}: ${content.length} bytes`);
 * });
 * ```
 */

// Main scanner function
export { scan } from './walker.js';

// Configuration
export {
  createScanConfig,
  resolveIgnoreFile,
  ScanConfigInputSchema,
  type ScanConfigInput,
} from './config.js';

// Filtering
export {
  createPathFilter,
  compileGlobPatterns,
  findPatternError,
  getFileExtension,
  GLOB_OPTIONS,
  type PathFilter,
} from './filter.js';

// Ignore file utilities
export { loadIgnoreFile, parseIgnoreContent } from './ignore.js';

// Work queue
export { BoundedQueue } from './queue.js';

// Types and constants
export {
  type ScanConfig,
  type FileRecord,
  type FileSink,
  type ScanOptions,
  type ScanStats,
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_IGNORED_DIR_NAMES,
  DEFAULT_ALLOWED_EXTENSIONS,
  DEFAULT_IGNORE_FILE,
} from './types.js';
