/**
 * repo-lens - Library Entry Point
 *
 * The CLI (`lens`) covers everyday use:
 * ```bash
 * lens scan ./my-project -o context.txt
 * ```
 *
 * The library exposes the concurrent scanner for tools that want to
 * consume files as they are read.
 *
 * @example Streaming files into your own sink
 * ```typescript
 * import { createScanConfig, scan } from 'repo-lens';
 *
 * const config = createScanConfig({ root: '.', allowedExtensions: ['.ts'] });
 * let total = 0;
 * await scan(config, 4, (_path, content) => {
 *   total += content.length;
 * });
 * ```
 *
 * @example Building a context bundle
 * ```typescript
 * import { createContextCollector, createScanConfig, scan } from 'repo-lens';
 *
 * const collector = createContextCollector({ root: '.' });
 * await scan(createScanConfig({ root: '.' }), 4, collector.sink);
 * console.log(collector.render());
 * ```
 *
 * @packageDocumentation
 */

// Scanner
export * from './scanner/index.js';

// Context bundle sink
export {
  createContextCollector,
  type ContextCollector,
  type ContextCollectorOptions,
} from './context/collector.js';

// Errors
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  ValidationError,
  WalkError,
  SinkError,
  ScanAbortedError,
} from './errors/index.js';

// Logging
export { consoleLogger, silentLogger, type Logger } from './utils/logger.js';
