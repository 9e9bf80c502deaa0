/**
 * Progress Reporter
 *
 * Progress display for `lens scan`:
 * - Interactive: an ora spinner counting delivered files
 * - Text: one line at start and one at the end, for non-TTY output
 * - JSON: silent; the command prints a single summary object
 *
 * Spinner updates are throttled to one per 100ms.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Configuration options for the ProgressReporter.
 */
export interface ProgressReporterOptions {
  /** Suppress all progress output (the command prints JSON instead) */
  json: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private delivered = 0;
  private lastUpdateTime = 0;

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  /** Maximum length for file path display */
  private static readonly MAX_PATH_LENGTH = 40;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * Announce the start of a scan.
   */
  start(root: string): void {
    this.delivered = 0;
    if (this.options.json) return;

    const text = `Scanning ${root}...`;
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({ text, color: 'cyan' }).start();
    } else {
      console.log(chalk.cyan(text));
    }
  }

  /**
   * Count one delivered file. Safe to call from a concurrent sink.
   */
  fileDelivered(path: string): void {
    this.delivered++;
    if (!this.spinner) return;

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    const count = `${this.delivered.toLocaleString()} files`;
    this.spinner.text = `${count.padEnd(16)} ${chalk.dim(truncatePath(path, ProgressReporter.MAX_PATH_LENGTH))}`;
  }

  /**
   * Finish with a success line.
   */
  succeed(message: string): void {
    if (this.options.json) return;

    if (this.spinner) {
      this.spinner.succeed(chalk.green(message));
      this.spinner = null;
    } else {
      console.log(chalk.green(`✓ ${message}`));
    }
  }

  /**
   * Stop the spinner after a failed scan. The error itself is reported by
   * the global error handler.
   */
  fail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    }
  }
}

/**
 * Truncate a file path to fit display width, keeping its tail.
 */
export function truncatePath(path: string, maxLength: number): string {
  if (path.length <= maxLength) {
    return path;
  }
  return '...' + path.slice(-(maxLength - 3));
}

/**
 * Format milliseconds as human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format bytes as human-readable size.
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Create a ProgressReporter with sensible defaults.
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}
