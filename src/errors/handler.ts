/**
 * Error reporting for the lens CLI
 *
 * A thrown value is first reduced to an ErrorOutput report, then rendered as
 * coloured text or as JSON. Walk and sink failures report the path they
 * failed on and the underlying cause. A cancelled scan is reported as a
 * cancellation, not as an error.
 */

import chalk from 'chalk';
import {
  CLIError,
  ScanAbortedError,
  SinkError,
  ValidationError,
  WalkError,
} from './types.js';

export interface ErrorHandlerOptions {
  /** Include stack traces */
  verbose?: boolean;
  /** Print the report as JSON */
  json?: boolean;
}

/**
 * What the user sees about a failure. Also the JSON shape in --json mode.
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  /** File or directory a walk or sink failure happened on */
  path?: string;
  /** errno code (or error name) of the underlying failure */
  cause?: string;
  /** Field-level problems from a ValidationError */
  issues?: string[];
  /** Set when the scan was cancelled */
  aborted?: boolean;
  stack?: string;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function describeCause(cause: Error | undefined): string | undefined {
  if (cause === undefined) return undefined;
  if ('code' in cause && typeof cause.code === 'string') return cause.code;
  return cause.name;
}

/**
 * Reduce any thrown value to an ErrorOutput report.
 */
export function describeError(error: unknown, verbose = false): ErrorOutput {
  if (error instanceof ScanAbortedError) {
    return { error: error.message, code: error.code, aborted: true };
  }

  if (!(error instanceof Error)) {
    return { error: String(error), code: 1 };
  }

  const report: ErrorOutput =
    error instanceof CLIError
      ? { error: error.message, code: error.code, hint: error.hint }
      : { error: error.message, code: 1 };

  if (error instanceof WalkError || error instanceof SinkError) {
    report.path = error.path;
    report.cause = describeCause(error.cause);
  }
  if (error instanceof ValidationError && error.issues.length > 0) {
    report.issues = [...error.issues];
  }

  if (verbose) {
    report.stack = error.stack;
  } else if (!(error instanceof CLIError)) {
    report.hint = 'Run with --verbose for more details';
  }

  return report;
}

function renderText(report: ErrorOutput): string {
  if (report.aborted) {
    return chalk.yellow('Cancelled: ') + report.error;
  }

  const lines = [chalk.red('Error: ') + report.error];
  if (report.path !== undefined) {
    lines.push(chalk.dim('  Path:  ') + report.path);
  }
  if (report.cause !== undefined) {
    lines.push(chalk.dim('  Cause: ') + report.cause);
  }
  if (report.hint) {
    lines.push(chalk.dim('Hint: ') + report.hint);
  }
  if (report.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(report.stack));
  }
  return lines.join('\n');
}

/**
 * Format an error for display, as text or JSON.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const report = describeError(error, verbose);
  return json ? JSON.stringify(report, null, 2) : renderText(report);
}

/** CLIError carries its own exit code; anything else exits with 1 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Print an error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for process-level `uncaughtException` and `unhandledRejection`.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
