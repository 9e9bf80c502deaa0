/**
 * Error type definitions for the repo-lens CLI and scanner
 *
 * Every error carries:
 * - An actionable message with a recovery hint
 * - An exit code for programmatic error handling
 */

/**
 * Base class for all CLI errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Values outside their allowed range
 * - Unknown config keys
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: lens config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when the directory tree itself cannot be enumerated:
 * a missing root, or a directory that cannot be listed.
 *
 * Per-file read failures never produce this error.
 *
 * Exit code 6: Walk error
 */
export class WalkError extends CLIError {
  /** The path whose enumeration failed */
  public readonly path: string;

  /** The underlying file system error */
  public readonly cause?: Error;

  constructor(path: string, cause?: Error) {
    const reason = cause ? `: ${cause.message}` : '';
    super(
      `Failed to walk ${path}${reason}`,
      'Check that the directory exists and is readable',
      6
    );
    this.name = 'WalkError';
    this.path = path;
    this.cause = cause;
  }
}

/**
 * Thrown when the caller-supplied sink fails while receiving a file.
 *
 * Exit code 7: Sink error
 */
export class SinkError extends CLIError {
  /** Path of the file being delivered when the sink failed */
  public readonly path: string;

  /** The error raised by the sink */
  public readonly cause?: Error;

  constructor(path: string, cause?: Error) {
    const reason = cause ? `: ${cause.message}` : '';
    super(
      `File sink failed for ${path}${reason}`,
      'The scan stopped feeding new files; results so far were kept',
      7
    );
    this.name = 'SinkError';
    this.path = path;
    this.cause = cause;
  }
}

/**
 * Thrown when a scan is cancelled through its AbortSignal.
 *
 * Named 'AbortError' so callers can treat it like any other aborted
 * operation in Node.js.
 *
 * Exit code 130: Interrupted
 */
export class ScanAbortedError extends CLIError {
  constructor(root: string) {
    super(`Scan of ${root} was aborted`, undefined, 130);
    this.name = 'AbortError';
  }
}
