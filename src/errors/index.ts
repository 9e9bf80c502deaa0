/**
 * Error handling module for repo-lens
 *
 * This module exports:
 * - Custom error classes for different error types
 * - Error formatting and handling utilities
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: lens config list');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  ValidationError,
  WalkError,
  SinkError,
  ScanAbortedError,
} from './types.js';

// Error handling utilities
export {
  describeError,
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  toError,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
