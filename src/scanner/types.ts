/**
 * Scanner Types
 *
 * Type definitions for the concurrent scanner. These types define the
 * contract between the tree walk, the reader workers and the caller's sink.
 */

import type { Logger } from '../utils/logger.js';

/**
 * Immutable description of one scan.
 * Built once by createScanConfig and never mutated during a scan.
 */
export interface ScanConfig {
  /** Directory being scanned (absolute or relative) */
  readonly root: string;

  /** Directory names that are never descended into (exact match) */
  readonly ignoredDirNames: ReadonlySet<string>;

  /** Glob patterns matched against file base names; any match excludes */
  readonly globPatterns: readonly string[];

  /** Extensions (with leading dot) a file must have to be read */
  readonly allowedExtensions: ReadonlySet<string>;
}

/**
 * One accepted, successfully read file.
 */
export interface FileRecord {
  path: string;
  content: Buffer;
}

/**
 * Receives each accepted file's path and bytes.
 *
 * Called from up to `workerCount` workers at once, in no particular order.
 * Any synchronization of shared state is the sink's responsibility.
 * A returned promise is awaited before the worker takes its next path.
 */
export type FileSink = (path: string, content: Buffer) => void | Promise<void>;

/**
 * Optional knobs for a scan.
 */
export interface ScanOptions {
  /**
   * Maximum number of accepted paths waiting for a worker.
   * The walk pauses while the queue is full.
   * @default 100
   */
  queueCapacity?: number;

  /**
   * Cancels the scan. Checked at every directory and file boundary;
   * queued paths are dropped and in-flight reads are allowed to finish.
   */
  signal?: AbortSignal;

  /**
   * Receives debug lines for unreadable files and a summary at the end.
   * Nothing is logged when omitted.
   */
  logger?: Logger;
}

/**
 * Counters for a completed scan.
 */
export interface ScanStats {
  /** Paths accepted by the filter and handed to the worker pool */
  filesDispatched: number;

  /** Sink invocations that completed */
  filesDelivered: number;

  /** Dispatched paths dropped because the read failed */
  readErrors: number;

  /** Directories listed by the walk (the root included) */
  directoriesVisited: number;

  /** Directories pruned by name */
  directoriesSkipped: number;

  /** Total bytes delivered to the sink */
  bytesRead: number;

  /** Wall-clock duration in milliseconds */
  scanDurationMs: number;
}

/**
 * Default capacity of the queue between the walk and the workers.
 */
export const DEFAULT_QUEUE_CAPACITY = 100;

/**
 * Directory names skipped when none are configured.
 */
export const DEFAULT_IGNORED_DIR_NAMES = ['.git', 'node_modules'];

/**
 * Extensions read when none are configured.
 */
export const DEFAULT_ALLOWED_EXTENSIONS = [
  '.svelte',
  '.ts',
  '.go',
  '.html',
  '.sql',
];

/**
 * Ignore file looked up under the scanned root by default.
 */
export const DEFAULT_IGNORE_FILE = '.gitignore';
