/**
 * Concurrent Walker
 *
 * Walks the tree rooted at `config.root`, applies the path filter, and
 * dispatches accepted file paths over a bounded queue to a fixed pool of
 * reader workers. Each worker reads a file and hands its bytes to the sink.
 *
 * Shutdown order: the walk ends (normally, on error or on abort), the queue
 * is closed, the workers drain it and exit, and only then does `scan`
 * settle. No read is in flight once the returned promise settles.
 */

import type { Dirent, Stats } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';

import {
  ScanAbortedError,
  SinkError,
  ValidationError,
  WalkError,
  toError,
} from '../errors/index.js';
import { createPathFilter, type PathFilter } from './filter.js';
import { BoundedQueue } from './queue.js';
import {
  DEFAULT_QUEUE_CAPACITY,
  type FileSink,
  type ScanConfig,
  type ScanOptions,
  type ScanStats,
} from './types.js';

// Re-export types for consumers
export type { FileSink, ScanOptions, ScanStats };

/**
 * Mutable state shared by the walk and the workers of one scan.
 */
interface WalkState {
  /** First walk-level or sink failure */
  failure?: Error;
  /** Set when the sink fails: the walk stops and queued paths are dropped */
  halted: boolean;
}

/**
 * Scan a tree and stream every accepted file to `sink`.
 *
 * Per-file read failures are skipped silently (and logged at debug level
 * when a logger is given). Walk-level failures reject the returned promise
 * with a WalkError, but only after every queued path has been drained.
 *
 * @param config - Immutable scan configuration
 * @param workerCount - Number of concurrent readers (integer >= 1)
 * @param sink - Receives each file's path and content, possibly concurrently
 * @param options - Queue capacity, cancellation and logging
 * @returns Counters for the completed scan
 *
 * @example
 * ```ts
 * const config = createScanConfig({ root: './project' });
 * const files = new Map<string, Buffer>();
 *
 * await scan(config, availableParallelism(), (path, content) => {
 *   files.set(path, content);
 * });
 * ```
 */
export async function scan(
  config: ScanConfig,
  workerCount: number,
  sink: FileSink,
  options: ScanOptions = {}
): Promise<ScanStats> {
  const { queueCapacity = DEFAULT_QUEUE_CAPACITY, signal, logger } = options;

  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new ValidationError('Invalid worker count', [
      `workerCount must be an integer >= 1 (got ${workerCount})`,
    ]);
  }
  if (!Number.isInteger(queueCapacity) || queueCapacity < 1) {
    throw new ValidationError('Invalid queue capacity', [
      `queueCapacity must be an integer >= 1 (got ${queueCapacity})`,
    ]);
  }

  const startTime = performance.now();
  const filter = createPathFilter(config, logger);
  const queue = new BoundedQueue<string>(queueCapacity);

  const stats: ScanStats = {
    filesDispatched: 0,
    filesDelivered: 0,
    readErrors: 0,
    directoriesVisited: 0,
    directoriesSkipped: 0,
    bytesRead: 0,
    scanDurationMs: 0,
  };

  const state: WalkState = { halted: false };
  const stopped = (): boolean => state.halted || (signal?.aborted ?? false);

  async function runWorker(): Promise<void> {
    for await (const filePath of queue) {
      // After an abort or a sink failure, queued paths are dropped unread
      if (stopped()) continue;

      let content: Buffer;
      try {
        content = await readFile(filePath);
      } catch (error) {
        stats.readErrors++;
        logger?.debug?.(`Skipping unreadable file ${filePath}: ${toError(error).message}`);
        continue;
      }

      try {
        await sink(filePath, content);
      } catch (error) {
        state.failure ??= new SinkError(filePath, toError(error));
        state.halted = true;
        continue;
      }

      stats.filesDelivered++;
      stats.bytesRead += content.length;
    }
  }

  const workers = Array.from({ length: workerCount }, () => runWorker());

  try {
    await walkTree(config.root, filter, queue, stats, stopped);
  } catch (error) {
    state.failure ??= error instanceof WalkError ? error : new WalkError(config.root, toError(error));
  } finally {
    queue.close();
  }

  await Promise.all(workers);
  stats.scanDurationMs = Math.round(performance.now() - startTime);

  if (state.failure) {
    throw state.failure;
  }
  if (signal?.aborted) {
    throw new ScanAbortedError(config.root);
  }

  logger?.debug?.(
    `Scanned ${config.root}: ${stats.filesDelivered}/${stats.filesDispatched} files delivered in ${stats.scanDurationMs}ms`
  );
  return stats;
}

/**
 * Producer side of the scan: a depth-first walk that pushes accepted paths.
 * Entries of each directory are visited in name order.
 */
async function walkTree(
  root: string,
  filter: PathFilter,
  queue: BoundedQueue<string>,
  stats: ScanStats,
  stopped: () => boolean
): Promise<void> {
  let rootStat: Stats;
  try {
    rootStat = await stat(root);
  } catch (error) {
    throw new WalkError(root, toError(error));
  }

  // A file root is scanned as a single entry; a special file yields nothing
  if (!rootStat.isDirectory()) {
    if (rootStat.isFile() && filter.shouldInclude(root)) {
      await queue.push(root);
      stats.filesDispatched++;
    }
    return;
  }

  if (!filter.shouldDescend(basename(root))) {
    stats.directoriesSkipped++;
    return;
  }

  async function walkDirectory(dir: string): Promise<void> {
    if (stopped()) return;

    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      throw new WalkError(dir, toError(error));
    }
    stats.directoriesVisited++;

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (stopped()) return;

      const entryPath = join(dir, entry.name);

      if (entry.isDirectory()) {
        if (!filter.shouldDescend(entry.name)) {
          stats.directoriesSkipped++;
          continue;
        }
        await walkDirectory(entryPath);
        continue;
      }

      // Symlinks are not followed during the walk; reading one follows it.
      // Sockets, FIFOs and devices are never read.
      if (!entry.isFile() && !entry.isSymbolicLink()) continue;

      if (filter.shouldInclude(entryPath, entry.name)) {
        if (entry.isSymbolicLink() && (await isSpecialTarget(entryPath))) continue;
        await queue.push(entryPath);
        stats.filesDispatched++;
      }
    }
  }

  await walkDirectory(root);
}

/**
 * True when a symlink resolves to a socket, FIFO or device. A dangling link
 * is not special: reading it fails and is counted as a read error.
 */
async function isSpecialTarget(linkPath: string): Promise<boolean> {
  let target: Stats;
  try {
    target = await stat(linkPath);
  } catch {
    return false;
  }
  return !target.isFile() && !target.isDirectory();
}
