/**
 * Context Collector
 *
 * A FileSink that accumulates delivered files into a single context bundle.
 * Deliveries arrive concurrently and in any order; the collector stores them
 * keyed by path and sorts on read, so the bundle is the same on every run.
 */

import { relative } from 'node:path';

import type { FileRecord, FileSink } from '../scanner/types.js';

/**
 * Options for createContextCollector.
 */
export interface ContextCollectorOptions {
  /** Paths in the bundle are shown relative to this directory */
  root?: string;

  /**
   * Maximum total content size in bytes. Files are taken in path order; one
   * that would go over the budget is left out and counted as skipped, and
   * later smaller files may still fit.
   */
  maxBytes?: number;
}

/**
 * Accumulator returned by createContextCollector.
 */
export interface ContextCollector {
  /** Pass this to scan() */
  readonly sink: FileSink;

  /** Number of files kept */
  readonly count: number;

  /** Total bytes kept */
  readonly bytes: number;

  /** Number of files dropped by the byte budget */
  readonly skipped: number;

  /** Kept files, sorted by path */
  records(): FileRecord[];

  /** Paths of kept files as shown in the bundle, sorted */
  paths(): string[];

  /** The bundle text: one `--- FILE: <path> ---` block per file */
  render(): string;
}

interface BundleSelection {
  kept: FileRecord[];
  bytes: number;
  skipped: number;
}

/**
 * Create a collector sink.
 *
 * @example
 * ```ts
 * const collector = createContextCollector({ root: './project' });
 * await scan(config, 4, collector.sink);
 * writeFileSync('context.txt', collector.render());
 * ```
 */
export function createContextCollector(
  options: ContextCollectorOptions = {}
): ContextCollector {
  const { root, maxBytes = Infinity } = options;
  const files = new Map<string, Buffer>();
  let selection: BundleSelection | undefined;

  const sink: FileSink = (path, content) => {
    files.set(path, content);
    selection = undefined;
  };

  // The budget is applied on read, so the result does not depend on the
  // order in which workers delivered
  const select = (): BundleSelection => {
    if (selection) return selection;

    const kept: FileRecord[] = [];
    let bytes = 0;
    let skipped = 0;
    const sorted = [...files.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [path, content] of sorted) {
      if (bytes + content.length > maxBytes) {
        skipped++;
        continue;
      }
      kept.push({ path, content });
      bytes += content.length;
    }

    selection = { kept, bytes, skipped };
    return selection;
  };

  const displayPath = (path: string): string =>
    root === undefined ? path : relative(root, path) || path;

  const records = (): FileRecord[] => [...select().kept];

  return {
    sink,
    get count() {
      return select().kept.length;
    },
    get bytes() {
      return select().bytes;
    },
    get skipped() {
      return select().skipped;
    },
    records,
    paths: () => records().map((record) => displayPath(record.path)),
    render: () =>
      records()
        .map(
          (record) =>
            `\n--- FILE: ${displayPath(record.path)} ---\n${record.content.toString('utf-8')}\n`
        )
        .join(''),
  };
}
