/**
 * Scan Command
 *
 * Reads every matching file under a directory into a context bundle.
 *
 * Usage:
 *   lens scan                      Scan the current directory
 *   lens scan ./app -e ts,go       Only read .ts and .go files
 *   lens scan . -x '*_test.go'     Exclude files by base-name pattern
 *   lens scan . -o context.txt     Write the bundle to a file
 *   lens scan . -o -               Write the bundle to stdout
 *   lens scan . --list             Print the paths that were read
 *   lens scan . --json             Print a JSON summary
 */

import { Command, InvalidArgumentError } from 'commander';
import { existsSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { createProgressReporter, formatBytes, formatDuration } from '../utils/progress.js';
import { loadConfig, resolveScanSettings } from '../../config/index.js';
import { createContextCollector } from '../../context/collector.js';
import { CLIError, FileNotFoundError } from '../../errors/index.js';
import { createScanConfig, scan, type ScanStats } from '../../scanner/index.js';

/**
 * Command-specific options.
 */
interface ScanCommandOptions {
  ext?: string;
  ignoreFile?: string;
  exclude?: string[];
  ignoreDir?: string[];
  workers?: number;
  maxBytes?: number;
  output?: string;
  list?: boolean;
}

/**
 * Parse a positive integer option value.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Create the scan command.
 *
 * @param getContext - Factory function to get the command context
 * @returns Configured Commander command
 */
export function createScanCommand(getContext: () => CommandContext): Command {
  return new Command('scan')
    .argument('[dir]', 'Directory (or single file) to scan', '.')
    .description('Read matching files into a context bundle')
    .option('-e, --ext <list>', 'Comma-separated extensions to read (e.g. ts,go,.sql)')
    .option('-i, --ignore-file <path>', 'Ignore file with base-name glob patterns (relative to dir)')
    .option('-x, --exclude <pattern...>', 'Additional base-name glob patterns to exclude')
    .option('--ignore-dir <name...>', 'Directory names to skip (replaces the configured list)')
    .option('-w, --workers <n>', 'Number of concurrent readers', parsePositiveInt)
    .option(
      '--max-bytes <n>',
      'Bundle size limit in bytes; files that would exceed it are left out, in path order',
      parsePositiveInt
    )
    .option('-o, --output <file>', 'Write the context bundle to a file ("-" for stdout)')
    .option('--list', 'List the files that were read', false)
    .action(async (dir: string, cmdOptions: ScanCommandOptions) => {
      const ctx = getContext();
      const toStdout = cmdOptions.output === '-';

      // Both would go to stdout
      if (toStdout && ctx.options.json) {
        throw new CLIError(
          'Cannot write the bundle to stdout in JSON mode',
          'Use -o <file> for the bundle, or drop --json'
        );
      }

      if (!existsSync(dir)) {
        throw new FileNotFoundError(resolve(dir));
      }

      const config = loadConfig();
      const settings = resolveScanSettings(dir, config, {
        extensions: cmdOptions.ext?.split(','),
        ignoreFile: cmdOptions.ignoreFile,
        patterns: cmdOptions.exclude,
        ignoredDirs: cmdOptions.ignoreDir,
        workers: cmdOptions.workers,
        maxBytes: cmdOptions.maxBytes,
      });

      ctx.debug(`Workers: ${settings.workerCount}, queue capacity: ${settings.queueCapacity}`);
      ctx.debug(`Extensions: ${(settings.input.allowedExtensions ?? []).join(' ')}`);

      const scanConfig = createScanConfig(settings.input, ctx);
      ctx.debug(`Glob patterns: ${scanConfig.globPatterns.length}`);

      const reporter = createProgressReporter({ json: ctx.options.json || toStdout });
      const collector = createContextCollector({ root: dir, maxBytes: settings.maxBytes });

      // Ctrl+C stops feeding new files and lets in-flight reads finish
      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once('SIGINT', onSigint);

      reporter.start(dir);
      let stats: ScanStats;
      try {
        stats = await scan(
          scanConfig,
          settings.workerCount,
          async (path, content) => {
            await collector.sink(path, content);
            reporter.fileDelivered(path);
          },
          { queueCapacity: settings.queueCapacity, signal: controller.signal, logger: ctx }
        );
      } catch (error) {
        reporter.fail('Scan failed');
        throw error;
      } finally {
        process.off('SIGINT', onSigint);
      }

      if (cmdOptions.output && !toStdout) {
        writeFileSync(cmdOptions.output, collector.render(), 'utf-8');
      } else if (toStdout) {
        process.stdout.write(collector.render());
      }

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              root: resolve(dir),
              files: collector.count,
              bytes: collector.bytes,
              skipped: collector.skipped,
              readErrors: stats.readErrors,
              durationMs: stats.scanDurationMs,
              output: cmdOptions.output,
              paths: cmdOptions.list ? collector.paths() : undefined,
            },
            null,
            2
          )
        );
        return;
      }

      if (toStdout) return;

      reporter.succeed(
        `${collector.count} files loaded into context (${formatBytes(collector.bytes)}, ${formatDuration(stats.scanDurationMs)})`
      );

      if (collector.skipped > 0) {
        ctx.warn(`${collector.skipped} file(s) left out: bundle size limit reached`);
      }
      if (stats.readErrors > 0) {
        ctx.debug(`${stats.readErrors} file(s) could not be read`);
      }

      if (cmdOptions.list) {
        for (const path of collector.paths()) {
          ctx.log(`  ${path}`);
        }
      }

      if (cmdOptions.output) {
        ctx.log(chalk.dim(`Context written to ${cmdOptions.output}`));
      }
    });
}
