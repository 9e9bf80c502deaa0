/**
 * Config Command
 *
 * Reads and edits the [scan] and [output] settings in ~/.lens/config.toml:
 *   lens config get scan.workers
 *   lens config set scan.extensions .ts,.go
 *   lens config list
 *   lens config path
 *   lens config reset --force
 *
 * Failures are thrown as ConfigError and reported by the global handler.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  describeConfigKey,
  getConfigPath,
  getConfigValue,
  listConfig,
  resetConfig,
  setConfigValue,
} from '../../config/index.js';
import { CLIError, ConfigError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/** Lists and tables print as JSON, everything else as-is */
function formatValue(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/** Print a JSON object in --json mode, or text lines otherwise */
function report(ctx: CommandContext, json: object, text: () => string[]): void {
  if (ctx.options.json) {
    console.log(JSON.stringify(json));
    return;
  }
  for (const line of text()) {
    ctx.log(line);
  }
}

function unknownKey(key: string): ConfigError {
  const keys = listConfig().map(([name]) => name);
  return new ConfigError(`Unknown config key: ${key}`, `Valid keys: ${keys.join(', ')}`);
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Read and change scan settings');

  configCmd
    .command('get <key>')
    .description('Print one setting (e.g. lens config get scan.workers)')
    .action((key: string) => {
      const value = getConfigValue(key);
      if (value === undefined) {
        throw unknownKey(key);
      }
      report(getContext(), { key, value }, () => [formatValue(value)]);
    });

  configCmd
    .command('set <key> <value>')
    .description('Change one setting; list settings take comma-separated values')
    .action((key: string, value: string) => {
      if (describeConfigKey(key) === undefined) {
        throw unknownKey(key);
      }
      setConfigValue(key, value);
      const stored = getConfigValue(key);
      report(getContext(), { key, value: stored }, () => [
        `${chalk.green('✓')} ${chalk.cyan(key)} = ${chalk.yellow(formatValue(stored))}`,
      ]);
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('Show every setting with its description')
    .action(() => {
      const entries = listConfig();
      report(getContext(), Object.fromEntries(entries), () => {
        const lines: string[] = [];
        let section = '';
        for (const [key, value] of entries) {
          const [head = '', name = key] = key.split('.');
          if (head !== section) {
            if (section !== '') lines.push('');
            lines.push(chalk.bold(`[${head}]`));
            section = head;
          }
          lines.push(`  ${chalk.cyan(name)} = ${chalk.yellow(formatValue(value))}`);
          const description = describeConfigKey(key);
          if (description) {
            lines.push(chalk.dim(`    ${description}`));
          }
        }
        lines.push('', chalk.dim(`Config file: ${getConfigPath()}`));
        return lines;
      });
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const path = getConfigPath();
      report(getContext(), { path }, () => [path]);
    });

  configCmd
    .command('reset')
    .description('Restore the default config file')
    .option('-f, --force', 'Confirm the reset')
    .action((options: { force?: boolean }) => {
      if (!options.force) {
        throw new CLIError(
          'Refusing to reset the configuration without --force',
          'Run: lens config reset --force'
        );
      }
      resetConfig();
      report(getContext(), { reset: true, path: getConfigPath() }, () => [
        `${chalk.green('✓')} Configuration reset to defaults`,
      ]);
    });

  return configCmd;
}
