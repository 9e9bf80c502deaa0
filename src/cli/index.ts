#!/usr/bin/env node
/**
 * repo-lens CLI Entry Point
 *
 * This is the main entry point for the `lens` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createConfigCommand } from './commands/config.js';
import { createScanCommand } from './commands/scan.js';
import {
  handleError,
  createGlobalErrorHandler,
  CLIError,
} from '../errors/index.js';

const VERSION = process.env.LENS_VERSION ?? '0.1.0';

// Create the root program
const program = new Command();

program
  .name('lens')
  .description('Read a source tree into a single context bundle, fast')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('lens scan ./my-project')}              Read matching files and report the count
  ${chalk.cyan('lens scan . -e ts,go -o context.txt')}  Bundle .ts and .go files into context.txt
  ${chalk.cyan("lens scan . -x '*_test.go' --list")}    Exclude tests and list what was read
  ${chalk.cyan('lens config list')}                    Show all configuration
  ${chalk.cyan('lens config set scan.workers 8')}      Change a setting
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.error(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<GlobalOptions>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

// Scan command - read a tree into a context bundle
program.addCommand(createScanCommand(() => createContext(getGlobalOptions())));

// Config command - manage ~/.lens/config.toml
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

// Handle unknown commands gracefully
program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    `Run: lens --help  to see available commands`
  );
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
