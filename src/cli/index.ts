/**
 * gochunk CLI Entry Point
 *
 * This is the main entry point for the `gochunk` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createConfigCommand } from './commands/config.js';
import { createExtractCommand } from './commands/extract.js';
import {
  handleError,
  createGlobalErrorHandler,
  CLIError,
} from '../errors/index.js';

// Version injected at build time via tsup define
const VERSION = process.env.CLI_VERSION ?? '0.0.0';

// Create the root program
const program = new Command();

// Configure the program
program
  .name('gochunk')
  .description('Extract declaration-level code chunks from a Go module and its vendored dependencies')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  // Custom help formatting
  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('gochunk extract .')}                          Extract chunks to code_chunks.json
  ${chalk.cyan('gochunk extract ./svc -o svc.json')}          Write to a different file
  ${chalk.cyan('gochunk extract . --tags integration')}       Add build tags
  ${chalk.cyan('gochunk config list')}                        Show all configuration
  ${chalk.cyan('gochunk config set output.indent 4')}         Change a setting
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
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
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

// Extract command - load, extract and write chunks
program.addCommand(createExtractCommand(() => createContext(getGlobalOptions())));

// Config command - manage ~/.gochunk/config.toml
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

// Handle unknown commands gracefully
program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    `Run: gochunk --help  to see available commands`
  );
});

// Parse arguments and execute
async function main(): Promise<void> {
  // Options are read lazily so --verbose/--json apply once parsed
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Set up global error handlers for uncaught exceptions
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
