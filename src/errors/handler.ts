/**
 * Error handler for CLI error formatting and display
 *
 * This module provides:
 * - Colored error output for terminal
 * - JSON output for programmatic use
 * - Verbose mode with stack traces and causes
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  cause?: string;
  stack?: string;
}

function causeMessage(error: Error): string | undefined {
  const { cause } = error;
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Format an error for display.
 *
 * Formatting is separate from handleError so it can be tested without
 * process.exit.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (!(error instanceof Error)) {
    // Unknown error types (string, number, etc.)
    if (json) {
      return JSON.stringify({ error: String(error), code: 1 }, null, 2);
    }
    return chalk.red('Error: ') + String(error);
  }

  const hint = error instanceof CLIError ? error.hint : undefined;
  const cause = verbose ? causeMessage(error) : undefined;

  if (json) {
    const output: ErrorOutput = {
      error: error.message,
      code: getExitCode(error),
      hint,
      cause,
      stack: verbose ? error.stack : undefined,
    };
    return JSON.stringify(output, null, 2);
  }

  const lines: string[] = [];
  lines.push(chalk.red('Error: ') + error.message);

  if (hint) {
    lines.push(chalk.dim('Hint: ') + hint);
  } else if (!verbose && !(error instanceof CLIError)) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  if (cause) {
    lines.push(chalk.dim('Caused by: ') + cause);
  }

  if (verbose && error.stack) {
    lines.push('');
    lines.push(chalk.dim('Stack trace:'));
    lines.push(chalk.dim(error.stack));
  }

  return lines.join('\n');
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Handle an error by formatting it to stderr and exiting with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a global error handler for `uncaughtException` and
 * `unhandledRejection`. Options are captured at setup time.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
