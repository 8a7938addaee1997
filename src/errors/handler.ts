/**
 * Error handler for CLI error formatting and display
 *
 * - Colored error output for the terminal
 * - JSON output for programmatic use (--json)
 * - Stack traces and error causes with --verbose
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

export interface ErrorHandlerOptions {
  /** Show stack traces and underlying causes */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  name: string;
  code: number;
  hint?: string;
  cause?: string;
  stack?: string;
}

/**
 * Message of the error's `cause`, when it carries one.
 */
function describeCause(error: Error): string | undefined {
  const { cause } = error;
  if (cause instanceof Error) {
    return cause.message;
  }
  if (typeof cause === 'string') {
    return cause;
  }
  return undefined;
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError() so formatting can be tested without
 * process.exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;

  if (!(error instanceof Error)) {
    if (json) {
      return JSON.stringify({ error: String(error), name: 'Error', code: 1 }, null, 2);
    }
    return chalk.red('Error: ') + String(error);
  }

  const code = getExitCode(error);
  const hint = error instanceof CLIError ? error.hint : undefined;
  const cause = describeCause(error);

  if (json) {
    const output: ErrorOutput = {
      error: error.message,
      name: error.name,
      code,
      hint,
      cause: verbose ? cause : undefined,
      stack: verbose ? error.stack : undefined,
    };
    return JSON.stringify(output, null, 2);
  }

  const lines: string[] = [chalk.red('Error: ') + error.message];

  if (hint) {
    lines.push(chalk.dim('Hint: ') + hint);
  } else if (!verbose) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  if (verbose) {
    if (cause) {
      lines.push(chalk.dim('Caused by: ') + cause);
    }
    if (error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    }
  }

  return lines.join('\n');
}

/**
 * Exit code for an error: CLIError carries its own, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Print the formatted error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a handler for process-level events.
 *
 * Usage:
 *   const handler = createGlobalErrorHandler({ verbose: true });
 *   process.on('uncaughtException', handler);
 *   process.on('unhandledRejection', handler);
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
