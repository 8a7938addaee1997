#!/usr/bin/env node
/**
 * course-rag CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions } from './types.js';
import { createContext, readVersion } from './runtime.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createCoursesCommand } from './commands/courses.js';
import { createIngestCommand } from './commands/ingest.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

const program = new Command();

program
  .name('course-rag')
  .description('Question answering over course materials')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('course-rag ingest ./docs')}                    Index a folder of course documents
  ${chalk.cyan('course-rag ask "What is covered in lesson 2?"')}  Ask a question
  ${chalk.cyan('course-rag chat')}                             Multi-turn conversation
  ${chalk.cyan('course-rag courses')}                          List indexed courses
  ${chalk.cyan('course-rag config set search.max_results 8')}  Change a setting
`);

/**
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createIngestCommand(getContext));
program.addCommand(createAskCommand(getContext));
program.addCommand(createChatCommand(getContext));
program.addCommand(createCoursesCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0] ?? ''}`,
    'Run: course-rag --help  to see available commands'
  );
});

async function main(): Promise<void> {
  const globalHandler = createGlobalErrorHandler(getGlobalOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getGlobalOptions());
  }
}

void main();
