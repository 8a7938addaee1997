/**
 * Ingest Command
 *
 * Loads every course document in a folder into the index.
 *
 * Usage:
 *   course-rag ingest                 Ingest config ingest.docs_path
 *   course-rag ingest ./docs --clear  Wipe the index first
 *   course-rag ingest ./docs --json   Print the report as JSON
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

import { ingestCourseFolder, type FileProgress } from '../../indexer/index.js';
import { defaultServices, type CommandServices } from '../runtime.js';
import type { CommandContext } from '../types.js';

interface IngestCommandOptions {
  clear: boolean;
}

const STATUS_MARK: Record<FileProgress['status'], string> = {
  added: chalk.green('✓'),
  skipped: chalk.yellow('–'),
  failed: chalk.red('✗'),
};

/**
 * Create the ingest command.
 */
export function createIngestCommand(
  getContext: () => CommandContext,
  services: CommandServices = defaultServices
): Command {
  return new Command('ingest')
    .argument('[folder]', 'Folder of course documents (default: ingest.docs_path)')
    .description('Ingest course documents into the search index')
    .option('--clear', 'Remove all indexed courses before ingesting', false)
    .action(async (folder: string | undefined, cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();
      const config = services.loadConfig();
      const target = resolve(folder ?? config.ingest.docs_path);

      ctx.debug(`Ingesting ${target}`);
      ctx.debug(`Embedding: ${config.embedding.provider}/${config.embedding.model}`);

      const index = services.openIndex(config, ctx);

      let spinner: Ora | null = null;
      if (!ctx.options.json && process.stdout.isTTY) {
        spinner = ora('Scanning course documents...').start();
      }

      try {
        const report = await ingestCourseFolder(target, index, {
          clearExisting: cmdOptions.clear,
          extensions: config.ingest.extensions,
          chunking: {
            chunkSize: config.chunking.chunk_size,
            chunkOverlap: config.chunking.chunk_overlap,
          },
          logger: ctx,
          onFile: ({ file, status, current, total }) => {
            if (spinner) {
              spinner.text = `Ingesting ${current}/${total}: ${file.relativePath}`;
            } else {
              ctx.debug(`${STATUS_MARK[status]} ${file.relativePath}`);
            }
          },
        });

        spinner?.stop();

        if (report.failures.length > 0) {
          process.exitCode = 1;
        }

        if (ctx.options.json) {
          ctx.json({ folder: target, ...report });
          return;
        }

        ctx.log(
          `${chalk.green('✓')} Added ${chalk.bold(String(report.coursesAdded))} course(s), ` +
            `${chalk.bold(String(report.chunksAdded))} chunk(s)`
        );
        if (report.skipped.length > 0) {
          ctx.log(chalk.dim(`  Already indexed: ${report.skipped.join(', ')}`));
        }
        for (const failure of report.failures) {
          ctx.error(`${failure.filePath}: ${failure.error}`);
        }
        ctx.log(chalk.dim(`  ${index.getCourseCount()} course(s) in the index`));
      } catch (error) {
        spinner?.fail('Ingestion failed');
        throw error;
      }
    });
}
