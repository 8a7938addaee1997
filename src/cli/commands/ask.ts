/**
 * Ask Command
 *
 * One-shot question answering over the indexed courses. Sessions live in
 * memory, so follow-up questions belong in `course-rag chat`.
 *
 *   course-rag ask "What does lesson 2 of the MCP course cover?"
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { SourceCitation } from '../../agent/index.js';
import { defaultServices, type CommandServices } from '../runtime.js';
import type { CommandContext } from '../types.js';

/**
 * Numbered source list, one line per citation: `[1] label (link)`.
 */
export function formatSources(sources: readonly SourceCitation[]): string[] {
  return sources.map((source, i) => {
    const link = source.link ? ` ${chalk.dim(`(${source.link})`)}` : '';
    return `[${i + 1}] ${source.label}${link}`;
  });
}

export function createAskCommand(
  getContext: () => CommandContext,
  services: CommandServices = defaultServices
): Command {
  return new Command('ask')
    .argument('<question>', 'Question about the course materials')
    .description('Ask a question about the indexed courses')
    .action(async (question: string) => {
      const ctx = getContext();
      const assistant = services.openAssistant(services.loadConfig(), ctx);

      ctx.debug(`Question: ${question}`);
      const response = await assistant.ask({ query: question });

      if (ctx.options.json) {
        ctx.json(response);
        return;
      }

      ctx.log(response.answer);
      if (response.sources.length > 0) {
        ctx.log('');
        ctx.log(chalk.bold('Sources:'));
        for (const line of formatSources(response.sources)) {
          ctx.log(`  ${line}`);
        }
      }
    });
}
