/**
 * Chat Command
 *
 * Interactive multi-turn REPL. Every question in one run shares a session,
 * so follow-ups see the recent exchanges.
 *
 *   course-rag chat
 *
 * REPL Commands:
 *   /clear  - Forget the conversation so far
 *   /exit   - Leave the chat (Ctrl+D works too)
 */

import * as readline from 'node:readline';
import { Command } from 'commander';
import chalk from 'chalk';

import type { CourseAssistant } from '../../agent/index.js';
import { CLIError } from '../../errors/index.js';
import { defaultServices, type CommandServices } from '../runtime.js';
import type { CommandContext } from '../types.js';
import { formatSources } from './ask.js';

export interface ChatLoopOptions {
  /** Called whenever the loop waits for the next line */
  prompt?: () => void;
}

export interface ChatLoopResult {
  sessionId: string;
  /** Questions that got an answer */
  turns: number;
}

/**
 * Answer lines until the input ends or `/exit` is read.
 * A failed question is reported and the loop goes on.
 */
export async function runChatLoop(
  assistant: CourseAssistant,
  ctx: CommandContext,
  lines: AsyncIterable<string>,
  options: ChatLoopOptions = {}
): Promise<ChatLoopResult> {
  const sessionId = assistant.conversations.createSession();
  let turns = 0;

  options.prompt?.();
  for await (const raw of lines) {
    const line = raw.trim();

    if (line === '/exit' || line === '/quit') {
      break;
    }

    if (line === '/clear') {
      assistant.conversations.clearSession(sessionId);
      ctx.log(chalk.dim('Conversation cleared.'));
    } else if (line.length > 0) {
      try {
        const response = await assistant.ask({ query: line, sessionId });
        turns++;
        ctx.log(response.answer);
        for (const source of formatSources(response.sources)) {
          ctx.log(chalk.dim(`  ${source}`));
        }
      } catch (error) {
        if (!(error instanceof Error)) throw error;
        ctx.error(error.message);
        if (error instanceof CLIError && error.hint) {
          ctx.log(chalk.dim(error.hint));
        }
      }
    }

    options.prompt?.();
  }

  return { sessionId, turns };
}

export function createChatCommand(
  getContext: () => CommandContext,
  services: CommandServices = defaultServices
): Command {
  return new Command('chat')
    .description('Start an interactive chat about the indexed courses')
    .action(async () => {
      const ctx = getContext();
      const assistant = services.openAssistant(services.loadConfig(), ctx);
      const { totalCourses } = assistant.getCourseAnalytics();

      ctx.log(chalk.bold(`course-rag chat (${totalCourses} course(s) indexed)`));
      ctx.log(chalk.dim('Type /clear to reset the conversation, /exit to quit.'));
      ctx.log('');

      const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
      rl.setPrompt(chalk.cyan('> '));

      try {
        const result = await runChatLoop(assistant, ctx, rl, { prompt: () => rl.prompt() });
        ctx.debug(`Chat ended after ${result.turns} question(s)`);
      } finally {
        rl.close();
      }
    });
}
