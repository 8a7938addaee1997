/**
 * Query Orchestrator
 *
 * Drives one query through an explicit state machine:
 *
 * ```
 * init ──► decide ──► done                      (model answered directly)
 *             │
 *             └──► execute ──► finalize ──► done (one tool call, then answer)
 *                     │
 *                     └──► failed               (unknown tool)
 * ```
 *
 * init loads the session history. decide asks the model with every tool
 * offered. execute runs the first tool invocation only; any further
 * invocation gets an error result so the follow-up request stays valid.
 * finalize sends the query, the tool-request turn and the results with no
 * tools, forcing a text answer.
 *
 * Model or tool failures reset the citations, leave history untouched and
 * surface as QueryError. Queries are serialized: citations and history are
 * shared by every query through one orchestrator.
 */

import pLimit from 'p-limit';
import { QueryError, UnknownToolError } from '../errors/index.js';
import type {
  CompletionRequest,
  LanguageModel,
  ModelReply,
  ToolInvocation,
  ToolResult,
} from '../providers/index.js';
import { consoleLogger, scopedLogger, type Logger } from '../utils/index.js';
import type { ConversationStore } from './conversation-store.js';
import { buildSystemPrompt } from './prompts.js';
import type { ToolRegistry } from './tools/index.js';
import type { OrchestratorState, QueryOutcome } from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const GENERIC_FAILURE_ANSWER = "I'm sorry, I couldn't complete that request.";

export const SKIPPED_TOOL_CALL = 'Skipped: only one tool call is executed per query.';

const DEFAULT_TEMPERATURE = 0;
const DEFAULT_MAX_TOKENS = 800;

// ============================================================================
// TYPES
// ============================================================================

export interface OrchestratorOptions {
  model: LanguageModel;
  tools: ToolRegistry;
  conversations: ConversationStore;
  /** @default 0 */
  temperature?: number;
  /** @default 800 */
  maxTokens?: number;
  logger?: Logger;
}

type ToolUseReply = Extract<ModelReply, { kind: 'tool_use' }>;

/**
 * Data carried between states.
 */
type Step =
  | { state: 'init' }
  | { state: 'decide'; system: string }
  | { state: 'execute'; system: string; reply: ToolUseReply }
  | { state: 'finalize'; system: string; reply: ToolUseReply; results: ToolResult[] }
  | { state: 'done'; answer: string }
  | { state: 'failed'; answer: string };

type TerminalStep = Extract<Step, { state: 'done' | 'failed' }>;

function isTerminal(step: Step): step is TerminalStep {
  return step.state === 'done' || step.state === 'failed';
}

// ============================================================================
// ORCHESTRATOR
// ============================================================================

export class QueryOrchestrator {
  private readonly model: LanguageModel;
  private readonly tools: ToolRegistry;
  private readonly conversations: ConversationStore;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly log: Logger;
  private readonly queue = pLimit(1);

  constructor(options: OrchestratorOptions) {
    this.model = options.model;
    this.tools = options.tools;
    this.conversations = options.conversations;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.log = scopedLogger(options.logger ?? consoleLogger, 'orchestrator');
  }

  /**
   * Answer a query within a session. Concurrent calls run one at a time.
   *
   * @throws QueryError when the model or a tool fails
   */
  run(query: string, sessionId: string): Promise<QueryOutcome> {
    return this.queue(() => this.process(query, sessionId));
  }

  private async process(query: string, sessionId: string): Promise<QueryOutcome> {
    const states: OrchestratorState[] = [];
    let final: TerminalStep;

    try {
      final = await this.walk(query, sessionId, states);
    } catch (error) {
      this.tools.resetSources();
      if (error instanceof QueryError) {
        throw error;
      }
      const cause = error instanceof Error ? error : undefined;
      throw new QueryError(`Query failed: ${cause?.message ?? String(error)}`, cause);
    }

    // Citations are read once, then cleared for the next query
    const sources = final.state === 'done' ? this.tools.getLastSources() : [];
    this.tools.resetSources();

    if (final.state === 'done') {
      this.conversations.addExchange(sessionId, query, final.answer);
    }

    return { answer: final.answer, sources, status: final.state, states };
  }

  private async walk(query: string, sessionId: string, states: OrchestratorState[]): Promise<TerminalStep> {
    let step: Step = { state: 'init' };
    while (!isTerminal(step)) {
      states.push(step.state);
      this.log.debug?.(`${sessionId}: ${step.state}`);
      step = await this.advance(step, query, sessionId);
    }
    states.push(step.state);
    this.log.debug?.(`${sessionId}: ${step.state}`);
    return step;
  }

  private async advance(step: Exclude<Step, TerminalStep>, query: string, sessionId: string): Promise<Step> {
    switch (step.state) {
      case 'init':
        return { state: 'decide', system: buildSystemPrompt(this.conversations.formatHistory(sessionId)) };

      case 'decide': {
        const reply = await this.complete({
          system: step.system,
          messages: [{ role: 'user', content: query }],
          tools: this.tools.getDefinitions(),
          toolChoice: 'auto',
        });
        return reply.kind === 'tool_use' && reply.invocations.length > 0
          ? { state: 'execute', system: step.system, reply }
          : { state: 'done', answer: reply.text };
      }

      case 'execute': {
        const [first, ...ignored] = step.reply.invocations;
        if (!first) {
          return { state: 'done', answer: step.reply.text };
        }

        let content: string;
        try {
          content = await this.tools.execute(first.name, first.input);
        } catch (error) {
          if (error instanceof UnknownToolError) {
            this.log.warn(`${error.message} (${error.hint ?? 'no tools registered'})`);
            return { state: 'failed', answer: GENERIC_FAILURE_ANSWER };
          }
          throw error;
        }

        const results: ToolResult[] = [
          { toolUseId: first.id, content },
          ...ignored.map((invocation) => this.skip(invocation)),
        ];
        return { state: 'finalize', system: step.system, reply: step.reply, results };
      }

      case 'finalize': {
        const reply = await this.complete({
          system: step.system,
          messages: [
            { role: 'user', content: query },
            { role: 'assistant', text: step.reply.text, invocations: step.reply.invocations },
            { role: 'tool_results', results: step.results },
          ],
        });
        return { state: 'done', answer: reply.text };
      }
    }
  }

  private skip(invocation: ToolInvocation): ToolResult {
    this.log.warn(`Ignoring tool call '${invocation.name}' (${invocation.id}): only one tool call is executed per query`);
    return { toolUseId: invocation.id, content: SKIPPED_TOOL_CALL, isError: true };
  }

  private complete(
    request: Omit<CompletionRequest, 'temperature' | 'maxTokens'>
  ): Promise<ModelReply> {
    return this.model.complete({
      ...request,
      temperature: this.temperature,
      maxTokens: this.maxTokens,
    });
  }
}
