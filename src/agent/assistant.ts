/**
 * Course Assistant
 *
 * The query surface: wires the course index, the tools, the conversation
 * store and the orchestrator together.
 *
 * @example
 * ```typescript
 * const assistant = createCourseAssistant(loadConfig(), loadEnv());
 * const first = await assistant.ask({ query: 'What does lesson 2 of the MCP course cover?' });
 * const followUp = await assistant.ask({ query: 'And lesson 3?', sessionId: first.sessionId });
 * ```
 */

import type Database from 'better-sqlite3';

import type { Config, EnvVars } from '../config/index.js';
import { getDb } from '../database/index.js';
import { ValidationError } from '../errors/index.js';
import {
  createEmbeddingProvider,
  ingestCourseFolder,
  type EmbeddingProvider,
  type IngestOptions,
  type IngestionReport,
} from '../indexer/index.js';
import { createLanguageModel, type LanguageModel } from '../providers/index.js';
import { CourseVectorIndex, SqliteVectorStore } from '../search/index.js';
import { consoleLogger, type Logger } from '../utils/index.js';
import { ConversationStore } from './conversation-store.js';
import { QueryOrchestrator } from './orchestrator.js';
import { createToolRegistry, type ToolRegistry } from './tools/index.js';
import type { CourseAnalytics, QueryRequest, QueryResponse } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface CourseAssistantOptions {
  index: CourseVectorIndex;
  model: LanguageModel;
  /** Exchanges kept per session (default 2) */
  maxHistory?: number;
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

/**
 * Overrides for createCourseIndex / createCourseAssistant.
 */
export interface AssistantRuntimeOptions {
  db?: Database.Database;
  embedder?: EmbeddingProvider;
  model?: LanguageModel;
  logger?: Logger;
}

// ============================================================================
// Assistant
// ============================================================================

export class CourseAssistant {
  readonly index: CourseVectorIndex;
  readonly conversations: ConversationStore;
  readonly tools: ToolRegistry;
  private readonly orchestrator: QueryOrchestrator;
  private readonly logger: Logger;

  constructor(options: CourseAssistantOptions) {
    this.index = options.index;
    this.logger = options.logger ?? consoleLogger;
    this.conversations = new ConversationStore(options.maxHistory);
    this.tools = createToolRegistry(options.index);
    this.orchestrator = new QueryOrchestrator({
      model: options.model,
      tools: this.tools,
      conversations: this.conversations,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      logger: this.logger,
    });
  }

  /**
   * Answer a question, continuing the session when an id is given.
   *
   * @throws ValidationError for an empty query
   * @throws QueryError when the language model or a tool fails
   */
  async ask(request: QueryRequest): Promise<QueryResponse> {
    const query = request.query.trim();
    if (query.length === 0) {
      throw new ValidationError('Query cannot be empty');
    }

    const sessionId = request.sessionId ?? this.conversations.createSession();
    const outcome = await this.orchestrator.run(query, sessionId);
    return { answer: outcome.answer, sources: outcome.sources, sessionId };
  }

  getCourseAnalytics(): CourseAnalytics {
    return {
      totalCourses: this.index.getCourseCount(),
      courseTitles: this.index.getCourseTitles(),
    };
  }

  ingest(folder: string, options: IngestOptions = {}): Promise<IngestionReport> {
    return ingestCourseFolder(folder, this.index, { logger: this.logger, ...options });
  }
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Course index on the configured embedding service and the on-disk database.
 *
 * @throws APIKeyError when the OpenAI embedding provider lacks a key
 */
export function createCourseIndex(
  config: Config,
  env: EnvVars,
  options: AssistantRuntimeOptions = {}
): CourseVectorIndex {
  const logger = options.logger ?? consoleLogger;
  const embedder = options.embedder ?? createEmbeddingProvider(config.embedding, env);
  const store = new SqliteVectorStore(embedder, options.db ?? getDb(), logger);
  return new CourseVectorIndex(store, { maxResults: config.search.max_results }, logger);
}

/**
 * Assistant configured from config.toml and the environment.
 *
 * @throws APIKeyError when ANTHROPIC_API_KEY is missing
 */
export function createCourseAssistant(
  config: Config,
  env: EnvVars,
  options: AssistantRuntimeOptions = {}
): CourseAssistant {
  return new CourseAssistant({
    index: createCourseIndex(config, env, options),
    model: options.model ?? createLanguageModel(config.llm, env),
    maxHistory: config.session.max_history,
    temperature: config.llm.temperature,
    maxTokens: config.llm.max_tokens,
    logger: options.logger,
  });
}
