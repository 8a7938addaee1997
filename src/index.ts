/**
 * course-rag - Library Entry Point
 *
 * Question answering over course materials for programs that embed it.
 * The CLI (`course-rag`) covers ingestion and interactive use.
 *
 * @example Query surface
 * ```typescript
 * import { ask, getCourseAnalytics } from 'course-rag';
 *
 * const { answer, sources, sessionId } = await ask({ query: 'What is MCP?' });
 * const followUp = await ask({ query: 'Which lesson covers tools?', sessionId });
 * const { totalCourses, courseTitles } = getCourseAnalytics();
 * ```
 *
 * @example Custom wiring
 * ```typescript
 * import { createCourseAssistant, loadConfig, loadEnv, useAssistant } from 'course-rag';
 *
 * useAssistant(createCourseAssistant(loadConfig(), loadEnv(), { logger: myLogger }));
 * ```
 *
 * @packageDocumentation
 */

import { createCourseAssistant, type CourseAssistant } from './agent/index.js';
import type { CourseAnalytics, QueryRequest, QueryResponse } from './agent/index.js';
import { loadConfig, loadEnv } from './config/index.js';

// ============================================================================
// Query surface
// ============================================================================

let current: CourseAssistant | undefined;

/**
 * The assistant behind `ask` and `getCourseAnalytics`, created from
 * config.toml and the environment on first use.
 *
 * @throws APIKeyError when ANTHROPIC_API_KEY is missing
 */
export function getAssistant(): CourseAssistant {
  if (current === undefined) {
    current = createCourseAssistant(loadConfig(), loadEnv());
  }
  return current;
}

/**
 * Replace the assistant behind `ask` and `getCourseAnalytics`.
 * Pass undefined to go back to the configured one.
 */
export function useAssistant(assistant: CourseAssistant | undefined): void {
  current = assistant;
}

/**
 * Answer a question; pass the returned sessionId to continue the conversation.
 */
export function ask(request: QueryRequest): Promise<QueryResponse> {
  return getAssistant().ask(request);
}

export function getCourseAnalytics(): CourseAnalytics {
  return getAssistant().getCourseAnalytics();
}

// ============================================================================
// Building blocks
// ============================================================================

export {
  CourseAssistant,
  createCourseAssistant,
  createCourseIndex,
  ConversationStore,
  QueryOrchestrator,
  GENERIC_FAILURE_ANSWER,
} from './agent/index.js';
export type {
  AssistantRuntimeOptions,
  CourseAnalytics,
  QueryRequest,
  QueryResponse,
  SourceCitation,
} from './agent/index.js';

export { loadConfig, loadEnv, DEFAULT_CONFIG } from './config/index.js';
export type { Config, EnvVars } from './config/index.js';

export { ingestCourseFolder, chunkCourseDocument, createEmbeddingProvider } from './indexer/index.js';
export type {
  Course,
  CourseChunk,
  EmbeddingProvider,
  IngestOptions,
  IngestionReport,
  Lesson,
} from './indexer/index.js';

export { CourseVectorIndex, SqliteVectorStore } from './search/index.js';
export type { VectorStore, SearchHit, SearchResults } from './search/index.js';

export { AnthropicLanguageModel, createLanguageModel } from './providers/index.js';
export type { LanguageModel, ModelReply } from './providers/index.js';

export { openDatabase, runMigrations } from './database/index.js';

export * from './errors/index.js';
export type { Logger } from './utils/index.js';
