/**
 * Agent Module
 *
 * Tool-calling question answering over the course index.
 *
 * @example
 * ```typescript
 * import { createCourseAssistant } from './agent/index.js';
 *
 * const assistant = createCourseAssistant(loadConfig(), loadEnv());
 * const { answer, sources } = await assistant.ask({ query: 'What is MCP?' });
 * ```
 *
 * @packageDocumentation
 */

export {
  CourseAssistant,
  createCourseAssistant,
  createCourseIndex,
} from './assistant.js';
export type { AssistantRuntimeOptions, CourseAssistantOptions } from './assistant.js';

export {
  QueryOrchestrator,
  GENERIC_FAILURE_ANSWER,
  SKIPPED_TOOL_CALL,
} from './orchestrator.js';
export type { OrchestratorOptions } from './orchestrator.js';

export { ConversationStore, DEFAULT_MAX_HISTORY, DEFAULT_MAX_SESSIONS } from './conversation-store.js';
export { SYSTEM_PROMPT, buildSystemPrompt } from './prompts.js';

export * from './tools/index.js';

export type {
  CourseAnalytics,
  Exchange,
  OrchestratorState,
  QueryOutcome,
  QueryRequest,
  QueryResponse,
  SourceCitation,
} from './types.js';
