/**
 * LLM Providers Module
 *
 * @example
 * ```typescript
 * import { createLanguageModel } from './providers/index.js';
 *
 * const model = createLanguageModel(config.llm, loadEnv());
 * ```
 */

export {
  AnthropicLanguageModel,
  createLanguageModel,
  buildMessageParams,
  parseMessageResponse,
  DEFAULT_ANTHROPIC_MODEL,
} from './anthropic.js';
export type { AnthropicModelOptions, MessagesClient } from './anthropic.js';

export { validateAnthropicKey, AnthropicKeySchema } from './validation.js';
export type { ValidationResult } from './validation.js';

export type {
  CompletionRequest,
  ConversationMessage,
  LanguageModel,
  ModelReply,
  ToolDefinition,
  ToolInputSchema,
  ToolInvocation,
  ToolResult,
} from './types.js';
