/**
 * Anthropic Language Model
 *
 * Adapts the Anthropic Messages API to the LanguageModel interface.
 *
 * SECURITY: The API key is only handed to the SDK client.
 * Never logs or exposes the key in error messages.
 */

import Anthropic, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  AuthenticationError,
  RateLimitError,
} from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { Config, EnvVars } from '../config/index.js';
import { APIKeyError, QueryError } from '../errors/index.js';
import { validateAnthropicKey } from './validation.js';
import type {
  CompletionRequest,
  ConversationMessage,
  LanguageModel,
  ModelReply,
  ToolInvocation,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

type MessageParam = Anthropic.Messages.MessageParam;
type MessageCreateParams = Anthropic.Messages.MessageCreateParamsNonStreaming;

/**
 * The slice of the SDK client this adapter calls. Tests pass a stub.
 */
export interface MessagesClient {
  messages: {
    create(params: MessageCreateParams): Promise<unknown>;
  };
}

export interface AnthropicModelOptions {
  /** @default 'claude-sonnet-4-20250514' */
  model?: string;
  apiKey?: string;
  /** Pre-built client; takes precedence over apiKey */
  client?: MessagesClient;
}

/** Default model - Claude Sonnet 4 */
export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';

// ============================================================================
// RESPONSE VALIDATION
// ============================================================================

const TextBlockSchema = z.object({ type: z.literal('text'), text: z.string() });

const ToolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string(),
  name: z.string(),
  input: z.unknown(),
});

const MessageResponseSchema = z.object({
  content: z.array(z.object({ type: z.string() }).passthrough()),
  stop_reason: z.string().nullable(),
});

// ============================================================================
// ADAPTER
// ============================================================================

function toMessageParam(message: ConversationMessage): MessageParam {
  switch (message.role) {
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return {
        role: 'assistant',
        content: [
          ...(message.text ? [{ type: 'text' as const, text: message.text }] : []),
          ...message.invocations.map((invocation) => ({
            type: 'tool_use' as const,
            id: invocation.id,
            name: invocation.name,
            input: invocation.input,
          })),
        ],
      };
    case 'tool_results':
      return {
        role: 'user',
        content: message.results.map((result) => ({
          type: 'tool_result' as const,
          tool_use_id: result.toolUseId,
          content: result.content,
          ...(result.isError ? { is_error: true } : {}),
        })),
      };
  }
}

/**
 * Build the Messages API request. The `tools` key is left out entirely
 * when no tools are offered.
 */
export function buildMessageParams(model: string, request: CompletionRequest): MessageCreateParams {
  const params: MessageCreateParams = {
    model,
    max_tokens: request.maxTokens,
    temperature: request.temperature,
    system: request.system,
    messages: request.messages.map(toMessageParam),
  };

  if (request.tools && request.tools.length > 0) {
    params.tools = request.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: {
        type: 'object',
        properties: tool.inputSchema.properties,
        required: tool.inputSchema.required,
      },
    }));
    if (request.toolChoice === 'auto') {
      params.tool_choice = { type: 'auto' };
    }
  }

  return params;
}

/**
 * Turn a raw Messages API response into a ModelReply.
 * Text blocks are concatenated; unknown block types are ignored.
 */
export function parseMessageResponse(response: unknown): ModelReply {
  const parsed = MessageResponseSchema.safeParse(response);
  if (!parsed.success) {
    throw new QueryError('Anthropic returned an unexpected response', parsed.error);
  }

  const texts: string[] = [];
  const invocations: ToolInvocation[] = [];

  for (const block of parsed.data.content) {
    const text = TextBlockSchema.safeParse(block);
    if (text.success) {
      texts.push(text.data.text);
      continue;
    }
    const toolUse = ToolUseBlockSchema.safeParse(block);
    if (toolUse.success) {
      invocations.push({ id: toolUse.data.id, name: toolUse.data.name, input: toolUse.data.input });
    }
  }

  const text = texts.join('');
  return invocations.length > 0 ? { kind: 'tool_use', text, invocations } : { kind: 'text', text };
}

/**
 * Map SDK errors to QueryError with a readable message.
 * Timeout must be checked before connection errors (it extends them).
 */
function toQueryError(error: unknown): QueryError {
  if (error instanceof QueryError) {
    return error;
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new QueryError('Request to Anthropic API timed out. Please try again.', error);
  }
  if (error instanceof APIConnectionError) {
    return new QueryError('Failed to connect to Anthropic API. Check your network connection.', error);
  }
  if (error instanceof AuthenticationError) {
    return new QueryError('Anthropic rejected the API key (check ANTHROPIC_API_KEY)', error);
  }
  if (error instanceof RateLimitError) {
    return new QueryError('Anthropic rate limit reached. Wait a moment and try again.', error);
  }
  if (error instanceof APIError) {
    return new QueryError(`Anthropic API error: ${error.message}`, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new QueryError(`Language model request failed: ${message}`, error instanceof Error ? error : undefined);
}

/**
 * Claude via the Anthropic Messages API.
 *
 * @example
 * ```typescript
 * const model = new AnthropicLanguageModel({ apiKey: process.env.ANTHROPIC_API_KEY });
 * const reply = await model.complete({ system: '', messages: [{ role: 'user', content: 'Hi' }], temperature: 0, maxTokens: 800 });
 * ```
 */
export class AnthropicLanguageModel implements LanguageModel {
  readonly name = 'anthropic';
  readonly model: string;
  private readonly client: MessagesClient;

  constructor(options: AnthropicModelOptions = {}) {
    this.model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey });
  }

  async complete(request: CompletionRequest): Promise<ModelReply> {
    let response: unknown;
    try {
      response = await this.client.messages.create(buildMessageParams(this.model, request));
    } catch (error) {
      throw toQueryError(error);
    }
    return parseMessageResponse(response);
  }
}

/**
 * Create the configured language model.
 *
 * @throws APIKeyError when ANTHROPIC_API_KEY is missing or malformed
 */
export function createLanguageModel(
  config: Config['llm'],
  env: Pick<EnvVars, 'ANTHROPIC_API_KEY'>
): LanguageModel {
  const validation = validateAnthropicKey(env.ANTHROPIC_API_KEY);
  if (!validation.valid) {
    throw new APIKeyError('Anthropic', 'ANTHROPIC_API_KEY', {
      message: validation.error,
      hint: validation.setupInstructions,
    });
  }
  return new AnthropicLanguageModel({ model: config.model, apiKey: env.ANTHROPIC_API_KEY?.trim() });
}
