/**
 * Language Model Types
 *
 * Provider-neutral request/response shapes for a tool-calling chat model.
 * The orchestrator only speaks these; adapters translate to a vendor API.
 */

/**
 * JSON Schema for a tool's arguments (always an object).
 */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
}

/**
 * A tool offered to the model.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

/**
 * A tool call requested by the model. `input` is untrusted JSON.
 */
export interface ToolInvocation {
  id: string;
  name: string;
  input: unknown;
}

/**
 * Output of one tool call, sent back to the model.
 */
export interface ToolResult {
  toolUseId: string;
  content: string;
  isError?: boolean;
}

export type ConversationMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; text: string; invocations: ToolInvocation[] }
  | { role: 'tool_results'; results: ToolResult[] };

export interface CompletionRequest {
  system: string;
  messages: ConversationMessage[];
  /** Omitted or empty: the model cannot call tools */
  tools?: ToolDefinition[];
  toolChoice?: 'auto';
  temperature: number;
  maxTokens: number;
}

/**
 * The model either answered or asked for tools.
 * `text` on a tool_use reply is whatever the model said alongside the calls.
 */
export type ModelReply =
  | { kind: 'text'; text: string }
  | { kind: 'tool_use'; text: string; invocations: ToolInvocation[] };

export interface LanguageModel {
  readonly name: string;
  readonly model: string;
  complete(request: CompletionRequest): Promise<ModelReply>;
}
