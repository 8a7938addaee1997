/**
 * Anthropic adapter tests
 *
 * The SDK client is replaced with a stub so no request leaves the process.
 */

import { describe, it, expect, vi } from 'vitest';
import type Anthropic from '@anthropic-ai/sdk';
import { APIConnectionError, APIConnectionTimeoutError } from '@anthropic-ai/sdk';
import {
  AnthropicLanguageModel,
  buildMessageParams,
  createLanguageModel,
  parseMessageResponse,
  type MessagesClient,
} from '../anthropic.js';
import { APIKeyError, QueryError } from '../../errors/index.js';
import type { CompletionRequest, ToolDefinition } from '../types.js';

type Params = Anthropic.Messages.MessageCreateParamsNonStreaming;

const SEARCH_TOOL: ToolDefinition = {
  name: 'search_course_content',
  description: 'Search course materials',
  inputSchema: {
    type: 'object',
    properties: { query: { type: 'string' } },
    required: ['query'],
  },
};

function request(overrides: Partial<CompletionRequest> = {}): CompletionRequest {
  return {
    system: 'You are helpful.',
    messages: [{ role: 'user', content: 'What is RAG?' }],
    temperature: 0,
    maxTokens: 800,
    ...overrides,
  };
}

function stubClient(response: unknown) {
  const create = vi.fn(async (_params: Params): Promise<unknown> => response);
  const client: MessagesClient = { messages: { create } };
  return { client, create };
}

describe('buildMessageParams', () => {
  it('omits tools and tool_choice when no tools are offered', () => {
    const params = buildMessageParams('claude-test', request());

    expect(params).toEqual({
      model: 'claude-test',
      max_tokens: 800,
      temperature: 0,
      system: 'You are helpful.',
      messages: [{ role: 'user', content: 'What is RAG?' }],
    });
    expect('tools' in params).toBe(false);
    expect('tool_choice' in params).toBe(false);
  });

  it('omits tools for an empty tool list', () => {
    const params = buildMessageParams('claude-test', request({ tools: [], toolChoice: 'auto' }));

    expect('tools' in params).toBe(false);
  });

  it('maps tools and sets tool_choice auto', () => {
    const params = buildMessageParams(
      'claude-test',
      request({ tools: [SEARCH_TOOL], toolChoice: 'auto' })
    );

    expect(params.tools).toEqual([
      {
        name: 'search_course_content',
        description: 'Search course materials',
        input_schema: {
          type: 'object',
          properties: { query: { type: 'string' } },
          required: ['query'],
        },
      },
    ]);
    expect(params.tool_choice).toEqual({ type: 'auto' });
  });

  it('maps assistant tool calls and tool results', () => {
    const params = buildMessageParams(
      'claude-test',
      request({
        messages: [
          { role: 'user', content: 'Find MCP' },
          {
            role: 'assistant',
            text: '',
            invocations: [{ id: 'tu_1', name: 'search_course_content', input: { query: 'MCP' } }],
          },
          {
            role: 'tool_results',
            results: [
              { toolUseId: 'tu_1', content: 'found it' },
              { toolUseId: 'tu_2', content: 'Skipped', isError: true },
            ],
          },
        ],
      })
    );

    expect(params.messages).toEqual([
      { role: 'user', content: 'Find MCP' },
      {
        role: 'assistant',
        content: [
          { type: 'tool_use', id: 'tu_1', name: 'search_course_content', input: { query: 'MCP' } },
        ],
      },
      {
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 'tu_1', content: 'found it' },
          { type: 'tool_result', tool_use_id: 'tu_2', content: 'Skipped', is_error: true },
        ],
      },
    ]);
  });

  it('keeps assistant text next to tool calls', () => {
    const params = buildMessageParams(
      'claude-test',
      request({
        messages: [
          { role: 'assistant', text: 'Let me look.', invocations: [{ id: 'a', name: 't', input: {} }] },
        ],
      })
    );

    expect(params.messages[0]).toEqual({
      role: 'assistant',
      content: [
        { type: 'text', text: 'Let me look.' },
        { type: 'tool_use', id: 'a', name: 't', input: {} },
      ],
    });
  });
});

describe('parseMessageResponse', () => {
  it('returns text replies', () => {
    expect(
      parseMessageResponse({
        content: [{ type: 'text', text: 'Hello ' }, { type: 'text', text: 'there' }],
        stop_reason: 'end_turn',
      })
    ).toEqual({ kind: 'text', text: 'Hello there' });
  });

  it('returns tool calls', () => {
    expect(
      parseMessageResponse({
        content: [
          { type: 'text', text: 'Searching.' },
          { type: 'tool_use', id: 'tu_9', name: 'search_course_content', input: { query: 'x' } },
        ],
        stop_reason: 'tool_use',
      })
    ).toEqual({
      kind: 'tool_use',
      text: 'Searching.',
      invocations: [{ id: 'tu_9', name: 'search_course_content', input: { query: 'x' } }],
    });
  });

  it('ignores unknown block types', () => {
    expect(
      parseMessageResponse({
        content: [{ type: 'thinking', thinking: '...' }, { type: 'text', text: 'ok' }],
        stop_reason: 'end_turn',
      })
    ).toEqual({ kind: 'text', text: 'ok' });
  });

  it('rejects a malformed response', () => {
    expect(() => parseMessageResponse({ nope: true })).toThrow(QueryError);
  });
});

describe('AnthropicLanguageModel', () => {
  it('sends the built request and parses the reply', async () => {
    const { client, create } = stubClient({
      content: [{ type: 'text', text: 'Answer' }],
      stop_reason: 'end_turn',
    });
    const model = new AnthropicLanguageModel({ model: 'claude-test', client });

    const reply = await model.complete(request());

    expect(reply).toEqual({ kind: 'text', text: 'Answer' });
    expect(create).toHaveBeenCalledTimes(1);
    expect(create.mock.calls[0]?.[0]).toEqual(buildMessageParams('claude-test', request()));
  });

  it('wraps connection failures in QueryError', async () => {
    const create = vi.fn(async (_params: Params): Promise<unknown> => {
      throw new APIConnectionError({ message: 'socket hang up' });
    });
    const model = new AnthropicLanguageModel({ client: { messages: { create } } });

    await expect(model.complete(request())).rejects.toThrow(
      'Failed to connect to Anthropic API. Check your network connection.'
    );
  });

  it('reports timeouts separately from connection errors', async () => {
    const create = vi.fn(async (_params: Params): Promise<unknown> => {
      throw new APIConnectionTimeoutError();
    });
    const model = new AnthropicLanguageModel({ client: { messages: { create } } });

    await expect(model.complete(request())).rejects.toThrow(
      'Request to Anthropic API timed out. Please try again.'
    );
  });

  it('wraps unexpected errors with their message', async () => {
    const create = vi.fn(async (_params: Params): Promise<unknown> => {
      throw new Error('boom');
    });
    const model = new AnthropicLanguageModel({ client: { messages: { create } } });

    const error = await model.complete(request()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QueryError);
    expect(error).toHaveProperty('message', 'Language model request failed: boom');
  });
});

describe('createLanguageModel', () => {
  const llm = { provider: 'anthropic' as const, model: 'claude-test', max_tokens: 800, temperature: 0 };

  it('throws APIKeyError without a key', () => {
    expect(() => createLanguageModel(llm, {})).toThrow(APIKeyError);
    expect(() => createLanguageModel(llm, { ANTHROPIC_API_KEY: '  ' })).toThrow(
      new APIKeyError('Anthropic', 'ANTHROPIC_API_KEY', {
        message: 'ANTHROPIC_API_KEY environment variable is not set',
      })
    );
  });

  it('rejects a malformed key with setup instructions in the hint', () => {
    let error: unknown;
    try {
      createLanguageModel(llm, { ANTHROPIC_API_KEY: 'test-secret' });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(APIKeyError);
    expect(error).toHaveProperty(
      'message',
      'Invalid Anthropic API key format (should start with "sk-ant-")'
    );
    expect(error).toHaveProperty('hint', expect.stringContaining('https://console.anthropic.com/'));
  });

  it('uses the configured model', () => {
    const model = createLanguageModel(llm, { ANTHROPIC_API_KEY: 'sk-ant-test-secret' });

    expect(model.name).toBe('anthropic');
    expect(model.model).toBe('claude-test');
  });
});
