/**
 * Embedding Providers
 *
 * HTTP clients for the two supported embedding services:
 * - Ollama (local server, POST /api/embed)
 * - OpenAI-compatible APIs (POST /embeddings)
 *
 * Responses are validated with Zod; failures surface as EmbeddingError.
 */

import { z } from 'zod';
import { SETUP_INSTRUCTIONS } from '../../config/index.js';
import type { Config, EnvVars } from '../../config/index.js';
import { APIKeyError, EmbeddingError } from '../../errors/index.js';
import { BatchingEmbeddingProvider } from './embedder.js';
import type { EmbeddingProvider, OllamaProviderOptions, OpenAIProviderOptions } from './types.js';

const OllamaEmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

const OllamaTagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

const OpenAIEmbedResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().int() })),
});

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * POST a JSON body and validate the JSON reply.
 */
async function postJson<S extends z.ZodTypeAny>(
  label: string,
  url: string,
  body: unknown,
  schema: S,
  init: { headers?: Record<string, string>; signal?: AbortSignal } = {}
): Promise<z.output<S>> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...init.headers },
      body: JSON.stringify(body),
      signal: init.signal,
    });
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    if (cause?.name === 'TimeoutError' || cause?.name === 'AbortError') {
      throw new EmbeddingError(`${label} embedding request was aborted: ${cause.message}`, cause);
    }
    throw new EmbeddingError(`Cannot reach ${label} at ${url}: ${cause?.message ?? String(error)}`, cause);
  }

  if (!response.ok) {
    const detail = (await response.text()).slice(0, 200);
    throw new EmbeddingError(
      `${label} embedding request failed: HTTP ${response.status}${detail ? ` ${detail}` : ''}`
    );
  }

  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new EmbeddingError(`${label} returned an unexpected embedding payload`, parsed.error);
  }
  return parsed.data;
}

function expectCount(label: string, vectors: number[][], expected: number): Float32Array[] {
  if (vectors.length !== expected) {
    throw new EmbeddingError(
      `${label} returned ${vectors.length} embeddings for ${expected} inputs`
    );
  }
  return vectors.map((vector) => new Float32Array(vector));
}

// ============================================================================
// Ollama
// ============================================================================

/**
 * Embeddings from a local Ollama server.
 *
 * Requires `ollama serve` and the model pulled (`ollama pull nomic-embed-text`).
 */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  readonly model: string;
  private readonly host: string;

  constructor(options: OllamaProviderOptions) {
    this.model = options.model;
    this.host = trimSlash(options.host ?? 'http://localhost:11434');
  }

  async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text], signal);
    if (!embedding) {
      throw new EmbeddingError('Ollama returned no embedding');
    }
    return embedding;
  }

  async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    const result = await postJson(
      'Ollama',
      `${this.host}/api/embed`,
      { model: this.model, input: texts },
      OllamaEmbedResponseSchema,
      { signal }
    );
    return expectCount('Ollama', result.embeddings, texts.length);
  }

  /**
   * True when the server answers and lists the model ("name" or "name:tag").
   */
  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.host}/api/tags`);
      if (!response.ok) return false;
      const tags = OllamaTagsResponseSchema.safeParse(await response.json());
      return (
        tags.success &&
        tags.data.models.some(
          (entry) => entry.name === this.model || entry.name.startsWith(`${this.model}:`)
        )
      );
    } catch {
      // Unreachable server
      return false;
    }
  }
}

// ============================================================================
// OpenAI-compatible
// ============================================================================

/**
 * Embeddings from an OpenAI-compatible `/embeddings` endpoint.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: OpenAIProviderOptions) {
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.baseUrl = trimSlash(options.baseUrl ?? 'https://api.openai.com/v1');
  }

  async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text], signal);
    if (!embedding) {
      throw new EmbeddingError('OpenAI returned no embedding');
    }
    return embedding;
  }

  async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    const result = await postJson(
      'OpenAI',
      `${this.baseUrl}/embeddings`,
      { model: this.model, input: texts },
      OpenAIEmbedResponseSchema,
      { headers: { Authorization: `Bearer ${this.apiKey}` }, signal }
    );
    const ordered = [...result.data].sort((a, b) => a.index - b.index);
    return expectCount(
      'OpenAI',
      ordered.map((item) => item.embedding),
      texts.length
    );
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/models`, {
        headers: { Authorization: `Bearer ${this.apiKey}` },
      });
      return response.ok;
    } catch {
      // Unreachable server
      return false;
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create the configured embedding provider, wrapped for batching and timeouts.
 *
 * @example
 * ```typescript
 * const provider = createEmbeddingProvider(loadConfig().embedding, loadEnv());
 * const vectors = await provider.embedBatch(['hello', 'world']);
 * ```
 *
 * @throws APIKeyError when the OpenAI provider is selected without a key
 */
export function createEmbeddingProvider(
  config: Config['embedding'],
  env: Pick<EnvVars, 'OLLAMA_HOST' | 'OPENAI_API_KEY' | 'OPENAI_BASE_URL'>
): EmbeddingProvider {
  let provider: EmbeddingProvider;

  switch (config.provider) {
    case 'ollama':
      provider = new OllamaEmbeddingProvider({ model: config.model, host: env.OLLAMA_HOST });
      break;
    case 'openai': {
      const apiKey = env.OPENAI_API_KEY?.trim();
      if (!apiKey) {
        throw new APIKeyError('OpenAI', 'OPENAI_API_KEY', { hint: SETUP_INSTRUCTIONS.openai });
      }
      provider = new OpenAIEmbeddingProvider({
        model: config.model,
        apiKey,
        baseUrl: env.OPENAI_BASE_URL,
      });
      break;
    }
  }

  return new BatchingEmbeddingProvider(provider, {
    batchSize: config.batch_size,
    timeoutMs: config.timeout_ms,
  });
}
