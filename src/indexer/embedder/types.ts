/**
 * Embedder Types
 *
 * Embeddings are Float32Array throughout so they can be written to SQLite
 * BLOBs without conversion.
 */

/**
 * A text embedding service.
 */
export interface EmbeddingProvider {
  /** Provider name for messages (e.g. "ollama") */
  readonly name: string;

  /** Model the vectors come from */
  readonly model: string;

  embed(text: string, signal?: AbortSignal): Promise<Float32Array>;

  /** One vector per input, in input order */
  embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]>;

  /** Cheap probe: is the service reachable and the model present? */
  isAvailable(): Promise<boolean>;
}

/**
 * Options for the batching wrapper.
 */
export interface BatchingOptions {
  /**
   * Number of texts per request.
   * @default 32
   */
  batchSize?: number;

  /**
   * Timeout in milliseconds for one request.
   * @default 120000 (2 minutes)
   */
  timeoutMs?: number;

  /** Fired after each batch completes */
  onProgress?: (processed: number, total: number) => void;
}

/**
 * Connection settings for the HTTP providers.
 */
export interface OllamaProviderOptions {
  model: string;
  /** @default "http://localhost:11434" */
  host?: string;
}

export interface OpenAIProviderOptions {
  model: string;
  apiKey: string;
  /** @default "https://api.openai.com/v1" */
  baseUrl?: string;
}
