/**
 * Embedder Module
 *
 * Text embeddings from an HTTP embedding service.
 *
 * Usage:
 * ```typescript
 * import { createEmbeddingProvider } from './embedder/index.js';
 *
 * const provider = createEmbeddingProvider(config.embedding, loadEnv());
 * const vectors = await provider.embedBatch(chunks.map((chunk) => chunk.content));
 * ```
 */

export {
  createEmbeddingProvider,
  OllamaEmbeddingProvider,
  OpenAIEmbeddingProvider,
} from './provider.js';

export { BatchingEmbeddingProvider } from './embedder.js';

export type {
  EmbeddingProvider,
  BatchingOptions,
  OllamaProviderOptions,
  OpenAIProviderOptions,
} from './types.js';
