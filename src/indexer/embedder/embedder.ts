/**
 * Batching Embedder
 *
 * Wraps a provider so callers can hand it any number of texts:
 * 1. Split into batches of `batchSize` (default: 32)
 * 2. Give every request its own timeout
 * 3. Report progress after each batch
 */

import { EmbeddingError } from '../../errors/index.js';
import type { BatchingOptions, EmbeddingProvider } from './types.js';

/** Default batch size - 32 is a good balance of speed vs memory */
const DEFAULT_BATCH_SIZE = 32;

const DEFAULT_TIMEOUT_MS = 120_000;

export class BatchingEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly onProgress: BatchingOptions['onProgress'];

  constructor(
    private readonly inner: EmbeddingProvider,
    options: BatchingOptions = {}
  ) {
    this.name = inner.name;
    this.model = inner.model;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.onProgress = options.onProgress;
  }

  async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text], signal);
    if (!embedding) {
      throw new EmbeddingError(`${this.name} returned no embedding`);
    }
    return embedding;
  }

  /**
   * Embed texts batch by batch. A caller-supplied signal stops the run
   * between batches; each request is also bounded by `timeoutMs`.
   */
  async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const embeddings: Float32Array[] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      signal?.throwIfAborted();

      const batch = texts.slice(i, i + this.batchSize);
      const vectors = await this.inner.embedBatch(batch, AbortSignal.timeout(this.timeoutMs));

      for (const vector of vectors) {
        if (vector.length === 0) {
          throw new EmbeddingError(`${this.name} returned an empty embedding`);
        }
        embeddings.push(vector);
      }
      this.onProgress?.(embeddings.length, texts.length);
    }

    return embeddings;
  }

  isAvailable(): Promise<boolean> {
    return this.inner.isAvailable();
  }
}
