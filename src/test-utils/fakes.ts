/**
 * In-process stand-ins for the embedding service and the language model.
 */

import type { EmbeddingProvider } from '../indexer/embedder/index.js';
import type { CompletionRequest, LanguageModel, ModelReply } from '../providers/index.js';

/**
 * Deterministic bag-of-words embeddings: each lowercase word is hashed
 * (FNV-1a) into one of `dimensions` buckets, then the vector is normalized.
 * Texts sharing words are close; texts sharing none have distance 1.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hashing';
  readonly model = 'hashing-test';

  /** Every text passed to embed/embedBatch, in call order */
  readonly embedded: string[] = [];

  constructor(private readonly dimensions = 64) {}

  async embed(text: string): Promise<Float32Array> {
    this.embedded.push(text);
    return this.vectorize(text);
  }

  async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    this.embedded.push(...texts);
    return texts.map((text) => this.vectorize(text));
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  private vectorize(text: string): Float32Array {
    const vector = new Float32Array(this.dimensions);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      const bucket = fnv1a(word) % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }

    let norm = 0;
    for (const value of vector) norm += value * value;
    if (norm > 0) {
      const length = Math.sqrt(norm);
      for (let i = 0; i < vector.length; i++) {
        vector[i] = (vector[i] ?? 0) / length;
      }
    }
    return vector;
  }
}

function fnv1a(word: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < word.length; i++) {
    hash ^= word.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Language model that plays back queued replies and records every request.
 * A queued Error is thrown instead of returned.
 */
export class ScriptedLanguageModel implements LanguageModel {
  readonly name = 'scripted';
  readonly model = 'scripted-test';
  readonly requests: CompletionRequest[] = [];
  private readonly replies: Array<ModelReply | Error>;

  constructor(replies: Array<ModelReply | Error> = []) {
    this.replies = [...replies];
  }

  enqueue(...replies: Array<ModelReply | Error>): this {
    this.replies.push(...replies);
    return this;
  }

  async complete(request: CompletionRequest): Promise<ModelReply> {
    this.requests.push(structuredClone(request));
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('ScriptedLanguageModel has no reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}
