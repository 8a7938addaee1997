/**
 * SQLite Vector Store
 *
 * Named collections of embedded documents in the `vectors` table.
 * Queries embed the text, load the collection's rows (filtered in SQL)
 * and rank them by cosine distance in memory.
 */

import type Database from 'better-sqlite3';

import {
  blobToEmbedding,
  getDb,
  MetadataSchema,
  runMigrations,
  VectorOperations,
  type VectorRecordRow,
} from '../database/index.js';
import { DatabaseError, EmbeddingError } from '../errors/index.js';
import type { EmbeddingProvider } from '../indexer/embedder/index.js';
import { consoleLogger, parseJsonWithSchema, type Logger } from '../utils/index.js';
import type {
  VectorMatch,
  VectorQueryOptions,
  VectorStore,
  VectorStoreRecord,
} from './types.js';

/**
 * Cosine distance (1 - cosine similarity).
 * A zero vector has no direction; its distance to anything is 1.
 */
export function cosineDistance(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new EmbeddingError(
      `Embedding dimension mismatch: ${a.length} vs ${b.length}. ` +
        'The index may have been built with a different embedding model.'
    );
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 1;
  }
  return 1 - dot / Math.sqrt(normA * normB);
}

/**
 * VectorStore on better-sqlite3.
 *
 * @example
 * ```typescript
 * const store = new SqliteVectorStore(createEmbeddingProvider(config.embedding, env));
 * await store.upsert('notes', [{ id: 'a', document: 'hello', metadata: {} }]);
 * const matches = await store.query('notes', 'hi', { limit: 3 });
 * ```
 */
export class SqliteVectorStore implements VectorStore {
  private readonly ops: VectorOperations;

  constructor(
    private readonly embedder: EmbeddingProvider,
    db: Database.Database = getDb(),
    private readonly logger: Logger = consoleLogger
  ) {
    const [failure] = runMigrations(db).failed;
    if (failure) {
      throw new DatabaseError(`Migration ${failure.name} failed: ${failure.error}`);
    }
    this.ops = new VectorOperations(db);
  }

  async upsert(collection: string, records: VectorStoreRecord[]): Promise<void> {
    if (records.length === 0) return;

    const embeddings = await this.embedder.embedBatch(records.map((record) => record.document));
    this.ops.upsert(
      records.map((record, i) => {
        const embedding = embeddings[i];
        if (!embedding) {
          throw new EmbeddingError(`${this.embedder.name} returned no embedding for '${record.id}'`);
        }
        return { collection, ...record, embedding };
      })
    );
  }

  async query(collection: string, text: string, options: VectorQueryOptions): Promise<VectorMatch[]> {
    const rows = this.ops.select(collection, options.where);
    if (rows.length === 0 || options.limit <= 0) {
      return [];
    }

    const queryEmbedding = await this.embedder.embed(text);

    // Array.prototype.sort is stable, so equal distances keep seq order
    return rows
      .map((row) => ({
        ...this.toRecord(row),
        distance: cosineDistance(queryEmbedding, blobToEmbedding(row.embedding)),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, options.limit);
  }

  get(collection: string, id: string): VectorStoreRecord | undefined {
    const row = this.ops.get(collection, id);
    return row ? this.toRecord(row) : undefined;
  }

  count(collection: string): number {
    return this.ops.count(collection);
  }

  ids(collection: string): string[] {
    return this.ops.ids(collection);
  }

  clear(collection?: string): void {
    this.ops.clear(collection);
  }

  private toRecord(row: VectorRecordRow): VectorStoreRecord {
    return {
      id: row.id,
      document: row.document,
      metadata: parseJsonWithSchema(row.metadata, MetadataSchema, {}, (error) =>
        this.logger.warn(`Corrupted metadata for ${row.collection}/${row.id}: ${error.message}`)
      ),
    };
  }
}
