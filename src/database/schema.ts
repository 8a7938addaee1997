/**
 * Database Schema Types
 *
 * TypeScript shapes of the `vectors` table plus BLOB helpers.
 */

// ============================================================================
// Vectors Table
// ============================================================================

/**
 * One embedded document in a named collection.
 */
export interface VectorRecordRow {
  /** Collection name, part of the primary key */
  collection: string;
  /** Caller-chosen id, unique per collection */
  id: string;
  /** The text that was embedded */
  document: string;
  /** Binary Float32Array embedding (BLOB) */
  embedding: Buffer;
  /** JSON object of scalar metadata */
  metadata: string;
  /** Insertion order within the collection */
  seq: number;
  created_at: string;
}

/**
 * Scalar metadata values; filters compare with equality.
 */
export type MetadataValue = string | number | boolean;

export type Metadata = Record<string, MetadataValue>;

/**
 * Input for inserting or replacing a vector row.
 */
export interface VectorRecordInput {
  collection: string;
  id: string;
  document: string;
  embedding: Float32Array;
  metadata: Metadata;
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Convert Float32Array to Buffer for BLOB storage.
 */
export function embeddingToBlob(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

/**
 * Convert Buffer from BLOB back to Float32Array.
 *
 * Copies the bytes, since SQLite buffers are not guaranteed to be 4-byte aligned.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return new Float32Array(copy.buffer, 0, Math.floor(blob.byteLength / 4));
}
