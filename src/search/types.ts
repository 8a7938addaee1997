/**
 * Search Module Types
 *
 * The similarity-search backend contract and the course-level search
 * shapes built on top of it.
 */

import type { Metadata } from '../database/index.js';

// ============================================================================
// Vector Store
// ============================================================================

/**
 * A document stored in a collection. The store embeds `document` itself.
 */
export interface VectorStoreRecord {
  id: string;
  document: string;
  metadata: Metadata;
}

export interface VectorQueryOptions {
  /** Equality filter on metadata fields (all must match) */
  where?: Metadata;
  limit: number;
}

/**
 * A stored record ranked against a query.
 */
export interface VectorMatch extends VectorStoreRecord {
  /** Cosine distance: 0 = same direction, 2 = opposite */
  distance: number;
}

/**
 * Embedding-capable similarity-search backend with named collections.
 */
export interface VectorStore {
  upsert(collection: string, records: VectorStoreRecord[]): Promise<void>;

  /** Matches by ascending distance; ties keep insertion order */
  query(collection: string, text: string, options: VectorQueryOptions): Promise<VectorMatch[]>;

  get(collection: string, id: string): VectorStoreRecord | undefined;
  count(collection: string): number;

  /** Ids in insertion order */
  ids(collection: string): string[];

  /** Clear one collection, or all of them */
  clear(collection?: string): void;
}

// ============================================================================
// Course Search
// ============================================================================

export interface CourseSearchRequest {
  query: string;
  /** Fuzzy course name, resolved against the catalog */
  courseName?: string;
  lessonNumber?: number;
  /** Overrides the index's default result count */
  limit?: number;
}

/**
 * One retrieved chunk.
 */
export interface SearchHit {
  content: string;
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex: number;
  distance: number;
}

/**
 * Hits, or an explanation of why there are none.
 */
export interface SearchResults {
  hits: SearchHit[];
  error?: string;
}

export interface CourseIndexOptions {
  /**
   * Results per search when the request sets no limit.
   * @default 5
   */
  maxResults?: number;
}
