/**
 * Search Module
 *
 * Cosine-ranked retrieval over the SQLite vector table, and the course
 * index built on it.
 *
 * @example
 * ```typescript
 * import { CourseVectorIndex, SqliteVectorStore } from './search/index.js';
 *
 * const index = new CourseVectorIndex(new SqliteVectorStore(embedder), { maxResults: 5 });
 * const { hits } = await index.search({ query: 'What is retrieval?' });
 * ```
 *
 * @packageDocumentation
 */

export { SqliteVectorStore, cosineDistance } from './store.js';
export { CourseVectorIndex, CATALOG_COLLECTION, CONTENT_COLLECTION } from './vector-index.js';

export type {
  CourseIndexOptions,
  CourseSearchRequest,
  SearchHit,
  SearchResults,
  VectorMatch,
  VectorQueryOptions,
  VectorStore,
  VectorStoreRecord,
} from './types.js';
