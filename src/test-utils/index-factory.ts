/**
 * Course index on a throwaway in-memory database.
 */

import type Database from 'better-sqlite3';
import { openDatabase } from '../database/index.js';
import { CourseVectorIndex, SqliteVectorStore, type CourseIndexOptions } from '../search/index.js';
import { silentLogger } from '../utils/index.js';
import { HashingEmbeddingProvider } from './fakes.js';

export interface TestIndex {
  db: Database.Database;
  embedder: HashingEmbeddingProvider;
  store: SqliteVectorStore;
  index: CourseVectorIndex;
}

/**
 * Call `db.close()` in afterEach.
 */
export function createTestIndex(options: CourseIndexOptions = {}): TestIndex {
  const db = openDatabase(':memory:');
  const embedder = new HashingEmbeddingProvider();
  const store = new SqliteVectorStore(embedder, db, silentLogger);
  const index = new CourseVectorIndex(store, options, silentLogger);
  return { db, embedder, store, index };
}
