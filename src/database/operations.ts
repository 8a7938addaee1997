/**
 * Vector Table Operations
 *
 * CRUD on the `vectors` table. Similarity scoring happens in
 * search/store.ts; this layer only moves rows in and out of SQLite.
 */

import type Database from 'better-sqlite3';
import { getDb } from './connection.js';
import {
  embeddingToBlob,
  type Metadata,
  type MetadataValue,
  type VectorRecordInput,
  type VectorRecordRow,
} from './schema.js';
import { CountRowSchema, VectorRowSchema, validateRow, validateRows } from './validation.js';
import { DatabaseError, ValidationError } from '../errors/index.js';

const METADATA_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Build `AND json_extract(...) = ?` clauses for an equality filter.
 * Keys are interpolated into the JSON path, so only identifiers are allowed.
 */
function buildWhere(where: Metadata | undefined): { sql: string; params: Array<string | number> } {
  if (!where) {
    return { sql: '', params: [] };
  }

  const clauses: string[] = [];
  const params: Array<string | number> = [];
  for (const [key, value] of Object.entries(where)) {
    if (!METADATA_KEY.test(key)) {
      throw new ValidationError(`Invalid metadata filter key: '${key}'`);
    }
    clauses.push(`json_extract(metadata, '$.${key}') = ?`);
    params.push(toSqlValue(value));
  }

  return { sql: clauses.map((clause) => ` AND ${clause}`).join(''), params };
}

// SQLite has no boolean type; JSON true/false extract as 1/0
function toSqlValue(value: MetadataValue): string | number {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return value;
}

function wrap<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof ValidationError || !(error instanceof Error)) {
      throw error;
    }
    if (error.name === 'SqliteError') {
      throw new DatabaseError(`Failed to ${action}: ${error.message}`, error);
    }
    throw error;
  }
}

/**
 * Row-level access to named vector collections.
 *
 * @example
 * ```ts
 * const ops = new VectorOperations(db);
 * ops.upsert([{ collection: 'notes', id: 'a', document: 'hi', embedding, metadata: {} }]);
 * ```
 */
export class VectorOperations {
  private readonly db: Database.Database;

  constructor(db?: Database.Database) {
    this.db = db ?? getDb();
  }

  /**
   * Insert or replace records. A replaced record keeps its insertion order.
   * All records are written in one transaction.
   */
  upsert(records: VectorRecordInput[]): void {
    const stmt = this.db.prepare(`
      INSERT INTO vectors (collection, id, document, embedding, metadata, seq)
      VALUES (
        @collection, @id, @document, @embedding, @metadata,
        (SELECT COALESCE(MAX(seq), -1) + 1 FROM vectors WHERE collection = @collection)
      )
      ON CONFLICT (collection, id) DO UPDATE SET
        document = excluded.document,
        embedding = excluded.embedding,
        metadata = excluded.metadata
    `);

    const insertAll = this.db.transaction((items: VectorRecordInput[]) => {
      for (const item of items) {
        stmt.run({
          collection: item.collection,
          id: item.id,
          document: item.document,
          embedding: embeddingToBlob(item.embedding),
          metadata: JSON.stringify(item.metadata),
        });
      }
    });

    wrap('write vectors', () => insertAll(records));
  }

  /**
   * Rows of a collection in insertion order, optionally filtered by
   * metadata equality.
   */
  select(collection: string, where?: Metadata): VectorRecordRow[] {
    const filter = buildWhere(where);
    return wrap('read vectors', () => {
      const rows = this.db
        .prepare(`SELECT * FROM vectors WHERE collection = ?${filter.sql} ORDER BY seq`)
        .all(collection, ...filter.params);
      return validateRows(VectorRowSchema, rows, `vectors.collection=${collection}`);
    });
  }

  get(collection: string, id: string): VectorRecordRow | undefined {
    return wrap('read vector', () => {
      const row = this.db
        .prepare('SELECT * FROM vectors WHERE collection = ? AND id = ?')
        .get(collection, id);
      return row ? validateRow(VectorRowSchema, row, `vectors.id=${id}`) : undefined;
    });
  }

  count(collection: string, where?: Metadata): number {
    const filter = buildWhere(where);
    return wrap('count vectors', () => {
      const row = this.db
        .prepare(`SELECT COUNT(*) AS count FROM vectors WHERE collection = ?${filter.sql}`)
        .get(collection, ...filter.params);
      return validateRow(CountRowSchema, row, 'vectors.count').count;
    });
  }

  ids(collection: string): string[] {
    return this.select(collection).map((row) => row.id);
  }

  /**
   * Delete one collection, or every collection when none is named.
   *
   * @returns Number of rows deleted
   */
  clear(collection?: string): number {
    return wrap('clear vectors', () => {
      const result =
        collection === undefined
          ? this.db.prepare('DELETE FROM vectors').run()
          : this.db.prepare('DELETE FROM vectors WHERE collection = ?').run(collection);
      return result.changes;
    });
  }
}
