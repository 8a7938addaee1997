/**
 * SqliteVectorStore Tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../database/index.js';
import { DatabaseError, EmbeddingError } from '../../errors/index.js';
import { HashingEmbeddingProvider } from '../../test-utils/index.js';
import { silentLogger } from '../../utils/index.js';
import { SqliteVectorStore, cosineDistance } from '../store.js';

let db: Database.Database;
let store: SqliteVectorStore;

beforeEach(() => {
  db = openDatabase(':memory:');
  store = new SqliteVectorStore(new HashingEmbeddingProvider(), db, silentLogger);
});

afterEach(() => {
  db.close();
});

describe('cosineDistance', () => {
  it('is 0 for the same direction, 1 for orthogonal and 2 for opposite vectors', () => {
    const x = new Float32Array([1, 0]);

    expect(cosineDistance(x, new Float32Array([3, 0]))).toBeCloseTo(0);
    expect(cosineDistance(x, new Float32Array([0, 2]))).toBeCloseTo(1);
    expect(cosineDistance(x, new Float32Array([-1, 0]))).toBeCloseTo(2);
  });

  it('treats a zero vector as unrelated', () => {
    expect(cosineDistance(new Float32Array(2), new Float32Array([1, 1]))).toBe(1);
  });

  it('rejects vectors of different dimensions', () => {
    expect(() => cosineDistance(new Float32Array(2), new Float32Array(3))).toThrow(EmbeddingError);
  });
});

describe('SqliteVectorStore', () => {
  it('refuses a database whose schema cannot be migrated', () => {
    const legacy = openDatabase(':memory:');
    legacy.exec('CREATE TABLE vectors (id TEXT PRIMARY KEY)');

    try {
      expect(() => new SqliteVectorStore(new HashingEmbeddingProvider(), legacy, silentLogger)).toThrow(
        DatabaseError
      );
      expect(() => new SqliteVectorStore(new HashingEmbeddingProvider(), legacy, silentLogger)).toThrow(
        /^Migration 001-vectors\.sql failed: /
      );
    } finally {
      legacy.close();
    }
  });

  it('ranks documents by distance to the query', async () => {
    await store.upsert('notes', [
      { id: 'b', document: 'gamma delta', metadata: {} },
      { id: 'a', document: 'alpha beta', metadata: {} },
    ]);

    const matches = await store.query('notes', 'alpha', { limit: 5 });

    expect(matches.map((match) => match.id)).toEqual(['a', 'b']);
    expect(matches[0]?.distance).toBeCloseTo(1 - 1 / Math.SQRT2);
    expect(matches[1]?.distance).toBeCloseTo(1);
  });

  it('keeps insertion order for equal distances', async () => {
    await store.upsert('notes', [
      { id: 'first', document: 'same text', metadata: {} },
      { id: 'second', document: 'same text', metadata: {} },
      { id: 'third', document: 'same text', metadata: {} },
    ]);

    const once = await store.query('notes', 'text', { limit: 5 });
    const twice = await store.query('notes', 'text', { limit: 5 });

    expect(once.map((match) => match.id)).toEqual(['first', 'second', 'third']);
    expect(twice.map((match) => match.id)).toEqual(['first', 'second', 'third']);
  });

  it('applies the metadata filter and the limit', async () => {
    await store.upsert('notes', [
      { id: 'x1', document: 'alpha', metadata: { group: 'x', rank: 1 } },
      { id: 'y1', document: 'alpha', metadata: { group: 'y', rank: 1 } },
      { id: 'x2', document: 'alpha', metadata: { group: 'x', rank: 2 } },
    ]);

    const byGroup = await store.query('notes', 'alpha', { where: { group: 'x' }, limit: 5 });
    const limited = await store.query('notes', 'alpha', { limit: 1 });
    const byBoth = await store.query('notes', 'alpha', { where: { group: 'x', rank: 2 }, limit: 5 });

    expect(byGroup.map((match) => match.id)).toEqual(['x1', 'x2']);
    expect(limited.map((match) => match.id)).toEqual(['x1']);
    expect(byBoth.map((match) => match.id)).toEqual(['x2']);
  });

  it('returns nothing for an empty collection without embedding the query', async () => {
    const embedder = new HashingEmbeddingProvider();
    const empty = new SqliteVectorStore(embedder, db, silentLogger);

    expect(await empty.query('missing', 'alpha', { limit: 5 })).toEqual([]);
    expect(embedder.embedded).toEqual([]);
  });

  it('keeps collections apart', async () => {
    await store.upsert('one', [{ id: 'a', document: 'alpha', metadata: {} }]);
    await store.upsert('two', [{ id: 'a', document: 'beta', metadata: {} }]);

    expect(store.get('one', 'a')?.document).toBe('alpha');
    expect(store.get('two', 'a')?.document).toBe('beta');
    expect(store.count('one')).toBe(1);
  });

  it('replaces a record in place', async () => {
    await store.upsert('notes', [
      { id: 'a', document: 'alpha', metadata: { v: 1 } },
      { id: 'b', document: 'beta', metadata: {} },
    ]);
    await store.upsert('notes', [{ id: 'a', document: 'gamma', metadata: { v: 2 } }]);

    expect(store.ids('notes')).toEqual(['a', 'b']);
    expect(store.get('notes', 'a')).toEqual({ id: 'a', document: 'gamma', metadata: { v: 2 } });
  });

  it('clears one collection or all of them', async () => {
    await store.upsert('one', [{ id: 'a', document: 'alpha', metadata: {} }]);
    await store.upsert('two', [{ id: 'b', document: 'beta', metadata: {} }]);

    store.clear('one');
    expect(store.count('one')).toBe(0);
    expect(store.count('two')).toBe(1);

    store.clear();
    expect(store.count('two')).toBe(0);
  });

  it('falls back to empty metadata for a corrupted row', async () => {
    await store.upsert('notes', [{ id: 'a', document: 'alpha', metadata: { ok: true } }]);
    db.prepare("UPDATE vectors SET metadata = 'not json' WHERE id = 'a'").run();

    expect(store.get('notes', 'a')?.metadata).toEqual({});
  });
});
