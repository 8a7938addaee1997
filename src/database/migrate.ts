/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied.
 * Migrations are idempotent - safe to run multiple times.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { getDb } from './connection.js';
import { validateRows } from './validation.js';

/**
 * Result of running migrations.
 * Failures are reported instead of thrown so callers can decide.
 */
export interface MigrationResult {
  /** Names of migrations that were applied by this call */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// ============================================================================
// Embedded Migrations
// ============================================================================

const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-vectors.sql',
    sql: `
-- Named collections of embedded documents.
-- metadata holds a flat JSON object queried with json_extract().
CREATE TABLE IF NOT EXISTS vectors (
  collection TEXT NOT NULL,
  id TEXT NOT NULL,
  document TEXT NOT NULL,
  embedding BLOB NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}',
  seq INTEGER NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (collection, id)
);

CREATE INDEX IF NOT EXISTS idx_vectors_collection_seq ON vectors(collection, seq);
`,
  },
];

const AppliedMigrationSchema = z.object({ name: z.string() });

/** Databases already migrated by this process */
const initialized = new WeakSet<Database.Database>();

/**
 * Run all pending migrations.
 *
 * @param db - Connection to migrate (defaults to the singleton)
 */
export function runMigrations(db: Database.Database = getDb()): MigrationResult {
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  if (initialized.has(db)) {
    return { applied, failed };
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const done = new Set(
    validateRows(
      AppliedMigrationSchema,
      db.prepare('SELECT name FROM _migrations').all(),
      '_migrations'
    ).map((row) => row.name)
  );

  for (const migration of MIGRATIONS) {
    if (done.has(migration.name)) {
      continue;
    }
    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
      // Later migrations may depend on this one
      break;
    }
  }

  if (failed.length === 0) {
    initialized.add(db);
  }

  return { applied, failed };
}
