/**
 * Database Connection Module
 *
 * Provides a singleton SQLite connection using better-sqlite3.
 * The database is stored at <home>/index.db (see config/paths.ts).
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getDbPath } from '../config/paths.js';
import { DatabaseError } from '../errors/index.js';

// Module-level singleton instance
let db: Database.Database | null = null;

/**
 * Open a SQLite database with the pragmas the index relies on.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  let connection: Database.Database;
  try {
    connection = new Database(path);
  } catch (error) {
    throw new DatabaseError(
      `Cannot open database at ${path}`,
      error instanceof Error ? error : undefined
    );
  }

  connection.pragma('foreign_keys = ON');

  // WAL is meaningless for in-memory databases
  if (path !== ':memory:') {
    connection.pragma('journal_mode = WAL');
  }

  return connection;
}

/**
 * Get the singleton database instance.
 *
 * Creates the database file and its directory on first call.
 * Subsequent calls return the same instance.
 *
 * @example
 * ```ts
 * const db = getDb();
 * const count = db.prepare('SELECT COUNT(*) AS count FROM vectors').get();
 * ```
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  db = openDatabase(getDbPath());
  process.on('exit', () => closeDb());

  return db;
}

/**
 * Close the database connection.
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
