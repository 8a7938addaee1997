/**
 * Centralized Path Definitions
 *
 * Single source of truth for the course-rag data directory.
 *
 * Directory structure:
 * ~/.course-rag/          (or $COURSE_RAG_HOME)
 * ├── index.db            (SQLite vector index)
 * └── config.toml         (User configuration)
 *
 * Paths are resolved on every call so tests can point COURSE_RAG_HOME at a
 * temporary directory.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/**
 * Data directory: $COURSE_RAG_HOME, or ~/.course-rag
 */
export function getHomeDir(): string {
  const override = process.env['COURSE_RAG_HOME']?.trim();
  return override ? override : join(homedir(), '.course-rag');
}

/**
 * SQLite database path (<home>/index.db)
 */
export function getDbPath(): string {
  return join(getHomeDir(), 'index.db');
}

/**
 * TOML config path (<home>/config.toml)
 */
export function getConfigPath(): string {
  return join(getHomeDir(), 'config.toml');
}
