/**
 * Database Module
 *
 * SQLite persistence for vector collections.
 */

export { getDb, closeDb, openDatabase } from './connection.js';
export { runMigrations } from './migrate.js';
export type { MigrationResult } from './migrate.js';
export { VectorOperations } from './operations.js';
export { embeddingToBlob, blobToEmbedding } from './schema.js';
export type { VectorRecordRow, VectorRecordInput, Metadata, MetadataValue } from './schema.js';
export {
  VectorRowSchema,
  MetadataSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';
