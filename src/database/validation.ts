/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime.
 * better-sqlite3 returns `unknown` rows; these schemas turn them into
 * typed values or fail loudly on schema drift.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM vectors WHERE collection = ? AND id = ?').get(c, id);
 * return row ? validateRow(VectorRowSchema, row, `vectors.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Vector Schema
// ============================================================================

/**
 * Matches the `VectorRecordRow` interface in schema.ts.
 * `embedding` is a Buffer: better-sqlite3 returns BLOBs as Buffers.
 */
export const VectorRowSchema = z.object({
  collection: z.string(),
  id: z.string(),
  document: z.string(),
  embedding: z.instanceof(Buffer),
  metadata: z.string(),
  seq: z.number().int(),
  created_at: z.string(),
});

export type VectorRow = z.infer<typeof VectorRowSchema>;

/**
 * The decoded `metadata` column.
 */
export const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation.
 *
 * Exit code 5: Database error (same as DatabaseError)
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThe index may have been written by another version.\n` +
      `Try: course-rag ingest --clear  to rebuild it`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @param context - Shown in the error message (e.g. "vectors.id=Intro_0")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodSchema>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of database rows against a Zod schema.
 * Throws on the first invalid row.
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
