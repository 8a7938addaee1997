/**
 * JSON Utilities
 *
 * Parsing of JSON stored in SQLite columns, validated with Zod so that
 * corrupted or drifted data degrades to a fallback instead of leaking
 * an unchecked value into the program.
 */

import type { z } from 'zod';

/**
 * Parse a JSON string and validate it against a schema.
 *
 * @param json - The JSON string (null/undefined yields the fallback)
 * @param schema - Zod schema the parsed value must satisfy
 * @param fallback - Value returned when parsing or validation fails
 * @param onError - Called with the reason when the fallback is used
 *
 * @example
 * ```typescript
 * const lessons = parseJsonWithSchema(row.lessons_json, LessonListSchema, [], (err) =>
 *   logger.warn(`Corrupted lesson list: ${err.message}`)
 * );
 * ```
 */
export function parseJsonWithSchema<S extends z.ZodTypeAny>(
  json: string | null | undefined,
  schema: S,
  fallback: z.output<S>,
  onError?: (error: Error, rawValue: string) => void
): z.output<S> {
  if (json === null || json === undefined) {
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    onError?.(error instanceof Error ? error : new Error(String(error)), json);
    return fallback;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    onError?.(new Error(`${where}${issue?.message ?? 'invalid value'}`), json);
    return fallback;
  }

  return result.data;
}
