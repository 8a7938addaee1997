import type { z } from 'zod';

/**
 * Validate tool arguments. Failures become a message for the model.
 */
export function parseToolArguments<S extends z.ZodTypeAny>(
  toolName: string,
  schema: S,
  args: unknown
): { ok: true; value: z.output<S> } | { ok: false; message: string } {
  const result = schema.safeParse(args);
  if (result.success) {
    return { ok: true, value: result.data };
  }

  const issues = result.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return { ok: false, message: `Invalid arguments for ${toolName}: ${issues}` };
}
