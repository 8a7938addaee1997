/**
 * Error type definitions for the course-rag CLI and library
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for error handling logic
 */

/**
 * Base class for all errors raised by course-rag.
 *
 * - hint: tells the user HOW to fix the problem
 * - code: lets scripts handle different failures differently
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors (invalid TOML, bad values).
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: course-rag config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an API key is missing or malformed.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string, detail: { message?: string; hint?: string } = {}) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      detail.message ?? `${provider} API key not configured`,
      detail.hint ??
        `Set the ${envVarName} environment variable (a .env file in the working directory also works)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Wraps SQLite errors with user-friendly messages.
 *
 * Exit code 5: Database error
 */
export class DatabaseError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, 'Try re-ingesting with: course-rag ingest --clear', 5, cause);
    this.name = 'DatabaseError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide field-level errors.
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A course document that does not follow the Course/Lesson text convention.
 *
 * Exit code 6: Document error
 */
export class DocumentParseError extends CLIError {
  /** Path (or label) of the rejected document */
  public readonly source: string;

  constructor(source: string, reason: string) {
    super(
      `Cannot parse course document ${source}: ${reason}`,
      'The first lines must include "Course Title: <title>"',
      6
    );
    this.name = 'DocumentParseError';
    this.source = source;
  }
}

/**
 * A file whose bytes are mostly not valid UTF-8 text.
 *
 * Exit code 6: Document error
 */
export class DocumentDecodeError extends CLIError {
  public readonly source: string;

  constructor(source: string, invalidRatio: number) {
    super(
      `Cannot decode ${source}: ${(invalidRatio * 100).toFixed(1)}% of characters are not valid UTF-8`,
      'Convert the file to UTF-8 text before ingesting it',
      6
    );
    this.name = 'DocumentDecodeError';
    this.source = source;
  }
}

/**
 * The embedding service failed or returned an unexpected payload.
 *
 * Exit code 7: Embedding error
 */
export class EmbeddingError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(
      message,
      'Check that the embedding service is running and embedding.model is pulled/available',
      7,
      cause
    );
    this.name = 'EmbeddingError';
  }
}

/**
 * The language model requested a tool that is not registered.
 *
 * Exit code 8: Tool error
 */
export class UnknownToolError extends CLIError {
  public readonly toolName: string;

  constructor(toolName: string, available: readonly string[]) {
    super(
      `Tool '${toolName}' not found`,
      available.length > 0
        ? `Registered tools: ${available.join(', ')}`
        : 'No tools are registered',
      8
    );
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

/**
 * A query failed because the language model or a tool call failed.
 *
 * Exit code 9: Query error
 */
export class QueryError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, 'Run with --verbose for more details', 9, cause);
    this.name = 'QueryError';
  }
}
