/**
 * Environment Variable Handler
 *
 * Loads and provides access to API keys and service endpoints.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Keys are optional at load time; only the provider actually in use
 * needs its key configured.
 */
export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OLLAMA_HOST: z.string().url().default('http://localhost:11434'),
  COURSE_RAG_HOME: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 * Malformed URLs fall back to their defaults.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    ANTHROPIC_API_KEY: process.env['ANTHROPIC_API_KEY'],
    OPENAI_API_KEY: process.env['OPENAI_API_KEY'],
    OPENAI_BASE_URL: emptyToUndefined(process.env['OPENAI_BASE_URL']),
    OLLAMA_HOST: emptyToUndefined(process.env['OLLAMA_HOST']),
    COURSE_RAG_HOME: process.env['COURSE_RAG_HOME'],
  };

  const result = EnvSchema.safeParse(raw);
  _envCache = result.success
    ? result.data
    : EnvSchema.parse({
        ANTHROPIC_API_KEY: raw.ANTHROPIC_API_KEY,
        OPENAI_API_KEY: raw.OPENAI_API_KEY,
        COURSE_RAG_HOME: raw.COURSE_RAG_HOME,
      });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value?.trim() ? value.trim() : undefined;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when a required API key is missing or malformed.
 */
export const SETUP_INSTRUCTIONS: Record<'anthropic' | 'openai', string> = {
  anthropic: `
To answer questions with Anthropic models:

1. Get your API key from https://console.anthropic.com/
2. Set the environment variable (or add it to a .env file):

   export ANTHROPIC_API_KEY="sk-ant-..."
`.trim(),

  openai: `
To embed with an OpenAI-compatible API:

1. Set the environment variables (or add them to a .env file):

   export OPENAI_API_KEY="sk-..."
   export OPENAI_BASE_URL="https://api.openai.com/v1"   # optional

2. Run: course-rag config set embedding.provider openai
`.trim(),
};
