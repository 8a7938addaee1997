/**
 * Configuration Schema
 *
 * Defines the shape of ~/.course-rag/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Language model settings for the question-answering loop
 */
export const LLMConfigSchema = z.object({
  provider: z.enum(['anthropic']).describe('Language model provider'),
  model: z.string().min(1).describe('Model used for answering questions'),
  max_tokens: z
    .number()
    .int()
    .min(64)
    .max(8192)
    .describe('Maximum tokens per model response (64-8192, default 800)'),
  temperature: z
    .number()
    .min(0)
    .max(1)
    .describe('Sampling temperature; 0 favours deterministic answers'),
});

/**
 * Embedding provider configuration.
 * Both providers are reached over HTTP; the model must exist on the server.
 */
export const EmbeddingConfigSchema = z.object({
  provider: z
    .enum(['ollama', 'openai'])
    .describe('Embedding provider (ollama for a local server, openai for an OpenAI-compatible API)'),
  model: z.string().min(1).describe('Embedding model name'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(256)
    .describe('Number of texts to embed per request (1-256, default 32)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout in milliseconds for one embedding request (default 120000)'),
});

/**
 * Chunking configuration.
 * Sizes are measured in characters.
 */
export const ChunkingConfigSchema = z
  .object({
    chunk_size: z.number().int().min(50).max(20000).describe('Maximum characters per chunk'),
    chunk_overlap: z
      .number()
      .int()
      .min(0)
      .describe('Characters of trailing sentences repeated at the start of the next chunk'),
  })
  .refine((value) => value.chunk_overlap < value.chunk_size, {
    message: 'chunk_overlap must be smaller than chunk_size',
    path: ['chunk_overlap'],
  });

/**
 * Search configuration
 */
export const SearchConfigSchema = z.object({
  max_results: z.number().int().min(1).max(50).describe('Passages returned per search'),
});

/**
 * Conversation memory configuration
 */
export const SessionConfigSchema = z.object({
  max_history: z
    .number()
    .int()
    .min(0)
    .max(50)
    .describe('Exchanges remembered per session (0 disables history)'),
});

/**
 * Ingestion configuration
 */
export const IngestConfigSchema = z.object({
  docs_path: z.string().min(1).describe('Default folder of course documents'),
  extensions: z
    .array(z.string().regex(/^\.[A-Za-z0-9]+$/, 'Extensions look like ".txt"'))
    .min(1)
    .describe('File extensions treated as course documents'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  llm: LLMConfigSchema,
  embedding: EmbeddingConfigSchema,
  chunking: ChunkingConfigSchema,
  search: SearchConfigSchema,
  session: SessionConfigSchema,
  ingest: IngestConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Sparse config as written by users: every section and field optional.
 * Cross-field rules are checked again on the merged result.
 */
export const PartialConfigSchema = z.object({
  llm: LLMConfigSchema.partial().optional(),
  embedding: EmbeddingConfigSchema.partial().optional(),
  chunking: z
    .object({
      chunk_size: z.number().int().min(50).max(20000).optional(),
      chunk_overlap: z.number().int().min(0).optional(),
    })
    .optional(),
  search: SearchConfigSchema.partial().optional(),
  session: SessionConfigSchema.partial().optional(),
  ingest: IngestConfigSchema.partial().optional(),
});

export type PartialConfig = z.infer<typeof PartialConfigSchema>;
