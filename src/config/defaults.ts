/**
 * Default Configuration Values
 *
 * Used when no config.toml exists (first run) or when the user's file
 * leaves fields out. The loader merges user config ON TOP of these.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  llm: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    max_tokens: 800,
    temperature: 0,
  },

  // nomic-embed-text via a local Ollama server (768 dimensions)
  embedding: {
    provider: 'ollama',
    model: 'nomic-embed-text',
    batch_size: 32,
    timeout_ms: 120000,
  },

  chunking: {
    chunk_size: 800,
    chunk_overlap: 100,
  },

  search: {
    max_results: 5,
  },

  session: {
    max_history: 2,
  },

  ingest: {
    docs_path: 'docs',
    extensions: ['.txt', '.md'],
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.course-rag/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# course-rag configuration
# Location: ~/.course-rag/config.toml (override the directory with COURSE_RAG_HOME)

[llm]
provider = "${DEFAULT_CONFIG.llm.provider}"
model = "${DEFAULT_CONFIG.llm.model}"
max_tokens = ${DEFAULT_CONFIG.llm.max_tokens}
temperature = ${DEFAULT_CONFIG.llm.temperature}

# Embeddings are requested over HTTP.
# ollama: needs "ollama serve" and "ollama pull ${DEFAULT_CONFIG.embedding.model}"
# openai: uses OPENAI_API_KEY and OPENAI_BASE_URL
# Changing the model requires re-ingesting: course-rag ingest --clear
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

# Sizes in characters
[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

[search]
max_results = ${DEFAULT_CONFIG.search.max_results}

[session]
max_history = ${DEFAULT_CONFIG.session.max_history}

[ingest]
docs_path = "${DEFAULT_CONFIG.ingest.docs_path}"
extensions = [${DEFAULT_CONFIG.ingest.extensions.map((ext) => `"${ext}"`).join(', ')}]
`;
