/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `course-rag config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  LLMConfigSchema,
  EmbeddingConfigSchema,
  ChunkingConfigSchema,
  SearchConfigSchema,
  SessionConfigSchema,
  IngestConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  resolveConfig,
  mergeConfig,
  getConfigValue,
  setConfigValue,
  parseValue,
  listConfig,
} from './loader.js';

// Paths
export { getHomeDir, getConfigPath, getDbPath } from './paths.js';

// Environment variables
export { loadEnv, getEnv, SETUP_INSTRUCTIONS, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
