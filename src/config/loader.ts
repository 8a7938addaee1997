/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the data directory (~/.course-rag)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath, getHomeDir } from './paths.js';
import { ConfigError } from '../errors/index.js';

function ensureHomeDir(): void {
  const homeDir = getHomeDir();
  if (!fs.existsSync(homeDir)) {
    fs.mkdirSync(homeDir, { recursive: true });
  }
}

function formatIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function isJsonMap(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

/**
 * Overlay a sparse user config onto a complete one, section by section.
 */
export function mergeConfig(base: Config, overrides: PartialConfig): Config {
  return {
    llm: { ...base.llm, ...overrides.llm },
    embedding: { ...base.embedding, ...overrides.embedding },
    chunking: { ...base.chunking, ...overrides.chunking },
    search: { ...base.search, ...overrides.search },
    session: { ...base.session, ...overrides.session },
    ingest: { ...base.ingest, ...overrides.ingest },
  };
}

/**
 * Validate a parsed TOML document and merge it over the defaults.
 *
 * @throws ConfigError naming every offending key
 */
export function resolveConfig(parsed: unknown): Config {
  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(partial.error.issues)}`);
  }

  const merged = ConfigSchema.safeParse(mergeConfig(DEFAULT_CONFIG, partial.data));
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(merged.error.issues)}`);
  }
  return merged.data;
}

function readConfigFile(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or delete it to restore defaults`
    );
  }
}

/**
 * Load and parse the config file.
 * Returns the merged config (defaults + user overrides).
 *
 * @param createIfMissing - If true, writes the commented template on first run
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureHomeDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  return resolveConfig(readConfigFile(configPath));
}

/**
 * Get a config value by dot-notation path.
 * Example: getConfigValue('embedding.model') => 'nomic-embed-text'
 */
export function getConfigValue(key: string): unknown {
  let current: unknown = loadConfig();
  for (const part of key.split('.')) {
    if (current === null || typeof current !== 'object' || Array.isArray(current)) {
      return undefined;
    }
    current = Object.entries(current).find(([name]) => name === part)?.[1];
  }
  return current;
}

/**
 * Parse a CLI string into the TOML type the current value has.
 * Arrays are written comma-separated: ".txt,.md"
 */
export function parseValue(value: string, current?: unknown): TOML.AnyJson {
  if (Array.isArray(current)) {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a config value by dot-notation path and write it back to config.toml.
 * The complete config is validated before anything is written.
 */
export function setConfigValue(key: string, value: string): void {
  const parts = key.split('.');
  const leaf = parts.pop();
  const current = getConfigValue(key);
  if (leaf === undefined || leaf === '' || current === undefined) {
    throw new ConfigError(`Unknown config key: '${key}'`);
  }

  const configPath = getConfigPath();
  ensureHomeDir();
  const config: TOML.JsonMap = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  let section = config;
  for (const part of parts) {
    const next = section[part];
    if (isJsonMap(next)) {
      section = next;
    } else {
      const created: TOML.JsonMap = {};
      section[part] = created;
      section = created;
    }
  }
  section[leaf] = parseValue(value, current);

  try {
    resolveConfig(config);
  } catch (error) {
    const reason = error instanceof ConfigError ? error.message : String(error);
    throw new ConfigError(
      `Invalid value for '${key}': ${reason}`,
      'Run: course-rag config list  to see current values and types'
    );
  }

  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * List all config values in a flat format
 * Returns entries like ['llm.model', 'claude-sonnet-4-20250514']
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: object, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig());
  return entries;
}
