/**
 * Environment Variable Handler Tests
 *
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getEnv, _clearEnvCache } from '../env.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('loads ANTHROPIC_API_KEY when set', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    expect(loadEnv().ANTHROPIC_API_KEY).toBe('test-secret');
  });

  it('provides default endpoints when not set', () => {
    vi.stubEnv('OLLAMA_HOST', '');
    vi.stubEnv('OPENAI_BASE_URL', '');

    const env = loadEnv();

    expect(env.OLLAMA_HOST).toBe('http://localhost:11434');
    expect(env.OPENAI_BASE_URL).toBe('https://api.openai.com/v1');
  });

  it('uses a custom OLLAMA_HOST when set', () => {
    vi.stubEnv('OLLAMA_HOST', 'http://192.168.1.100:11434');
    expect(getEnv('OLLAMA_HOST')).toBe('http://192.168.1.100:11434');
  });

  it('falls back to defaults when a URL is malformed', () => {
    vi.stubEnv('OLLAMA_HOST', 'not a url');
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');

    const env = loadEnv();

    expect(env.OLLAMA_HOST).toBe('http://localhost:11434');
    expect(env.OPENAI_API_KEY).toBe('test-secret');
  });

  it('caches environment variables after first load', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'first');
    loadEnv();
    vi.stubEnv('ANTHROPIC_API_KEY', 'second');

    expect(getEnv('ANTHROPIC_API_KEY')).toBe('first');

    _clearEnvCache();
    expect(getEnv('ANTHROPIC_API_KEY')).toBe('second');
  });
});
