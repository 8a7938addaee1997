/**
 * API Key Validation Tests
 *
 * Verifies key format validation and error messages.
 */

import { describe, it, expect } from 'vitest';
import { validateAnthropicKey, AnthropicKeySchema } from '../validation.js';

describe('validateAnthropicKey', () => {
  it('accepts a key with the sk-ant- prefix', () => {
    expect(validateAnthropicKey('sk-ant-test-secret')).toEqual({ valid: true });
  });

  it('trims surrounding whitespace', () => {
    expect(validateAnthropicKey('  sk-ant-test-secret\n')).toEqual({ valid: true });
  });

  it('rejects a key without the prefix', () => {
    const result = validateAnthropicKey('test-secret');

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('Invalid Anthropic API key format (should start with "sk-ant-")');
      expect(result.setupInstructions).toContain('console.anthropic.com');
    }
  });

  it.each([undefined, '', '   '])('reports a missing key for %j', (key) => {
    const result = validateAnthropicKey(key);

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('ANTHROPIC_API_KEY environment variable is not set');
    }
  });
});

describe('AnthropicKeySchema', () => {
  it('rejects the empty string with a specific message', () => {
    const result = AnthropicKeySchema.safeParse('');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('API key cannot be empty');
    }
  });
});
