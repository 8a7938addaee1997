/**
 * API Key Validators
 *
 * Validates API key format without exposing key values.
 *
 * SECURITY: These functions NEVER log or return the actual key.
 * They only report presence/absence and format validity.
 */

import { z } from 'zod';
import { SETUP_INSTRUCTIONS } from '../config/env.js';

/**
 * Result of validating a provider's API key.
 *
 * When valid: { valid: true }
 * When invalid: { valid: false, error: string, setupInstructions: string }
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

/**
 * Anthropic API key format: sk-ant-... (variable length)
 * Only the common prefix is checked.
 */
export const AnthropicKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine(
    (key) => key.startsWith('sk-ant-'),
    'Invalid Anthropic API key format (should start with "sk-ant-")'
  );

/**
 * Validate that an Anthropic API key exists and has the expected format.
 *
 * @example
 * ```typescript
 * const result = validateAnthropicKey(getEnv('ANTHROPIC_API_KEY'));
 * if (!result.valid) {
 *   ctx.error(result.error);
 *   ctx.log(result.setupInstructions);
 * }
 * ```
 */
export function validateAnthropicKey(key: string | undefined): ValidationResult {
  if (!key?.trim()) {
    return {
      valid: false,
      error: 'ANTHROPIC_API_KEY environment variable is not set',
      setupInstructions: SETUP_INSTRUCTIONS.anthropic,
    };
  }

  const result = AnthropicKeySchema.safeParse(key.trim());
  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid API key format',
      setupInstructions: SETUP_INSTRUCTIONS.anthropic,
    };
  }

  return { valid: true };
}
