/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { HashingEmbeddingProvider, ScriptedLanguageModel } from '../test-utils/index.js';
 *
 * const embedder = new HashingEmbeddingProvider();
 * const model = new ScriptedLanguageModel([{ kind: 'text', text: 'Hello' }]);
 * ```
 */

export { HashingEmbeddingProvider, ScriptedLanguageModel } from './fakes.js';
export { createTestIndex, type TestIndex } from './index-factory.js';
export { createRecordingContext, type RecordingContext } from './cli-context.js';
