/**
 * Tests for the chat REPL loop
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { createChatCommand, runChatLoop } from '../chat.js';
import type { CommandServices } from '../../runtime.js';
import { CourseAssistant } from '../../../agent/index.js';
import { DEFAULT_CONFIG } from '../../../config/index.js';
import { QueryError } from '../../../errors/index.js';
import {
  createRecordingContext,
  createTestIndex,
  ScriptedLanguageModel,
  type TestIndex,
} from '../../../test-utils/index.js';
import { silentLogger } from '../../../utils/index.js';

async function* linesOf(...lines: string[]): AsyncGenerator<string> {
  for (const line of lines) {
    yield line;
  }
}

describe('runChatLoop', () => {
  let t: TestIndex;
  let model: ScriptedLanguageModel;
  let assistant: CourseAssistant;

  beforeEach(() => {
    chalk.level = 0;
    t = createTestIndex();
    model = new ScriptedLanguageModel();
    assistant = new CourseAssistant({ index: t.index, model, logger: silentLogger });
  });

  afterEach(() => {
    t.db.close();
  });

  it('answers every line in one session', async () => {
    model.enqueue({ kind: 'text', text: 'Hello!' }, { kind: 'text', text: 'Sure.' });
    const recording = createRecordingContext();

    const result = await runChatLoop(assistant, recording.ctx, linesOf('Hi', 'Tell me more'));

    expect(result).toEqual({ sessionId: 'session_1', turns: 2 });
    expect(recording.logs).toEqual(['Hello!', 'Sure.']);
    expect(model.requests[1]?.system).toContain('Previous conversation:\nUser: Hi\nAssistant: Hello!');
  });

  it('skips blank lines', async () => {
    model.enqueue({ kind: 'text', text: 'Hello!' });

    const result = await runChatLoop(
      assistant,
      createRecordingContext().ctx,
      linesOf('', '   ', 'Hi')
    );

    expect(result.turns).toBe(1);
    expect(model.requests).toHaveLength(1);
  });

  it('stops at /exit', async () => {
    model.enqueue({ kind: 'text', text: 'Hello!' });

    const result = await runChatLoop(
      assistant,
      createRecordingContext().ctx,
      linesOf('Hi', '/exit', 'never asked')
    );

    expect(result.turns).toBe(1);
    expect(model.requests).toHaveLength(1);
  });

  it('forgets the conversation on /clear', async () => {
    model.enqueue({ kind: 'text', text: 'Hello!' }, { kind: 'text', text: 'Fresh.' });
    const recording = createRecordingContext();

    await runChatLoop(assistant, recording.ctx, linesOf('Hi', '/clear', 'Again'));

    expect(recording.logs).toEqual(['Hello!', 'Conversation cleared.', 'Fresh.']);
    expect(model.requests[1]?.system).not.toContain('Previous conversation:');
  });

  it('reports a failed question and keeps going', async () => {
    model.enqueue(new QueryError('Request to Anthropic API timed out. Please try again.'), {
      kind: 'text',
      text: 'Recovered.',
    });
    const recording = createRecordingContext();

    const result = await runChatLoop(assistant, recording.ctx, linesOf('Hi', 'Hi again'));

    expect(result.turns).toBe(1);
    expect(recording.errors).toEqual(['Request to Anthropic API timed out. Please try again.']);
    expect(recording.logs).toEqual(['Run with --verbose for more details', 'Recovered.']);
  });

  it('prompts before each line and once at the end', async () => {
    model.enqueue({ kind: 'text', text: 'Hello!' });
    const prompt = vi.fn();

    await runChatLoop(assistant, createRecordingContext().ctx, linesOf('Hi'), { prompt });

    expect(prompt).toHaveBeenCalledTimes(2);
  });
});

describe('createChatCommand', () => {
  it('creates a command named "chat"', () => {
    const services: CommandServices = {
      loadConfig: () => DEFAULT_CONFIG,
      openIndex: () => {
        throw new Error('not used');
      },
      openAssistant: () => {
        throw new Error('not used');
      },
    };

    expect(createChatCommand(() => createRecordingContext().ctx, services).name()).toBe('chat');
  });
});
