/**
 * Tests for the ask command
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { Command } from 'commander';
import chalk from 'chalk';
import { createAskCommand, formatSources } from '../ask.js';
import type { CommandServices } from '../../runtime.js';
import { CourseAssistant } from '../../../agent/index.js';
import { DEFAULT_CONFIG } from '../../../config/index.js';
import { ValidationError } from '../../../errors/index.js';
import { ingestCourseFolder } from '../../../indexer/index.js';
import {
  createRecordingContext,
  createTestIndex,
  ScriptedLanguageModel,
  type RecordingContext,
  type TestIndex,
} from '../../../test-utils/index.js';
import { silentLogger } from '../../../utils/index.js';

describe('formatSources', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  it('numbers sources and adds links when known', () => {
    expect(
      formatSources([
        { label: 'Intro - Lesson 0', link: 'https://example.com/intro/0' },
        { label: 'Intro' },
      ])
    ).toEqual(['[1] Intro - Lesson 0 (https://example.com/intro/0)', '[2] Intro']);
  });
});

describe('ask command', () => {
  let t: TestIndex;
  let model: ScriptedLanguageModel;
  let assistant: CourseAssistant;
  let services: CommandServices;

  beforeEach(() => {
    chalk.level = 0;
    t = createTestIndex();
    model = new ScriptedLanguageModel();
    assistant = new CourseAssistant({ index: t.index, model, logger: silentLogger });
    services = {
      loadConfig: () => DEFAULT_CONFIG,
      openIndex: () => t.index,
      openAssistant: () => assistant,
    };
  });

  afterEach(() => {
    t.db.close();
  });

  async function run(recording: RecordingContext, args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createAskCommand(() => recording.ctx, services));
    await program.parseAsync(['node', 'test', 'ask', ...args]);
  }

  it('creates a command named "ask"', () => {
    const recording = createRecordingContext();
    expect(createAskCommand(() => recording.ctx, services).name()).toBe('ask');
  });

  it('prints a direct answer without a sources block', async () => {
    model.enqueue({ kind: 'text', text: 'Hello!' });
    const recording = createRecordingContext();

    await run(recording, ['Hi there']);

    expect(recording.logs).toEqual(['Hello!']);
    expect(model.requests[0]?.messages).toEqual([{ role: 'user', content: 'Hi there' }]);
  });

  it('prints numbered sources after a search', async () => {
    const tempDir = mkdtempSync(join(tmpdir(), 'course-rag-cli-ask-'));
    try {
      writeFileSync(
        join(tempDir, 'intro.txt'),
        [
          'Course Title: Intro',
          '',
          'Lesson 0: Basics',
          'Lesson Link: https://example.com/intro/0',
          'Short lesson text here.',
        ].join('\n')
      );
      await ingestCourseFolder(tempDir, t.index, { logger: silentLogger });
    } finally {
      rmSync(tempDir, { recursive: true, force: true });
    }
    model.enqueue(
      {
        kind: 'tool_use',
        text: '',
        invocations: [
          { id: 'tu_1', name: 'search_course_content', input: { query: 'short lesson' } },
        ],
      },
      { kind: 'text', text: 'Lesson 0 covers the basics.' }
    );
    const recording = createRecordingContext();

    await run(recording, ['What is in lesson 0?']);

    expect(recording.logs).toEqual([
      'Lesson 0 covers the basics.',
      '',
      'Sources:',
      '  [1] Intro - Lesson 0 (https://example.com/intro/0)',
    ]);
  });

  it('prints the full response as JSON', async () => {
    model.enqueue({ kind: 'text', text: 'Hello!' });
    const recording = createRecordingContext({ json: true });

    await run(recording, ['Hi']);

    expect(recording.json).toEqual([{ answer: 'Hello!', sources: [], sessionId: 'session_1' }]);
    expect(recording.logs).toEqual([]);
  });

  it('does not accept a session option', async () => {
    const recording = createRecordingContext();
    const command = createAskCommand(() => recording.ctx, services);

    expect(command.options.map((option) => option.long)).toEqual([]);
  });

  it('rejects an empty question', async () => {
    await expect(run(createRecordingContext(), ['  '])).rejects.toThrow(ValidationError);
  });
});
