/**
 * Tests for the courses command
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import chalk from 'chalk';
import { createCoursesCommand } from '../courses.js';
import type { CommandServices } from '../../runtime.js';
import { DEFAULT_CONFIG } from '../../../config/index.js';
import {
  createRecordingContext,
  createTestIndex,
  type RecordingContext,
  type TestIndex,
} from '../../../test-utils/index.js';

describe('courses command', () => {
  let t: TestIndex;
  let services: CommandServices;

  beforeEach(() => {
    chalk.level = 0;
    t = createTestIndex();
    services = {
      loadConfig: () => DEFAULT_CONFIG,
      openIndex: () => t.index,
      openAssistant: () => {
        throw new Error('not used');
      },
    };
  });

  afterEach(() => {
    t.db.close();
  });

  async function run(recording: RecordingContext, name = 'courses'): Promise<void> {
    const program = new Command();
    program.addCommand(createCoursesCommand(() => recording.ctx, services));
    await program.parseAsync(['node', 'test', name]);
  }

  async function addCourses(): Promise<void> {
    await t.index.addCourse(
      {
        title: 'Alpha',
        instructor: 'Ada',
        courseLink: 'https://example.com/alpha',
        lessons: [
          { lessonNumber: 0, title: 'Start' },
          { lessonNumber: 1, title: 'Next' },
        ],
      },
      []
    );
    await t.index.addCourse({ title: 'Beta', lessons: [] }, []);
  }

  it('shows a hint when nothing is indexed', async () => {
    const recording = createRecordingContext();

    await run(recording);

    expect(recording.logs).toEqual([
      'No courses indexed yet.',
      '',
      'Run course-rag ingest <folder> to add course documents.',
    ]);
  });

  it('prints a table of courses', async () => {
    await addCourses();
    const recording = createRecordingContext();

    await run(recording);

    expect(recording.logs).toEqual([
      'Courses (2):',
      [
        '┌───┬───────┬────────────┬─────────┐',
        '│ # │ Title │ Instructor │ Lessons │',
        '├───┼───────┼────────────┼─────────┤',
        '│ 1 │ Alpha │ Ada        │       2 │',
        '│ 2 │ Beta  │            │       0 │',
        '└───┴───────┴────────────┴─────────┘',
      ].join('\n'),
    ]);
  });

  it('answers to the ls alias with JSON', async () => {
    await addCourses();
    const recording = createRecordingContext({ json: true });

    await run(recording, 'ls');

    expect(recording.json).toEqual([
      {
        totalCourses: 2,
        courses: [
          { title: 'Alpha', instructor: 'Ada', lessons: 2, link: 'https://example.com/alpha' },
          { title: 'Beta', instructor: undefined, lessons: 0, link: undefined },
        ],
      },
    ]);
  });
});
