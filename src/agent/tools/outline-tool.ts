/**
 * Course Outline Tool
 *
 * Returns a course's title, link, instructor and lesson list.
 */

import { z } from 'zod';
import type { ToolDefinition } from '../../providers/index.js';
import type { Course } from '../../indexer/chunker/types.js';
import type { SourceCitation } from '../types.js';
import { parseToolArguments } from './arguments.js';
import type { AgentTool, CourseIndexReader } from './types.js';

const OutlineArgsSchema = z.object({
  course_name: z.string().min(1),
});

const DEFINITION: ToolDefinition = {
  name: 'get_course_outline',
  description:
    'Get the outline of a course: its title, link, instructor and the numbered list of lessons',
  inputSchema: {
    type: 'object',
    properties: {
      course_name: {
        type: 'string',
        description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
      },
    },
    required: ['course_name'],
  },
};

export function formatOutline(course: Course): string {
  const lines = [`Course: ${course.title}`];
  if (course.courseLink !== undefined) lines.push(`Link: ${course.courseLink}`);
  if (course.instructor !== undefined) lines.push(`Instructor: ${course.instructor}`);

  if (course.lessons.length === 0) {
    lines.push('No lessons listed');
  } else {
    lines.push(`Lessons (${course.lessons.length}):`);
    for (const lesson of course.lessons) {
      lines.push(`Lesson ${lesson.lessonNumber}: ${lesson.title}`);
    }
  }
  return lines.join('\n');
}

/**
 * get_course_outline
 */
export class CourseOutlineTool implements AgentTool<'get_course_outline'> {
  readonly name = 'get_course_outline';
  private sources: SourceCitation[] = [];

  constructor(private readonly index: CourseIndexReader) {}

  get lastSources(): readonly SourceCitation[] {
    return this.sources;
  }

  definition(): ToolDefinition {
    return DEFINITION;
  }

  async execute(args: unknown): Promise<string> {
    this.sources = [];

    const parsed = parseToolArguments(this.name, OutlineArgsSchema, args);
    if (!parsed.ok) {
      return parsed.message;
    }

    const name = parsed.value.course_name;
    const title = await this.index.resolveCourseName(name);
    const course = title === undefined ? undefined : this.index.getCourse(title);
    if (!course) {
      return `No course found matching '${name}'`;
    }

    const citation: SourceCitation = { label: course.title };
    if (course.courseLink !== undefined) citation.link = course.courseLink;
    this.sources = [citation];

    return formatOutline(course);
  }

  resetSources(): void {
    this.sources = [];
  }
}
