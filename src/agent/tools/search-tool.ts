/**
 * Course Search Tool
 *
 * Lets the model run one filtered search over course content. Results are
 * rendered as bracketed headers followed by chunk text; a citation is
 * recorded per result.
 */

import { z } from 'zod';
import type { ToolDefinition } from '../../providers/index.js';
import type { SearchHit } from '../../search/index.js';
import type { SourceCitation } from '../types.js';
import { parseToolArguments } from './arguments.js';
import type { AgentTool, CourseIndexReader } from './types.js';

// ============================================================================
// Input Schema
// ============================================================================

const SearchArgsSchema = z.object({
  query: z.string().min(1),
  course_name: z.string().min(1).optional(),
  lesson_number: z.number().int().nonnegative().optional(),
});

export type SearchArgs = z.infer<typeof SearchArgsSchema>;

const DEFINITION: ToolDefinition = {
  name: 'search_course_content',
  description: 'Search course materials with smart course name matching and lesson filtering',
  inputSchema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'What to search for in the course content',
      },
      course_name: {
        type: 'string',
        description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
      },
      lesson_number: {
        type: 'integer',
        minimum: 0,
        description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
      },
    },
    required: ['query'],
  },
};

// ============================================================================
// Formatting
// ============================================================================

export function citationLabel(courseTitle: string, lessonNumber?: number): string {
  return lessonNumber === undefined ? courseTitle : `${courseTitle} - Lesson ${lessonNumber}`;
}

function emptyResultText(args: SearchArgs): string {
  let text = 'No relevant content found';
  if (args.course_name !== undefined) text += ` in course '${args.course_name}'`;
  if (args.lesson_number !== undefined) text += ` in lesson ${args.lesson_number}`;
  return `${text}.`;
}

// ============================================================================
// Tool
// ============================================================================

/**
 * search_course_content
 *
 * @example
 * ```typescript
 * const tool = new CourseSearchTool(index);
 * const text = await tool.execute({ query: 'prompt caching', course_name: 'Claude' });
 * tool.lastSources; // [{ label: 'Building with Claude - Lesson 3', link: '...' }]
 * ```
 */
export class CourseSearchTool implements AgentTool<'search_course_content'> {
  readonly name = 'search_course_content';
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

    const parsed = parseToolArguments(this.name, SearchArgsSchema, args);
    if (!parsed.ok) {
      return parsed.message;
    }

    const { query, course_name, lesson_number } = parsed.value;
    const results = await this.index.search({
      query,
      courseName: course_name,
      lessonNumber: lesson_number,
    });

    if (results.error !== undefined) {
      return results.error;
    }
    if (results.hits.length === 0) {
      return emptyResultText(parsed.value);
    }

    this.sources = results.hits.map((hit) => this.cite(hit));
    return results.hits
      .map((hit, i) => `[${this.sources[i]?.label ?? hit.courseTitle}]\n${hit.content}`)
      .join('\n\n');
  }

  resetSources(): void {
    this.sources = [];
  }

  private cite(hit: SearchHit): SourceCitation {
    const link =
      (hit.lessonNumber !== undefined
        ? this.index.getLessonLink(hit.courseTitle, hit.lessonNumber)
        : undefined) ?? this.index.getCourseLink(hit.courseTitle);

    const citation: SourceCitation = { label: citationLabel(hit.courseTitle, hit.lessonNumber) };
    if (link !== undefined) citation.link = link;
    return citation;
  }
}
