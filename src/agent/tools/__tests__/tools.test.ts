/**
 * Agent tool tests: search, outline and the registry.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Course, CourseChunk } from '../../../indexer/chunker/types.js';
import { UnknownToolError } from '../../../errors/index.js';
import type { SearchResults } from '../../../search/index.js';
import { createTestIndex, type TestIndex } from '../../../test-utils/index.js';
import { CourseOutlineTool } from '../outline-tool.js';
import { createToolRegistry, ToolRegistry } from '../registry.js';
import { CourseSearchTool } from '../search-tool.js';
import { isToolName, type CourseIndexReader } from '../types.js';

const MCP: Course = {
  title: 'Introduction to MCP Servers',
  courseLink: 'https://example.com/mcp',
  instructor: 'Ada Example',
  lessons: [
    { lessonNumber: 0, title: 'Setup', lessonLink: 'https://example.com/mcp/0' },
    { lessonNumber: 1, title: 'Prompts' },
  ],
};

const MCP_CHUNKS: CourseChunk[] = [
  { content: 'Lesson 0 content: tools and resources', courseTitle: MCP.title, lessonNumber: 0, chunkIndex: 0 },
  { content: 'prompts and tools', courseTitle: MCP.title, lessonNumber: 1, chunkIndex: 1 },
];

function readerReturning(results: SearchResults): CourseIndexReader {
  return {
    search: async () => results,
    resolveCourseName: async () => undefined,
    getCourse: () => undefined,
    getCourseLink: () => 'https://example.com/notes',
    getLessonLink: () => undefined,
  };
}

let t: TestIndex;

beforeEach(async () => {
  t = createTestIndex();
  await t.index.addCourse(MCP, MCP_CHUNKS);
});

afterEach(() => {
  t.db.close();
});

describe('CourseSearchTool', () => {
  it('formats hits with headers and records one citation per hit', async () => {
    const tool = new CourseSearchTool(t.index);

    const text = await tool.execute({ query: 'tools', course_name: 'mcp' });

    expect(text).toBe(
      '[Introduction to MCP Servers - Lesson 1]\nprompts and tools\n\n' +
        '[Introduction to MCP Servers - Lesson 0]\nLesson 0 content: tools and resources'
    );
    expect(tool.lastSources).toEqual([
      { label: 'Introduction to MCP Servers - Lesson 1', link: 'https://example.com/mcp' },
      { label: 'Introduction to MCP Servers - Lesson 0', link: 'https://example.com/mcp/0' },
    ]);
  });

  it('uses a course-only header for chunks without a lesson', async () => {
    const tool = new CourseSearchTool(
      readerReturning({
        hits: [{ content: 'unlabeled text', courseTitle: 'Notes', chunkIndex: 0, distance: 0.1 }],
      })
    );

    expect(await tool.execute({ query: 'text' })).toBe('[Notes]\nunlabeled text');
    expect(tool.lastSources).toEqual([{ label: 'Notes', link: 'https://example.com/notes' }]);
  });

  it('says explicitly when nothing matched, naming the filters', async () => {
    const tool = new CourseSearchTool(t.index);

    expect(await tool.execute({ query: 'tools', course_name: 'mcp', lesson_number: 5 })).toBe(
      "No relevant content found in course 'mcp' in lesson 5."
    );
    expect(tool.lastSources).toEqual([]);
  });

  it('says so without filters too', async () => {
    const tool = new CourseSearchTool(readerReturning({ hits: [] }));
    expect(await tool.execute({ query: 'anything' })).toBe('No relevant content found.');
  });

  it('returns the index error verbatim', async () => {
    t.index.clear();
    const tool = new CourseSearchTool(t.index);

    expect(await tool.execute({ query: 'tools', course_name: 'Zzyx' })).toBe(
      "No course found matching 'Zzyx'"
    );
  });

  it('replaces the previous citations on every call', async () => {
    const tool = new CourseSearchTool(t.index);

    await tool.execute({ query: 'tools' });
    expect(tool.lastSources).toHaveLength(2);

    await tool.execute({ query: 'tools', lesson_number: 0 });
    expect(tool.lastSources).toEqual([
      { label: 'Introduction to MCP Servers - Lesson 0', link: 'https://example.com/mcp/0' },
    ]);
  });

  it('explains invalid arguments instead of throwing', async () => {
    const tool = new CourseSearchTool(t.index);

    expect(await tool.execute({})).toBe('Invalid arguments for search_course_content: query: Required');
    expect(await tool.execute({ query: 'x', lesson_number: 1.5 })).toBe(
      'Invalid arguments for search_course_content: lesson_number: Expected integer, received float'
    );
  });

  it('describes its parameters', () => {
    const definition = new CourseSearchTool(t.index).definition();

    expect(definition.name).toBe('search_course_content');
    expect(definition.inputSchema.required).toEqual(['query']);
    expect(Object.keys(definition.inputSchema.properties)).toEqual(['query', 'course_name', 'lesson_number']);
  });
});

describe('CourseOutlineTool', () => {
  it('lists the resolved course and cites it', async () => {
    const tool = new CourseOutlineTool(t.index);

    expect(await tool.execute({ course_name: 'mcp' })).toBe(
      [
        'Course: Introduction to MCP Servers',
        'Link: https://example.com/mcp',
        'Instructor: Ada Example',
        'Lessons (2):',
        'Lesson 0: Setup',
        'Lesson 1: Prompts',
      ].join('\n')
    );
    expect(tool.lastSources).toEqual([
      { label: 'Introduction to MCP Servers', link: 'https://example.com/mcp' },
    ]);
  });

  it('reports an unknown course', async () => {
    t.index.clear();
    const tool = new CourseOutlineTool(t.index);

    expect(await tool.execute({ course_name: 'Zzyx' })).toBe("No course found matching 'Zzyx'");
    expect(tool.lastSources).toEqual([]);
  });
});

describe('ToolRegistry', () => {
  it('offers every tool definition in registration order', () => {
    const registry = createToolRegistry(t.index);

    expect(registry.getDefinitions().map((definition) => definition.name)).toEqual([
      'search_course_content',
      'get_course_outline',
    ]);
  });

  it('throws UnknownToolError for unregistered names', async () => {
    const registry = new ToolRegistry().register(new CourseSearchTool(t.index));

    await expect(registry.execute('get_course_outline', {})).rejects.toThrow(UnknownToolError);
    await expect(registry.execute('delete_everything', {})).rejects.toThrow(
      "Tool 'delete_everything' not found"
    );
  });

  it('yields citations once: get then reset twice gives a list, then nothing', async () => {
    const registry = createToolRegistry(t.index);
    await registry.execute('search_course_content', { query: 'tools' });

    const first = registry.getLastSources();
    registry.resetSources();
    const second = registry.getLastSources();
    registry.resetSources();

    expect(first).toHaveLength(2);
    expect(second).toEqual([]);
  });

  it('keeps the citations of the last tool that produced any', async () => {
    const registry = createToolRegistry(t.index);

    await registry.execute('get_course_outline', { course_name: 'mcp' });
    await registry.execute('search_course_content', { query: 'tools', lesson_number: 0 });

    expect(registry.getLastSources()).toEqual([
      { label: 'Introduction to MCP Servers - Lesson 0', link: 'https://example.com/mcp/0' },
    ]);
  });
});

describe('isToolName', () => {
  it('recognises only registered tool names', () => {
    expect(isToolName('search_course_content')).toBe(true);
    expect(isToolName('get_course_outline')).toBe(true);
    expect(isToolName('search')).toBe(false);
  });
});
