/**
 * Course Vector Index
 *
 * Two collections over one embedding space:
 * - course_catalog: one record per course, embedded from the title, used to
 *   resolve fuzzy course names
 * - course_content: one record per chunk, filtered by course and lesson
 */

import { z } from 'zod';

import type { Metadata } from '../database/index.js';
import { DatabaseError } from '../errors/index.js';
import type { Course, CourseChunk, Lesson } from '../indexer/chunker/types.js';
import type { CourseSink } from '../indexer/types.js';
import { consoleLogger, parseJsonWithSchema, type Logger } from '../utils/index.js';
import type {
  CourseIndexOptions,
  CourseSearchRequest,
  SearchHit,
  SearchResults,
  VectorStore,
  VectorStoreRecord,
} from './types.js';

export const CATALOG_COLLECTION = 'course_catalog';
export const CONTENT_COLLECTION = 'course_content';

const DEFAULT_MAX_RESULTS = 5;

// ============================================================================
// Stored Metadata
// ============================================================================

const LessonListSchema = z.array(
  z.object({
    lessonNumber: z.number().int().nonnegative(),
    title: z.string(),
    lessonLink: z.string().optional(),
  })
);

const CatalogMetadataSchema = z.object({
  title: z.string(),
  instructor: z.string().optional(),
  course_link: z.string().optional(),
  lesson_count: z.number().int().nonnegative(),
  lessons_json: z.string(),
});

const ContentMetadataSchema = z.object({
  course_title: z.string(),
  lesson_number: z.number().int().nonnegative().optional(),
  chunk_index: z.number().int().nonnegative(),
});

function catalogRecord(course: Course): VectorStoreRecord {
  const metadata: Metadata = {
    title: course.title,
    lesson_count: course.lessons.length,
    lessons_json: JSON.stringify(course.lessons),
  };
  if (course.instructor !== undefined) metadata.instructor = course.instructor;
  if (course.courseLink !== undefined) metadata.course_link = course.courseLink;

  return { id: course.title, document: course.title, metadata };
}

function contentRecord(chunk: CourseChunk): VectorStoreRecord {
  const metadata: Metadata = {
    course_title: chunk.courseTitle,
    chunk_index: chunk.chunkIndex,
  };
  if (chunk.lessonNumber !== undefined) metadata.lesson_number = chunk.lessonNumber;

  return { id: `${chunk.courseTitle}_${chunk.chunkIndex}`, document: chunk.content, metadata };
}

// ============================================================================
// Index
// ============================================================================

/**
 * Course-aware retrieval over a VectorStore.
 *
 * @example
 * ```typescript
 * const index = new CourseVectorIndex(new SqliteVectorStore(embedder), { maxResults: 5 });
 * await index.addCourse(course, chunks);
 * const { hits, error } = await index.search({ query: 'tool use', courseName: 'MCP' });
 * ```
 */
export class CourseVectorIndex implements CourseSink {
  private readonly maxResults: number;

  constructor(
    private readonly store: VectorStore,
    options: CourseIndexOptions = {},
    private readonly logger: Logger = consoleLogger
  ) {
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  }

  /**
   * Nearest catalog title to a partial or misspelled course name.
   * There is no distance threshold: any non-empty catalog yields a title.
   */
  async resolveCourseName(name: string): Promise<string | undefined> {
    const [best] = await this.store.query(CATALOG_COLLECTION, name, { limit: 1 });
    return best?.id;
  }

  /**
   * Search chunk content, optionally within one course and lesson.
   * An unresolved course name comes back as `error` with no hits.
   *
   * @throws EmbeddingError when the query cannot be embedded
   * @throws DatabaseError for unreadable content metadata or SQLite failures
   */
  async search(request: CourseSearchRequest): Promise<SearchResults> {
    const where: Metadata = {};

    if (request.courseName !== undefined) {
      const title = await this.resolveCourseName(request.courseName);
      if (title === undefined) {
        return { hits: [], error: `No course found matching '${request.courseName}'` };
      }
      where.course_title = title;
    }
    if (request.lessonNumber !== undefined) {
      where.lesson_number = request.lessonNumber;
    }

    const matches = await this.store.query(CONTENT_COLLECTION, request.query, {
      where,
      limit: request.limit ?? this.maxResults,
    });

    const hits: SearchHit[] = matches.map((match) => {
      const parsed = ContentMetadataSchema.safeParse(match.metadata);
      if (!parsed.success) {
        throw new DatabaseError(`Corrupted metadata for chunk '${match.id}'`, parsed.error);
      }
      return {
        content: match.document,
        courseTitle: parsed.data.course_title,
        lessonNumber: parsed.data.lesson_number,
        chunkIndex: parsed.data.chunk_index,
        distance: match.distance,
      };
    });
    return { hits };
  }

  /**
   * Add a course and its chunks unless the title is already indexed.
   * Content is written before the catalog entry, so a course whose chunks
   * failed to embed is retried on the next ingestion.
   */
  async addCourse(course: Course, chunks: CourseChunk[]): Promise<{ added: boolean }> {
    if (this.store.get(CATALOG_COLLECTION, course.title)) {
      return { added: false };
    }

    await this.store.upsert(CONTENT_COLLECTION, chunks.map(contentRecord));
    await this.store.upsert(CATALOG_COLLECTION, [catalogRecord(course)]);
    return { added: true };
  }

  getCourse(title: string): Course | undefined {
    const record = this.store.get(CATALOG_COLLECTION, title);
    if (!record) return undefined;

    const parsed = CatalogMetadataSchema.safeParse(record.metadata);
    if (!parsed.success) {
      this.logger.warn(`Corrupted catalog entry for '${title}'`);
      return { title, lessons: [] };
    }

    const metadata = parsed.data;
    const lessons: Lesson[] = parseJsonWithSchema(
      metadata.lessons_json,
      LessonListSchema,
      [],
      (error) => this.logger.warn(`Corrupted lesson list for '${title}': ${error.message}`)
    );

    return {
      title: metadata.title,
      courseLink: metadata.course_link,
      instructor: metadata.instructor,
      lessons,
    };
  }

  getCourseLink(title: string): string | undefined {
    return this.getCourse(title)?.courseLink;
  }

  getLessonLink(title: string, lessonNumber: number): string | undefined {
    return this.getCourse(title)?.lessons.find((lesson) => lesson.lessonNumber === lessonNumber)
      ?.lessonLink;
  }

  /** Titles in ingestion order */
  getCourseTitles(): string[] {
    return this.store.ids(CATALOG_COLLECTION);
  }

  getCourseCount(): number {
    return this.store.count(CATALOG_COLLECTION);
  }

  getChunkCount(): number {
    return this.store.count(CONTENT_COLLECTION);
  }

  clear(): void {
    this.store.clear(CATALOG_COLLECTION);
    this.store.clear(CONTENT_COLLECTION);
  }
}
