/**
 * Chunker Module
 *
 * Course document parsing and sentence-aware chunking.
 *
 * Usage:
 * ```typescript
 * import { chunkCourseDocument } from './chunker/index.js';
 *
 * const { course, chunks } = chunkCourseDocument(text, { chunkSize: 800, chunkOverlap: 100 });
 * ```
 */

export { chunkCourseDocument, chunkSentences } from './chunker.js';
export { parseCourseDocument } from './metadata.js';
export { normalizeWhitespace, splitSentences, isAbbreviation } from './sentences.js';
export {
  DEFAULT_CHUNK_OPTIONS,
  ChunkOptionsSchema,
  resolveChunkOptions,
  lessonPrefix,
} from './config.js';

export type {
  Course,
  Lesson,
  CourseChunk,
  LessonSection,
  ParsedCourseDocument,
  ChunkOptions,
  ChunkedCourse,
} from './types.js';
