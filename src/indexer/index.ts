/**
 * Indexer Module
 *
 * Turns a folder of course documents into indexed courses.
 *
 * @example
 * ```ts
 * import { ingestCourseFolder } from './indexer/index.js';
 *
 * const report = await ingestCourseFolder('./docs', courseIndex, { clearExisting: true });
 * console.log(`Added ${report.coursesAdded} courses`);
 * ```
 */

export { scanCourseFiles, buildGlobPattern } from './scanner.js';
export { readCourseFile, decodeText } from './reader.js';
export { ingestCourseFolder } from './pipeline.js';
export { DEFAULT_COURSE_EXTENSIONS } from './types.js';
export type {
  CourseFile,
  CourseSink,
  FileProgress,
  FileStatus,
  IngestOptions,
  IngestionReport,
  ReadOptions,
  ScanOptions,
} from './types.js';

export * from './chunker/index.js';
export * from './embedder/index.js';
