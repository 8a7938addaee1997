/**
 * Indexer Types
 *
 * Shapes shared by the scanner, reader and ingestion pipeline.
 */

import type { Logger } from '../utils/index.js';
import type { ChunkOptions, Course, CourseChunk } from './chunker/types.js';

/** File extensions treated as course documents by default */
export const DEFAULT_COURSE_EXTENSIONS: readonly string[] = ['.txt', '.md'];

/**
 * A course document discovered on disk.
 */
export interface CourseFile {
  /** Absolute path */
  path: string;

  /** Path relative to the scanned folder (used in messages) */
  relativePath: string;

  /** File size in bytes */
  size: number;
}

export interface ScanOptions {
  /** Extensions with leading dot, matched case-insensitively */
  extensions?: readonly string[];
}

export interface ReadOptions {
  /**
   * Largest tolerated share of undecodable characters (0-1).
   * @default 0.1
   */
  maxInvalidRatio?: number;
}

/**
 * Where ingested courses go. Implemented by CourseVectorIndex.
 */
export interface CourseSink {
  addCourse(course: Course, chunks: CourseChunk[]): Promise<{ added: boolean }>;
  clear(): void;
}

export type FileStatus = 'added' | 'skipped' | 'failed';

export interface FileProgress {
  file: CourseFile;
  status: FileStatus;
  /** 1-based position in the run */
  current: number;
  total: number;
}

export interface IngestOptions extends ScanOptions, ReadOptions {
  /** Chunk size/overlap overrides */
  chunking?: Partial<ChunkOptions>;

  /** Wipe the index before ingesting */
  clearExisting?: boolean;

  logger?: Logger;

  /** Fired once per file, after it was handled */
  onFile?: (progress: FileProgress) => void;
}

/**
 * Outcome of one folder ingestion.
 */
export interface IngestionReport {
  coursesAdded: number;
  chunksAdded: number;
  /** Titles already present in the index */
  skipped: string[];
  failures: Array<{ filePath: string; error: string }>;
}
