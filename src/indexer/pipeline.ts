/**
 * Ingestion Pipeline
 *
 * Orchestrates folder ingestion:
 * Scan → Read → Parse/Chunk → Embed + Store (via the course index)
 *
 * Document problems (undecodable bytes, missing title, bad lesson numbers)
 * fail only that file; the rest of the folder is still ingested. Service
 * problems (embedding server down, database errors, missing keys) abort the run.
 */

import { chunkCourseDocument, resolveChunkOptions } from './chunker/index.js';
import { readCourseFile } from './reader.js';
import { scanCourseFiles } from './scanner.js';
import type { CourseSink, FileStatus, IngestOptions, IngestionReport } from './types.js';
import { APIKeyError, DatabaseError, EmbeddingError } from '../errors/index.js';
import { consoleLogger, scopedLogger } from '../utils/index.js';

function isServiceError(error: unknown): boolean {
  return (
    error instanceof EmbeddingError ||
    error instanceof DatabaseError ||
    error instanceof APIKeyError
  );
}

/**
 * Ingest every course document under `folder` into `index`.
 *
 * Courses whose title is already indexed are skipped, so running the same
 * folder twice leaves the index unchanged.
 *
 * @throws FileNotFoundError if the folder does not exist
 * @throws ValidationError for invalid chunking options
 *
 * @example
 * ```typescript
 * const report = await ingestCourseFolder('./docs', index, {
 *   onFile: ({ file, status }) => console.log(status, file.relativePath),
 * });
 * console.log(`${report.coursesAdded} courses, ${report.chunksAdded} chunks`);
 * ```
 */
export async function ingestCourseFolder(
  folder: string,
  index: CourseSink,
  options: IngestOptions = {}
): Promise<IngestionReport> {
  const log = scopedLogger(options.logger ?? consoleLogger, 'ingest');
  const chunking = resolveChunkOptions(options.chunking);
  const files = await scanCourseFiles(folder, { extensions: options.extensions });

  const report: IngestionReport = {
    coursesAdded: 0,
    chunksAdded: 0,
    skipped: [],
    failures: [],
  };

  if (options.clearExisting) {
    index.clear();
    log.debug?.('Cleared existing courses');
  }

  log.debug?.(`Found ${files.length} course file(s) in ${folder}`);

  for (const [i, file] of files.entries()) {
    let status: FileStatus;

    try {
      const text = await readCourseFile(file.path, { maxInvalidRatio: options.maxInvalidRatio });
      const { course, chunks } = chunkCourseDocument(text, chunking, file.relativePath);
      const { added } = await index.addCourse(course, chunks);

      if (added) {
        report.coursesAdded++;
        report.chunksAdded += chunks.length;
        status = 'added';
        log.debug?.(`Added "${course.title}" (${chunks.length} chunks) from ${file.relativePath}`);
      } else {
        report.skipped.push(course.title);
        status = 'skipped';
        log.debug?.(`Course "${course.title}" is already indexed, skipping ${file.relativePath}`);
      }
    } catch (error) {
      if (isServiceError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      report.failures.push({ filePath: file.relativePath, error: message });
      status = 'failed';
      log.warn(`Failed to ingest ${file.relativePath}: ${message}`);
    }

    options.onFile?.({ file, status, current: i + 1, total: files.length });
  }

  return report;
}
