/**
 * Chunker
 *
 * Turns a course document into a Course record and its ordered chunks:
 * 1. parseCourseDocument → metadata + per-lesson text
 * 2. normalizeWhitespace + splitSentences per lesson
 * 3. chunkSentences → overlapping, size-bounded chunks
 */

import { lessonPrefix, resolveChunkOptions } from './config.js';
import { parseCourseDocument } from './metadata.js';
import { normalizeWhitespace, splitSentences } from './sentences.js';
import type { ChunkedCourse, ChunkOptions, CourseChunk } from './types.js';

/**
 * Pack sentences into chunks of at most `chunkSize` characters.
 *
 * Each chunk after the first starts with the longest run of trailing
 * sentences of its predecessor whose joined length fits in `chunkOverlap`.
 * The overlap is dropped at a boundary where it would leave no room for the
 * next sentence. A sentence longer than `chunkSize` becomes a chunk of its
 * own. `prefix` is prepended to the first chunk and counts against its size;
 * it is left out when it does not fit beside the first sentence.
 */
export function chunkSentences(
  sentences: readonly string[],
  options: ChunkOptions,
  prefix = ''
): string[] {
  const { chunkSize, chunkOverlap } = options;
  const chunks: string[] = [];
  let i = 0;

  while (i < sentences.length) {
    const first = sentences[i] ?? '';
    const head = chunks.length === 0 && prefix.length + first.length <= chunkSize ? prefix : '';
    const current: string[] = [];
    let size = head.length;

    for (let j = i; j < sentences.length; j++) {
      const sentence = sentences[j] ?? '';
      const addition = sentence.length + (current.length > 0 ? 1 : 0);
      if (current.length > 0 && size + addition > chunkSize) break;
      current.push(sentence);
      size += addition;
    }

    chunks.push(head + current.join(' '));

    const next = i + current.length;
    if (next >= sentences.length) break;

    let overlapSize = 0;
    let overlapCount = 0;
    for (let k = current.length - 1; k >= 0; k--) {
      const length = (current[k] ?? '').length + (k < current.length - 1 ? 1 : 0);
      if (overlapSize + length > chunkOverlap) break;
      overlapSize += length;
      overlapCount++;
    }

    const upcoming = (sentences[next] ?? '').length;
    if (overlapCount > 0 && overlapSize + 1 + upcoming > chunkSize) {
      overlapCount = 0;
    }

    i = Math.max(next - overlapCount, i + 1);
  }

  return chunks;
}

/**
 * Parse and chunk one course document.
 *
 * @param source - Label used in parse errors (usually the file path)
 * @throws DocumentParseError for documents without a course title
 * @throws ValidationError for invalid options
 *
 * @example
 * ```ts
 * const { course, chunks } = chunkCourseDocument(text, { chunkSize: 800, chunkOverlap: 100 });
 * ```
 */
export function chunkCourseDocument(
  text: string,
  options: Partial<ChunkOptions> = {},
  source?: string
): ChunkedCourse {
  const resolved = resolveChunkOptions(options);
  const { course, sections } = parseCourseDocument(text, source);
  const chunks: CourseChunk[] = [];

  for (const section of sections) {
    const sentences = splitSentences(normalizeWhitespace(section.body));
    const prefix = section.lessonNumber === undefined ? '' : lessonPrefix(section.lessonNumber);

    for (const content of chunkSentences(sentences, resolved, prefix)) {
      const chunk: CourseChunk = { content, courseTitle: course.title, chunkIndex: chunks.length };
      if (section.lessonNumber !== undefined) chunk.lessonNumber = section.lessonNumber;
      chunks.push(chunk);
    }
  }

  return { course, chunks };
}
