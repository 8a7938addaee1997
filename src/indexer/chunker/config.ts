/**
 * Chunker Configuration
 */

import { z } from 'zod';
import { ValidationError } from '../../errors/index.js';
import type { ChunkOptions } from './types.js';

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: 800,
  chunkOverlap: 100,
};

export const ChunkOptionsSchema = z
  .object({
    chunkSize: z.number().int().positive(),
    chunkOverlap: z.number().int().nonnegative(),
  })
  .refine((options) => options.chunkOverlap < options.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

/**
 * Fill in defaults and validate.
 *
 * @throws ValidationError when a size is not a positive integer or the
 *   overlap is not smaller than the chunk size
 */
export function resolveChunkOptions(options: Partial<ChunkOptions> = {}): ChunkOptions {
  const result = ChunkOptionsSchema.safeParse({ ...DEFAULT_CHUNK_OPTIONS, ...options });
  if (!result.success) {
    throw new ValidationError(
      'Invalid chunking options',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Marker placed before the first chunk of every lesson.
 */
export function lessonPrefix(lessonNumber: number): string {
  return `Lesson ${lessonNumber} content: `;
}
