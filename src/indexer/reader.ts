/**
 * Course File Reader
 *
 * Decodes course documents as UTF-8 without failing on the odd bad byte:
 * invalid sequences become U+FFFD and the file is only rejected when too
 * many of its characters are replacements.
 */

import { readFile } from 'node:fs/promises';
import { DocumentDecodeError } from '../errors/index.js';
import type { ReadOptions } from './types.js';

const DEFAULT_MAX_INVALID_RATIO = 0.1;

/**
 * Decode bytes leniently. The BOM, if any, is dropped.
 *
 * @returns The text and the share of characters that were undecodable
 */
export function decodeText(bytes: Uint8Array): { text: string; invalidRatio: number } {
  const text = new TextDecoder('utf-8', { fatal: false }).decode(bytes);
  if (text.length === 0) {
    return { text, invalidRatio: 0 };
  }

  const invalid = text.split('\uFFFD').length - 1;
  return { text, invalidRatio: invalid / text.length };
}

/**
 * Read one course document.
 *
 * @throws DocumentDecodeError when more than `maxInvalidRatio` of the
 *   characters could not be decoded
 */
export async function readCourseFile(path: string, options: ReadOptions = {}): Promise<string> {
  const maxInvalidRatio = options.maxInvalidRatio ?? DEFAULT_MAX_INVALID_RATIO;
  const { text, invalidRatio } = decodeText(await readFile(path));

  if (invalidRatio > maxInvalidRatio) {
    throw new DocumentDecodeError(path, invalidRatio);
  }
  return text;
}
