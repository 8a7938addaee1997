/**
 * Course File Scanner
 *
 * Discovers course documents under a folder using fast-glob.
 */

import { statSync } from 'node:fs';
import { basename, relative, resolve } from 'node:path';
import fg from 'fast-glob';

import { FileNotFoundError } from '../errors/index.js';
import { DEFAULT_COURSE_EXTENSIONS, type CourseFile, type ScanOptions } from './types.js';

/**
 * Build the glob for a set of extensions.
 * A one-element brace group is not expanded by fast-glob, so it is avoided.
 */
export function buildGlobPattern(extensions: readonly string[]): string {
  const names = extensions.map((ext) => ext.replace(/^\./, ''));
  return names.length === 1 ? `**/*.${names[0]}` : `**/*.{${names.join(',')}}`;
}

/**
 * Find course documents under `folder`, sorted by path.
 * A path to a single file yields just that file.
 *
 * @throws FileNotFoundError if the path does not exist
 *
 * @example
 * ```ts
 * const files = await scanCourseFiles('./docs');
 * console.log(files.map((file) => file.relativePath));
 * ```
 */
export async function scanCourseFiles(
  folder: string,
  options: ScanOptions = {}
): Promise<CourseFile[]> {
  const absoluteRoot = resolve(folder);

  let isFile: boolean;
  try {
    isFile = statSync(absoluteRoot).isFile();
  } catch {
    throw new FileNotFoundError(absoluteRoot);
  }

  if (isFile) {
    return [
      {
        path: absoluteRoot,
        relativePath: basename(absoluteRoot),
        size: statSync(absoluteRoot).size,
      },
    ];
  }

  const entries = await fg(buildGlobPattern(options.extensions ?? DEFAULT_COURSE_EXTENSIONS), {
    cwd: absoluteRoot,
    absolute: true,
    dot: false,
    onlyFiles: true,
    caseSensitiveMatch: false,
    suppressErrors: true,
    stats: true,
  });

  return entries
    .map((entry) => ({
      path: entry.path,
      relativePath: relative(absoluteRoot, entry.path),
      size: entry.stats?.size ?? 0,
    }))
    .sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
}
