/**
 * Course Document Parsing
 *
 * Course documents are plain text:
 *
 * ```
 * Course Title: Intro to Retrieval
 * Course Link: https://example.com/intro
 * Course Instructor: Ada
 *
 * Lesson 0: Basics
 * Lesson Link: https://example.com/intro/0
 * Lesson text...
 * ```
 */

import { DocumentParseError } from '../../errors/index.js';
import type { Course, Lesson, LessonSection, ParsedCourseDocument } from './types.js';

/** How many non-empty lines may carry course metadata */
const METADATA_LINES = 4;

const COURSE_TITLE = /^course title:\s*(.*)$/i;
const COURSE_LINK = /^course link:\s*(.*)$/i;
const COURSE_INSTRUCTOR = /^course instructor:\s*(.*)$/i;
const LESSON_MARKER = /^lesson\s+(\d+)\s*:\s*(.*)$/i;
const LESSON_LINK = /^lesson link:\s*(.*)$/i;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Split a course document into course metadata and per-lesson text.
 *
 * @param source - Label used in error messages (usually the file path)
 * @throws DocumentParseError when no course title is present or a lesson
 *   number repeats
 */
export function parseCourseDocument(text: string, source = '<document>'): ParsedCourseDocument {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  let title: string | undefined;
  let courseLink: string | undefined;
  let instructor: string | undefined;
  let bodyStart = 0;
  let seen = 0;

  for (let i = 0; i < lines.length && seen < METADATA_LINES; i++) {
    const line = (lines[i] ?? '').trim();
    if (line === '') continue;
    seen++;

    const titleMatch = COURSE_TITLE.exec(line);
    const linkMatch = COURSE_LINK.exec(line);
    const instructorMatch = COURSE_INSTRUCTOR.exec(line);

    if (titleMatch) {
      title = nonEmpty(titleMatch[1]);
    } else if (linkMatch) {
      courseLink = nonEmpty(linkMatch[1]);
    } else if (instructorMatch) {
      instructor = nonEmpty(instructorMatch[1]);
    } else {
      continue;
    }
    bodyStart = i + 1;
  }

  if (title === undefined) {
    throw new DocumentParseError(source, 'missing "Course Title:" line');
  }

  const lessons: Lesson[] = [];
  const sections: LessonSection[] = [];
  const preamble: string[] = [];
  let current: { lesson: Lesson; lines: string[] } | undefined;

  const closeLesson = (): void => {
    if (current) {
      sections.push({ lessonNumber: current.lesson.lessonNumber, body: current.lines.join('\n') });
    }
  };

  for (let i = bodyStart; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const marker = LESSON_MARKER.exec(line.trim());

    if (!marker) {
      (current ? current.lines : preamble).push(line);
      continue;
    }

    const lessonNumber = Number(marker[1]);
    if (lessons.some((lesson) => lesson.lessonNumber === lessonNumber)) {
      throw new DocumentParseError(source, `lesson ${lessonNumber} appears more than once`);
    }

    closeLesson();
    const lesson: Lesson = { lessonNumber, title: (marker[2] ?? '').trim() };

    // A link line may follow the marker, after optional blank lines
    let next = i + 1;
    while (next < lines.length && (lines[next] ?? '').trim() === '') next++;
    const link = LESSON_LINK.exec((lines[next] ?? '').trim());
    if (link) {
      const lessonLink = nonEmpty(link[1]);
      if (lessonLink !== undefined) lesson.lessonLink = lessonLink;
      i = next;
    }

    lessons.push(lesson);
    current = { lesson, lines: [] };
  }
  closeLesson();

  // Without markers the whole body is one unlabeled unit
  if (lessons.length === 0) {
    sections.push({ body: preamble.join('\n') });
  }

  const course: Course = { title, lessons };
  if (courseLink !== undefined) course.courseLink = courseLink;
  if (instructor !== undefined) course.instructor = instructor;

  return { course, sections };
}
