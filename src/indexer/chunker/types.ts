/**
 * Chunker Types
 *
 * The course data model produced by parsing a course document.
 */

/**
 * One lesson of a course. `lessonNumber` is unique within its course.
 */
export interface Lesson {
  lessonNumber: number;
  title: string;
  lessonLink?: string;
}

/**
 * A course parsed from one document. The title is the unique key.
 */
export interface Course {
  title: string;
  courseLink?: string;
  instructor?: string;
  lessons: Lesson[];
}

/**
 * A bounded span of course text; the unit of retrieval.
 */
export interface CourseChunk {
  content: string;
  courseTitle: string;
  /** Absent when the document has no lesson markers */
  lessonNumber?: number;
  /** Sequential per course, starting at 0, in document order */
  chunkIndex: number;
}

/**
 * Raw text belonging to one lesson (or the whole body when unlabeled).
 */
export interface LessonSection {
  lessonNumber?: number;
  body: string;
}

/**
 * Result of parsing metadata and lesson markers, before chunking.
 */
export interface ParsedCourseDocument {
  course: Course;
  sections: LessonSection[];
}

/**
 * Sizes are in characters.
 */
export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface ChunkedCourse {
  course: Course;
  chunks: CourseChunk[];
}
