/**
 * Agent Tool Types
 *
 * Tools form a closed set keyed by name. The model only ever sees a
 * tool's definition; arguments come back as untrusted JSON.
 */

import type { ToolDefinition } from '../../providers/index.js';
import type { CourseVectorIndex } from '../../search/index.js';
import type { SourceCitation } from '../types.js';

export const TOOL_NAMES = ['search_course_content', 'get_course_outline'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((toolName) => toolName === name);
}

/**
 * A capability the model can invoke.
 *
 * Each tool keeps the citations of its most recent execution only;
 * a new execution replaces them.
 */
export interface AgentTool<N extends ToolName = ToolName> {
  readonly name: N;
  definition(): ToolDefinition;
  /** Text for the model. Bad arguments yield an explanatory text, not a throw. */
  execute(args: unknown): Promise<string>;
  readonly lastSources: readonly SourceCitation[];
  resetSources(): void;
}

/**
 * The index operations tools read from.
 */
export type CourseIndexReader = Pick<
  CourseVectorIndex,
  'search' | 'resolveCourseName' | 'getCourse' | 'getCourseLink' | 'getLessonLink'
>;
