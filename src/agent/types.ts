/**
 * Agent Types
 *
 * Shapes of the query surface and the orchestrator's state machine.
 */

/**
 * Provenance of a retrieved passage, shown under an answer.
 */
export interface SourceCitation {
  /** "<Course> - Lesson <N>", or "<Course>" when the chunk has no lesson */
  label: string;
  /** Lesson link when known, otherwise the course link */
  link?: string;
}

/**
 * One question and the answer given to it.
 */
export interface Exchange {
  query: string;
  answer: string;
}

export interface QueryRequest {
  query: string;
  /** A new session is created when absent */
  sessionId?: string;
}

export interface QueryResponse {
  answer: string;
  sources: SourceCitation[];
  sessionId: string;
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * init → decide → (done | execute → finalize → done), or failed.
 */
export type OrchestratorState = 'init' | 'decide' | 'execute' | 'finalize' | 'done' | 'failed';

export interface QueryOutcome {
  answer: string;
  sources: SourceCitation[];
  /** 'failed' when the query was aborted with the generic answer */
  status: 'done' | 'failed';
  /** Every state the query passed through, in order */
  states: OrchestratorState[];
}
