/**
 * Logger Interface for Library Code
 *
 * Library code (indexer, search, agent) accepts a Logger via dependency
 * injection. The CLI passes its CommandContext, which satisfies this
 * interface; tests pass silentLogger or a vi.fn() based logger.
 */

export interface Logger {
  /** Something was skipped or degraded but the operation continues */
  warn: (message: string) => void;
  /** Diagnostic detail, only shown with --verbose (optional) */
  debug?: (message: string) => void;
}

/**
 * Default logger when none is injected.
 * Debug output is off unless COURSE_RAG_DEBUG is set.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => {
    if (process.env['COURSE_RAG_DEBUG']) {
      console.log(message);
    }
  },
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};

/**
 * Prefix every message of a logger with a component tag, e.g. "[VectorIndex]".
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  return {
    warn: (message: string) => logger.warn(`[${scope}] ${message}`),
    debug: (message: string) => logger.debug?.(`[${scope}] ${message}`),
  };
}
