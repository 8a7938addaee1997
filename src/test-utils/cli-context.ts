/**
 * Command context that records output instead of printing it.
 */

import type { CommandContext, GlobalOptions } from '../cli/types.js';

export interface RecordingContext {
  ctx: CommandContext;
  logs: string[];
  debugs: string[];
  warnings: string[];
  errors: string[];
  /** Values passed to ctx.json */
  json: unknown[];
}

export function createRecordingContext(options: Partial<GlobalOptions> = {}): RecordingContext {
  const recorded: Omit<RecordingContext, 'ctx'> = {
    logs: [],
    debugs: [],
    warnings: [],
    errors: [],
    json: [],
  };
  const ctx: CommandContext = {
    options: { verbose: false, json: false, ...options },
    log: (message) => recorded.logs.push(message),
    debug: (message) => recorded.debugs.push(message),
    warn: (message) => recorded.warnings.push(message),
    error: (message) => recorded.errors.push(message),
    json: (value) => recorded.json.push(value),
  };
  return { ctx, ...recorded };
}
