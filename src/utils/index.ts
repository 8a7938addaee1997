/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { parseJsonWithSchema } from './json.js';
export { consoleLogger, silentLogger, scopedLogger, type Logger } from './logger.js';
export { formatTable, type Alignment, type Column, type Row } from './table.js';
