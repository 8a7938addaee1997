/**
 * Agent Tools
 *
 * Tools the language model may call while answering a query.
 */

export { ToolRegistry, createToolRegistry } from './registry.js';
export { CourseSearchTool, citationLabel } from './search-tool.js';
export type { SearchArgs } from './search-tool.js';
export { CourseOutlineTool, formatOutline } from './outline-tool.js';
export { TOOL_NAMES, isToolName } from './types.js';
export type { AgentTool, CourseIndexReader, ToolName } from './types.js';
