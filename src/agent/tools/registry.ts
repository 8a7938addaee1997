/**
 * Tool Registry
 *
 * Dispatches model tool calls by name and hands out the citations of the
 * last tool that produced any. The orchestrator reads citations once per
 * query and then resets them, so nothing leaks into the next query.
 */

import { UnknownToolError } from '../../errors/index.js';
import type { ToolDefinition } from '../../providers/index.js';
import type { SourceCitation } from '../types.js';
import { CourseOutlineTool } from './outline-tool.js';
import { CourseSearchTool } from './search-tool.js';
import { isToolName, type AgentTool, type CourseIndexReader, type ToolName } from './types.js';

export class ToolRegistry {
  private readonly tools = new Map<ToolName, AgentTool>();
  private lastSourceTool: ToolName | undefined;

  register(tool: AgentTool): this {
    this.tools.set(tool.name, tool);
    return this;
  }

  get names(): ToolName[] {
    return [...this.tools.keys()];
  }

  /** Definitions of every registered tool, in registration order */
  getDefinitions(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition());
  }

  /**
   * @throws UnknownToolError when no tool with that name is registered
   */
  async execute(name: string, args: unknown): Promise<string> {
    const tool = isToolName(name) ? this.tools.get(name) : undefined;
    if (!tool) {
      throw new UnknownToolError(name, this.names);
    }

    const text = await tool.execute(args);
    if (tool.lastSources.length > 0) {
      this.lastSourceTool = tool.name;
    }
    return text;
  }

  getLastSources(): SourceCitation[] {
    if (this.lastSourceTool === undefined) return [];
    return [...(this.tools.get(this.lastSourceTool)?.lastSources ?? [])];
  }

  resetSources(): void {
    for (const tool of this.tools.values()) {
      tool.resetSources();
    }
    this.lastSourceTool = undefined;
  }
}

/**
 * Registry with the search and outline tools.
 */
export function createToolRegistry(index: CourseIndexReader): ToolRegistry {
  return new ToolRegistry().register(new CourseSearchTool(index)).register(new CourseOutlineTool(index));
}
