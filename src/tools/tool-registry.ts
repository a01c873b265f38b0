/**
 * Tool registry
 * Holds the invocable tools by name; invocation never throws
 */

import { JsonObject } from '../types/json';
import { Tool, ToolCatalog, ToolDefinition, ToolResult } from '../types/tool';

export class ToolRegistry implements ToolCatalog {
  private readonly tools: Map<string, Tool> = new Map();

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  registerMany(tools: readonly Tool[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Definitions to advertise to the model; unknown names are skipped
   */
  definitions(names?: readonly string[]): ToolDefinition[] {
    const selected = names ?? this.names();
    const definitions: ToolDefinition[] = [];
    for (const name of selected) {
      const tool = this.tools.get(name);
      if (tool) {
        definitions.push({ name: tool.name, description: tool.description, parameters: tool.parameters });
      }
    }
    return definitions;
  }

  async invoke(name: string, params: JsonObject, signal?: AbortSignal): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { success: false, error: `Tool "${name}" not found` };
    }

    try {
      return await tool.execute(params, signal);
    } catch (error) {
      return { success: false, error: error instanceof Error ? error.message : String(error) };
    }
  }
}

export function createToolRegistry(tools: readonly Tool[] = []): ToolRegistry {
  const registry = new ToolRegistry();
  registry.registerMany(tools);
  return registry;
}
