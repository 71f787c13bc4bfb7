/**
 * Tool Registry: register tools by name, list them for the prompt, execute by name.
 */

import type { Tool, ToolInput, ToolRegistry } from "./types.js";

export function createToolRegistry(initial: Tool[] = []): ToolRegistry {
  const tools = new Map<string, Tool>();

  const registry: ToolRegistry = {
    register(tool: Tool): void {
      if (!tool.name.trim()) {
        throw new Error("Tool name is required");
      }
      tools.set(tool.name, tool);
    },

    get(name: string): Tool | undefined {
      return tools.get(name);
    },

    resolve(name: string): Tool | undefined {
      const wanted = name.trim().toLowerCase();
      return (
        tools.get(name) ??
        Array.from(tools.values()).find((t) => t.name.toLowerCase() === wanted)
      );
    },

    list(): Tool[] {
      return Array.from(tools.values());
    },

    execute(name: string, input: ToolInput): Promise<string> {
      const tool = tools.get(name);
      if (!tool) {
        return Promise.reject(new Error(`Tool not found: ${name}`));
      }
      return tool.execute(input);
    },
  };

  for (const tool of initial) {
    registry.register(tool);
  }
  return registry;
}
