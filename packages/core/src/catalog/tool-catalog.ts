import type { Tool, ToolDefinition } from "../interfaces/tool.js";

/**
 * ToolCatalog maps tool names to executable tools and exposes their
 * declarations for the model. Names must be unique.
 */
export class ToolCatalog {
  private readonly tools: Map<string, Tool> = new Map();

  constructor(tools: Iterable<Tool> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: Tool): void {
    const { name } = tool.definition;
    if (this.tools.has(name)) {
      throw new Error(`Duplicate tool name "${name}": already registered.`);
    }
    this.tools.set(name, tool);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /** Declarations in registration order. */
  definitions(): ToolDefinition[] {
    return Array.from(this.tools.values(), (t) => t.definition);
  }

  get size(): number {
    return this.tools.size;
  }
}
