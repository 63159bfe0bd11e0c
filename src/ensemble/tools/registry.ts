import { EnsembleError } from "../errors.js";
import type { Tool } from "./tool.js";

/**
 * Explicit name -> tool registry. Callers own their instances; there is no
 * process-wide registry.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  constructor(tools: Iterable<Tool> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: Tool, options?: { replace?: boolean }): this {
    const existing = this.tools.get(tool.name);
    if (existing && existing !== tool && !options?.replace) {
      throw new EnsembleError("CONFIG_ERROR", `Tool '${tool.name}' is already registered`, { tool: tool.name });
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): Tool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new EnsembleError("CONFIG_ERROR", `Unknown tool '${name}'`, { tool: name, known: this.names() });
    }
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  pick(names: readonly string[]): Tool[] {
    return names.map((name) => this.get(name));
  }

  get size(): number {
    return this.tools.size;
  }
}
