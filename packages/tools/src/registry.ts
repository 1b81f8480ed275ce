import type { ArgumentMapping, ToolDescription } from "@salvage/types";
import { AgentError } from "@salvage/core";
import type { Tool } from "./tool.js";

/**
 * Name → tool lookup used by the agent loop.
 *
 * Dispatch goes through `invoke`, which validates the argument mapping
 * against the tool's schema before the handler runs.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  constructor(tools: Iterable<Tool> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: Tool): this {
    if (this.tools.has(tool.name)) {
      throw new AgentError("TOOL_ALREADY_REGISTERED", `Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  list(): Tool[] {
    return [...this.tools.values()];
  }

  /** Model-facing descriptions, in registration order. */
  describe(): ToolDescription[] {
    return this.list().map((tool) => tool.describe());
  }

  async invoke(name: string, args: ArgumentMapping): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new AgentError("TOOL_NOT_FOUND", `Tool "${name}" not found`);
    }
    return tool.invoke(args);
  }
}
