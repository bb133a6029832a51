import type { ToolDefinition } from "../../providers/base.js";
import { errorMessage } from "../../providers/errors.js";
import { withTimeout } from "../../utils/timeout.js";
import { toolFailure, type Tool, type ToolResult } from "./base.js";

export interface ToolExecuteOptions {
  /** Per-call deadline; 0 disables it. */
  timeoutMs?: number;
}

/**
 * Dynamic tool registration and execution.
 */
export class ToolRegistry {
  private tools = new Map<string, Tool>();

  /** Register a tool, replacing any tool of the same name. */
  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  /** Unregister a tool by name. */
  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  /** Get a tool by name. */
  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /** Check if a tool exists. */
  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Get tool definitions for the LLM. */
  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map((t) => t.getDefinition());
  }

  /** Execute a tool by name. Failures come back as results, never thrown. */
  async execute(
    name: string,
    args: Record<string, unknown>,
    options: ToolExecuteOptions = {},
  ): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return toolFailure(`Tool '${name}' not found`);
    }
    try {
      return await withTimeout(
        (signal) => tool.execute(args, signal),
        options.timeoutMs ?? 0,
        `Tool '${name}'`,
      );
    } catch (err) {
      return toolFailure(errorMessage(err));
    }
  }

  /** Get all registered tool names. */
  getNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /** Get count of registered tools. */
  get size(): number {
    return this.tools.size;
  }
}
