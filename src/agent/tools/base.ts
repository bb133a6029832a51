import type { ToolDefinition } from "../../providers/base.js";

/** Outcome of a tool invocation. */
export interface ToolResult {
  success: boolean;
  output: string;
  data?: Record<string, unknown>;
  error?: string;
}

export function toolSuccess(
  output: string,
  data?: Record<string, unknown>,
): ToolResult {
  return data ? { success: true, output, data } : { success: true, output };
}

export function toolFailure(error: string, output = ""): ToolResult {
  return { success: false, output, error };
}

/** Text the model sees for a tool result. */
export function renderToolResult(result: ToolResult): string {
  if (result.success) return result.output;
  return `Error: ${result.error || result.output}`;
}

/** Abstract base class for tools. */
export abstract class Tool {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly parameters: Record<string, unknown>;

  /**
   * Execute the tool with the given arguments. The signal fires when the
   * caller gives up on the call.
   */
  abstract execute(
    args: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<ToolResult>;

  /** Get the tool definition for the LLM. */
  getDefinition(): ToolDefinition {
    return {
      type: "function",
      function: {
        name: this.name,
        description: this.description,
        parameters: this.parameters,
      },
    };
  }
}
