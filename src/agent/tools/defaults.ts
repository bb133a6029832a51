import type { Tool } from "./base.js";
import { WebFetchTool, WebSearchTool } from "./web.js";
import { SystemInfoTool } from "./system.js";
import type { ToolsConfig } from "../../config/schema.js";

/**
 * Built-in tools, filtered by the enabled/disabled lists. An empty
 * enabled list means every tool.
 */
export function createDefaultTools(config: ToolsConfig): Tool[] {
  const tools: Tool[] = [
    new WebSearchTool({
      apiKey: config.web.search.apiKey,
      maxResults: config.web.search.maxResults,
    }),
    new WebFetchTool(),
    new SystemInfoTool(),
  ];

  return tools.filter(
    (tool) =>
      (config.enabled.length === 0 || config.enabled.includes(tool.name)) &&
      !config.disabled.includes(tool.name),
  );
}
