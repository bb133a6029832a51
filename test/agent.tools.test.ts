import { describe, it, expect, vi, afterEach } from "vitest";

import { Tool, renderToolResult, toolFailure, toolSuccess, type ToolResult } from "../src/agent/tools/base.js";
import { ToolRegistry } from "../src/agent/tools/registry.js";
import { createDefaultTools } from "../src/agent/tools/defaults.js";
import { SystemInfoTool } from "../src/agent/tools/system.js";
import { WebFetchTool, WebSearchTool, htmlToText, stripTags } from "../src/agent/tools/web.js";
import { ToolsConfigSchema } from "../src/config/schema.js";

class CustomTool extends Tool {
  readonly name = "custom_tool";
  readonly description = "custom tool";
  readonly parameters = { type: "object", properties: {} };
  async execute(): Promise<ToolResult> {
    return toolSuccess("ok");
  }
}

class ThrowingTool extends Tool {
  readonly name = "explode";
  readonly description = "always throws";
  readonly parameters = { type: "object", properties: {} };
  async execute(): Promise<ToolResult> {
    throw new Error("kaboom");
  }
}

class SlowTool extends Tool {
  readonly name = "slow";
  readonly description = "honors abort";
  readonly parameters = { type: "object", properties: {} };
  aborted = false;
  execute(_args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolResult> {
    return new Promise((resolve) => {
      signal?.addEventListener("abort", () => {
        this.aborted = true;
        resolve(toolFailure("aborted"));
      });
    });
  }
}

describe("agent/tools base", () => {
  it("renders results for the model", () => {
    expect(renderToolResult(toolSuccess("fine"))).toBe("fine");
    expect(renderToolResult(toolFailure("broken"))).toBe("Error: broken");
    expect(renderToolResult(toolFailure("", "partial output"))).toBe("Error: partial output");
  });

  it("builds an OpenAI-style definition", () => {
    expect(new CustomTool().getDefinition()).toEqual({
      type: "function",
      function: {
        name: "custom_tool",
        description: "custom tool",
        parameters: { type: "object", properties: {} },
      },
    });
  });
});

describe("agent/tools registry", () => {
  it("registers, looks up and unregisters tools", () => {
    const registry = new ToolRegistry();
    registry.register(new CustomTool());

    expect(registry.has("custom_tool")).toBe(true);
    expect(registry.get("custom_tool")?.name).toBe("custom_tool");
    expect(registry.getNames()).toEqual(["custom_tool"]);
    expect(registry.size).toBe(1);

    expect(registry.unregister("custom_tool")).toBe(true);
    expect(registry.unregister("custom_tool")).toBe(false);
    expect(registry.size).toBe(0);
  });

  it("reports unknown tools as failures", async () => {
    const registry = new ToolRegistry();
    expect(await registry.execute("nope", {})).toEqual({
      success: false,
      output: "",
      error: "Tool 'nope' not found",
    });
  });

  it("turns a thrown error into a failed result", async () => {
    const registry = new ToolRegistry();
    registry.register(new ThrowingTool());
    expect(await registry.execute("explode", {})).toEqual({
      success: false,
      output: "",
      error: "kaboom",
    });
  });

  it("times out and aborts a slow tool", async () => {
    const registry = new ToolRegistry();
    const tool = new SlowTool();
    registry.register(tool);

    const result = await registry.execute("slow", {}, { timeoutMs: 20 });

    expect(result).toEqual({
      success: false,
      output: "",
      error: "Tool 'slow' timed out after 20ms",
    });
    expect(tool.aborted).toBe(true);
  });
});

describe("agent/tools defaults", () => {
  it("registers every built-in tool when no filters are set", () => {
    const tools = createDefaultTools(ToolsConfigSchema.parse({}));
    expect(tools.map((t) => t.name)).toEqual(["web_search", "web_fetch", "system_info"]);
  });

  it("respects the enabled allowlist", () => {
    const tools = createDefaultTools(ToolsConfigSchema.parse({ enabled: ["web_fetch"] }));
    expect(tools.map((t) => t.name)).toEqual(["web_fetch"]);
  });

  it("respects the disabled denylist", () => {
    const tools = createDefaultTools(
      ToolsConfigSchema.parse({ disabled: ["web_search", "web_fetch"] }),
    );
    expect(tools.map((t) => t.name)).toEqual(["system_info"]);
  });
});

describe("agent/tools web", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("strips tags and entities", () => {
    expect(stripTags("<b>Tom &amp; Jerry</b><script>x()</script>")).toBe("Tom & Jerry");
    expect(htmlToText("<h1>Title</h1><p>One<br>two</p>")).toBe("Title\n\nOne\ntwo");
  });

  it("requires a query and an API key", async () => {
    expect(await new WebSearchTool({ apiKey: "test-key" }).execute({ query: "  " })).toEqual(
      toolFailure("query is required"),
    );
    expect(await new WebSearchTool({ apiKey: "" }).execute({ query: "weather" })).toEqual(
      toolFailure("Web search is not configured (missing BRAVE_API_KEY)"),
    );
  });

  it("formats search results", async () => {
    const fetchMock = vi.fn(async () =>
      Response.json({
        web: {
          results: [
            { title: "First", url: "https://a.example", description: "About <b>a</b>" },
            { title: "Second", url: "https://b.example" },
          ],
        },
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await new WebSearchTool({ apiKey: "test-key", maxResults: 3 }).execute({
      query: "example",
    });

    expect(result.success).toBe(true);
    expect(result.output).toBe(
      [
        "Results for: example",
        "",
        "1. First",
        "   https://a.example",
        "   About a",
        "2. Second",
        "   https://b.example",
      ].join("\n"),
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("reports an empty result set", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => Response.json({ web: { results: [] } })));
    const result = await new WebSearchTool({ apiKey: "test-key" }).execute({ query: "zzz" });
    expect(result).toEqual(toolSuccess("No results for: zzz", { results: [] }));
  });

  it("reports a search API error status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("denied", { status: 401 })));
    const result = await new WebSearchTool({ apiKey: "test-key" }).execute({ query: "zzz" });
    expect(result).toEqual(toolFailure("Search API returned 401"));
  });

  it("rejects invalid and non-http URLs", async () => {
    const tool = new WebFetchTool();
    expect(await tool.execute({ url: "not a url" })).toEqual(toolFailure("Invalid URL: not a url"));
    expect(await tool.execute({ url: "file:///etc/passwd" })).toEqual(
      toolFailure("Only http/https allowed, got 'file:'"),
    );
  });

  it("fetches a page as readable text", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        async () =>
          new Response("<html><body><p>Hello</p><p>World</p></body></html>", {
            headers: { "content-type": "text/html; charset=utf-8" },
          }),
      ),
    );

    const result = await new WebFetchTool().execute({ url: "https://example.com/page" });

    expect(result).toEqual(
      toolSuccess("Hello\n\nWorld", {
        url: "https://example.com/page",
        status: 200,
        truncated: false,
      }),
    );
  });

  it("truncates long pages", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("x".repeat(500), { headers: { "content-type": "text/plain" } })),
    );

    const result = await new WebFetchTool({ maxChars: 100 }).execute({ url: "https://example.com" });

    expect(result.output).toBe(`${"x".repeat(97)}...`);
    expect(result.data).toEqual({ url: "https://example.com/", status: 200, truncated: true });
  });

  it("reports an HTTP error status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("gone", { status: 404 })));
    const result = await new WebFetchTool().execute({ url: "https://example.com/missing" });
    expect(result).toEqual(toolFailure("HTTP 404 for https://example.com/missing"));
  });
});

describe("agent/tools system_info", () => {
  it("describes the host", async () => {
    const result = await new SystemInfoTool().execute();
    const lines = result.output.split("\n");

    expect(result.success).toBe(true);
    expect(lines).toHaveLength(5);
    expect(lines[0]).toMatch(/^OS: /);
    expect(lines[3]).toMatch(/^Memory: \d+\.\d GB used of \d+\.\d GB$/);
    expect(lines[4]).toMatch(/^Uptime: (\d+d )?\d+h \d+m$/);
    expect(result.data).toHaveProperty("cpuCount");
  });
});
