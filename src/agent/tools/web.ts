import { z } from "zod";
import { Tool, toolFailure, toolSuccess, type ToolResult } from "./base.js";
import { errorMessage } from "../../providers/errors.js";
import { truncateString } from "../../utils/helpers.js";

export const BRAVE_SEARCH_URL = "https://api.search.brave.com/res/v1/web/search";

const USER_AGENT = "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 helmsman";

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().default(""),
            url: z.string().default(""),
            description: z.string().optional(),
          }),
        )
        .default([]),
    })
    .optional(),
});

/** Strip HTML tags and decode common entities. */
export function stripTags(text: string): string {
  return text
    .replace(/<script[\s\S]*?<\/script>/gi, "")
    .replace(/<style[\s\S]*?<\/style>/gi, "")
    .replace(/<[^>]+>/g, "")
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, "&")
    .trim();
}

/** Reduce an HTML page to readable text with blank lines between blocks. */
export function htmlToText(html: string): string {
  const withBreaks = html
    .replace(/<(br|hr)\s*\/?>/gi, "\n")
    .replace(/<\/(p|div|section|article|h[1-6]|li|tr)>/gi, "\n\n");
  return stripTags(withBreaks)
    .replace(/[ \t]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function clampCount(value: unknown, fallback: number): number {
  const n = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(n)) return fallback;
  return Math.min(Math.max(Math.trunc(n), 1), 10);
}

/** Search the web using the Brave Search API. */
export class WebSearchTool extends Tool {
  readonly name = "web_search";
  readonly description = "Search the web. Returns titles, URLs, and snippets.";
  readonly parameters = {
    type: "object",
    properties: {
      query: { type: "string", description: "Search query" },
      count: {
        type: "integer",
        description: "Results (1-10)",
        minimum: 1,
        maximum: 10,
      },
    },
    required: ["query"],
  };

  private apiKey: string;
  private maxResults: number;

  constructor(params: { apiKey: string; maxResults?: number }) {
    super();
    this.apiKey = params.apiKey;
    this.maxResults = params.maxResults ?? 5;
  }

  async execute(args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolResult> {
    const query = typeof args.query === "string" ? args.query.trim() : "";
    if (!query) {
      return toolFailure("query is required");
    }
    if (!this.apiKey) {
      return toolFailure("Web search is not configured (missing BRAVE_API_KEY)");
    }
    const count = clampCount(args.count, this.maxResults);

    const url = new URL(BRAVE_SEARCH_URL);
    url.searchParams.set("q", query);
    url.searchParams.set("count", String(count));

    let body: unknown;
    try {
      const resp = await fetch(url, {
        headers: {
          Accept: "application/json",
          "X-Subscription-Token": this.apiKey,
        },
        signal,
      });
      if (!resp.ok) {
        return toolFailure(`Search API returned ${resp.status}`);
      }
      body = await resp.json();
    } catch (err) {
      return toolFailure(errorMessage(err));
    }

    const parsed = BraveResponseSchema.safeParse(body);
    if (!parsed.success) {
      return toolFailure("Search API returned an unexpected payload");
    }
    const results = (parsed.data.web?.results ?? []).slice(0, count);
    if (results.length === 0) {
      return toolSuccess(`No results for: ${query}`, { results: [] });
    }

    const lines = [`Results for: ${query}`, ""];
    results.forEach((item, i) => {
      lines.push(`${i + 1}. ${item.title}`, `   ${item.url}`);
      if (item.description) lines.push(`   ${stripTags(item.description)}`);
    });
    return toolSuccess(lines.join("\n"), { results });
  }
}

/** Fetch a URL and return its readable text. */
export class WebFetchTool extends Tool {
  readonly name = "web_fetch";
  readonly description = "Fetch a web page and return its readable text.";
  readonly parameters = {
    type: "object",
    properties: {
      url: { type: "string", description: "http(s) URL to fetch" },
      maxChars: { type: "integer", minimum: 100 },
    },
    required: ["url"],
  };

  private defaultMaxChars: number;

  constructor(params: { maxChars?: number } = {}) {
    super();
    this.defaultMaxChars = params.maxChars ?? 20000;
  }

  async execute(args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolResult> {
    const raw = typeof args.url === "string" ? args.url : "";
    let url: URL;
    try {
      url = new URL(raw);
    } catch {
      return toolFailure(`Invalid URL: ${raw}`);
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return toolFailure(`Only http/https allowed, got '${url.protocol}'`);
    }
    const maxChars =
      typeof args.maxChars === "number" && args.maxChars >= 100
        ? args.maxChars
        : this.defaultMaxChars;

    try {
      const resp = await fetch(url, {
        headers: { "User-Agent": USER_AGENT },
        redirect: "follow",
        signal,
      });
      if (!resp.ok) {
        return toolFailure(`HTTP ${resp.status} for ${url.href}`);
      }

      const contentType = resp.headers.get("content-type") ?? "";
      const body = await resp.text();
      const text = contentType.includes("text/html") ? htmlToText(body) : body.trim();
      const truncated = text.length > maxChars;

      return toolSuccess(truncated ? truncateString(text, maxChars) : text, {
        url: url.href,
        status: resp.status,
        truncated,
      });
    } catch (err) {
      return toolFailure(errorMessage(err));
    }
  }
}
