import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import type { ChatMessage } from "../providers/base.js";
import { systemMessage } from "../providers/base.js";

const IMAGE_MIME_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".bmp": "image/bmp",
};

export const RAG_CONTEXT_TEMPLATE =
  "## Relevant Context from User's Documents:\n{context}\n\n---\n" +
  "Use the above context to answer the user's question. " +
  "If the context doesn't contain relevant information, say so and answer from your general knowledge instead. " +
  "Always indicate when you're using document context vs general knowledge.";

/** Wrap retrieved document text in the fixed RAG instruction. */
export function buildRagMessage(context: string): ChatMessage {
  return systemMessage(RAG_CONTEXT_TEMPLATE.replace("{context}", context));
}

/** Image file as a base64 data URL; unknown extensions are sent as PNG. */
export async function readImageAsDataUrl(
  filePath: string,
): Promise<{ url: string; fileName: string } | null> {
  if (!existsSync(filePath)) return null;
  const mime = IMAGE_MIME_TYPES[extname(filePath).toLowerCase()] ?? "image/png";
  const data = await readFile(filePath);
  return {
    url: `data:${mime};base64,${data.toString("base64")}`,
    fileName: basename(filePath),
  };
}

/**
 * Builds the system prompt and the outbound message list for the agent.
 */
export class ContextBuilder {
  private systemPromptOverride?: string;

  constructor(params: { systemPrompt?: string } = {}) {
    this.systemPromptOverride = params.systemPrompt;
  }

  buildSystemPrompt(toolNames: string[]): string {
    if (this.systemPromptOverride) return this.systemPromptOverride;

    const now = new Date();
    const dateStr = now.toISOString().slice(0, 16).replace("T", " ");
    const dayName = now.toLocaleDateString("en-US", { weekday: "long", timeZone: "UTC" });
    const tools = toolNames.length > 0 ? toolNames.map((n) => `- ${n}`).join("\n") : "- (none)";

    return `# helmsman

You are helmsman, a desktop assistant. You answer questions directly and use
tools when a request needs live data or an action on this computer.

## Current Time
${dateStr} UTC (${dayName})

## Tools
${tools}

Be accurate and concise. When you use a tool, say what you did.
If a tool fails, explain the failure instead of guessing.
If you are unsure, say so.`;
  }

  /** System prompt, optional RAG context, then the most recent history. */
  buildMessages(params: {
    history: ChatMessage[];
    toolNames: string[];
    ragContext?: string;
    maxHistory: number;
  }): ChatMessage[] {
    const messages: ChatMessage[] = [
      systemMessage(this.buildSystemPrompt(params.toolNames)),
    ];
    if (params.ragContext && params.ragContext.trim()) {
      messages.push(buildRagMessage(params.ragContext));
    }
    messages.push(...params.history.slice(-params.maxHistory));
    return messages;
  }
}
