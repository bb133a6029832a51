import { readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { isRecord } from "./utils/helpers.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  // Works from both src/ (dev) and dist/ (built)
  for (const rel of ["../package.json", "../../package.json"]) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(join(__dirname, rel), "utf-8"));
      if (isRecord(pkg) && typeof pkg.version === "string") return pkg.version;
    } catch {
      continue;
    }
  }
  return "0.0.0";
}

export const VERSION = readVersion();
export const LOGO = "⎈";

// Core
export { createAssistant, type Assistant } from "./assistant.js";
export {
  AssistantAgent,
  EXHAUSTED_MESSAGE,
  type AgentOptions,
  type ResponseMeta,
} from "./agent/loop.js";
export { ContextBuilder, RAG_CONTEXT_TEMPLATE } from "./agent/context.js";
export { Tool, type ToolResult } from "./agent/tools/base.js";
export { ToolRegistry } from "./agent/tools/registry.js";

// Routing
export { LLMRouter, type RouteRequest, type RouterStats } from "./router/router.js";
export { classifyQuery, type Tier } from "./router/classifier.js";
export { TIER_MODELS } from "./router/tiers.js";

// Bus
export { EventBus, type Notifier } from "./bus/notifier.js";
export type { AssistantEvent, EventType } from "./bus/events.js";

// Config
export { loadConfig, saveConfig } from "./config/loader.js";
export type { Config } from "./config/schema.js";

// Providers
export { GroqProvider } from "./providers/groq-provider.js";
export { GeminiProvider } from "./providers/gemini-provider.js";
export { OllamaProvider } from "./providers/ollama-provider.js";
export { OpenAICompatibleProvider } from "./providers/openai-provider.js";
export * from "./providers/errors.js";
export type {
  ChatMessage,
  LLMResponse,
  ProviderAdapter,
  StreamChunk,
  ToolCallRequest,
} from "./providers/base.js";
