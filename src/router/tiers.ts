import type { Tier } from "./classifier.js";

/** Model to use for each tier, per provider. */
export const TIER_MODELS: Record<Tier, Record<string, string>> = {
  simple: {
    groq: "llama-3.1-8b-instant",
    gemini: "gemini-2.5-flash",
    ollama: "llama3.2:3b",
  },
  tool: {
    groq: "moonshotai/kimi-k2-instruct",
    gemini: "gemini-2.5-flash",
    ollama: "llama3.2:3b",
  },
  complex: {
    // 262K context
    groq: "moonshotai/kimi-k2-instruct-0905",
    gemini: "gemini-2.5-pro",
    ollama: "llama3.1:8b",
  },
  normal: {
    groq: "moonshotai/kimi-k2-instruct",
    gemini: "gemini-2.5-flash",
    ollama: "llama3.2:3b",
  },
  vision: {
    groq: "meta-llama/llama-4-scout-17b-16e-instruct",
    gemini: "gemini-2.5-flash",
    ollama: "llama3.2:3b",
  },
};

/** Tier model for a provider, or undefined when the table has no entry. */
export function tierModelFor(tier: Tier, provider: string): string | undefined {
  return TIER_MODELS[tier][provider];
}
