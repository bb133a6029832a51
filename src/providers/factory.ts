import type { ProviderAdapter } from "./base.js";
import { GroqProvider } from "./groq-provider.js";
import { GeminiProvider } from "./gemini-provider.js";
import { OllamaProvider } from "./ollama-provider.js";
import {
  isGeminiConfigured,
  isGroqConfigured,
  type Config,
} from "../config/schema.js";

/** Adapters for every provider the config makes usable. */
export function createProviders(config: Config): ProviderAdapter[] {
  const { groq, gemini, ollama } = config.providers;
  const adapters: ProviderAdapter[] = [];

  if (isGroqConfigured(config)) {
    adapters.push(
      new GroqProvider({
        apiKey: groq.apiKey,
        apiBase: groq.apiBase,
        defaultModel: groq.defaultModel,
      }),
    );
  }
  if (isGeminiConfigured(config)) {
    adapters.push(
      new GeminiProvider({
        apiKey: gemini.apiKey,
        apiBase: gemini.apiBase,
        defaultModel: gemini.defaultModel,
      }),
    );
  }
  if (ollama.enabled) {
    adapters.push(
      new OllamaProvider({
        apiBase: ollama.apiBase,
        defaultModel: ollama.defaultModel,
      }),
    );
  }
  return adapters;
}
