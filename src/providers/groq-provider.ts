import { OpenAICompatibleProvider } from "./openai-provider.js";
import { GROQ_MODELS } from "./models.js";

export const GROQ_API_BASE = "https://api.groq.com/openai/v1";

/** Groq cloud inference over its OpenAI-compatible API. */
export class GroqProvider extends OpenAICompatibleProvider {
  constructor(params: {
    apiKey: string;
    apiBase?: string | null;
    defaultModel?: string;
    timeoutMs?: number;
  }) {
    super({
      name: "groq",
      apiKey: params.apiKey,
      apiBase: params.apiBase ?? GROQ_API_BASE,
      defaultModel: params.defaultModel ?? "moonshotai/kimi-k2-instruct",
      catalog: GROQ_MODELS,
      timeoutMs: params.timeoutMs,
    });
  }
}
