import type { ModelInfo } from "./base.js";

function model(
  info: Pick<ModelInfo, "id" | "name" | "provider"> & Partial<ModelInfo>,
): ModelInfo {
  return {
    contextWindow: 4096,
    maxOutput: 4096,
    supportsTools: false,
    supportsVision: false,
    supportsStreaming: true,
    description: "",
    ...info,
  };
}

export const GROQ_MODELS: ModelInfo[] = [
  model({
    id: "moonshotai/kimi-k2-instruct",
    name: "Kimi K2",
    provider: "groq",
    contextWindow: 131072,
    maxOutput: 32768,
    supportsTools: true,
    description: "Strong reasoning and chat",
  }),
  model({
    id: "moonshotai/kimi-k2-instruct-0905",
    name: "Kimi K2 (262K)",
    provider: "groq",
    contextWindow: 262144,
    maxOutput: 32768,
    supportsTools: true,
    description: "Kimi K2 with a 262K context window",
  }),
  model({
    id: "meta-llama/llama-4-maverick-17b-128e-instruct",
    name: "Llama 4 Maverick",
    provider: "groq",
    contextWindow: 131072,
    maxOutput: 32768,
    supportsTools: true,
    supportsVision: true,
    description: "128-expert MoE with vision",
  }),
  model({
    id: "meta-llama/llama-4-scout-17b-16e-instruct",
    name: "Llama 4 Scout",
    provider: "groq",
    contextWindow: 131072,
    maxOutput: 32768,
    supportsTools: true,
    supportsVision: true,
    description: "16-expert vision model",
  }),
  model({
    id: "llama-3.3-70b-versatile",
    name: "Llama 3.3 70B",
    provider: "groq",
    contextWindow: 131072,
    maxOutput: 32768,
    supportsTools: true,
    description: "General purpose",
  }),
  model({
    id: "llama-3.1-8b-instant",
    name: "Llama 3.1 8B Instant",
    provider: "groq",
    contextWindow: 131072,
    maxOutput: 8192,
    supportsTools: true,
    description: "Small and fast",
  }),
];

export const GEMINI_MODELS: ModelInfo[] = [
  model({
    id: "gemini-2.5-flash",
    name: "Gemini 2.5 Flash",
    provider: "gemini",
    contextWindow: 1048576,
    maxOutput: 65536,
    supportsTools: true,
    supportsVision: true,
    description: "Fast thinking model",
  }),
  model({
    id: "gemini-2.5-pro",
    name: "Gemini 2.5 Pro",
    provider: "gemini",
    contextWindow: 1048576,
    maxOutput: 65536,
    supportsTools: true,
    supportsVision: true,
    description: "Deeper reasoning",
  }),
  model({
    id: "gemini-2.0-flash",
    name: "Gemini 2.0 Flash",
    provider: "gemini",
    contextWindow: 1048576,
    maxOutput: 8192,
    supportsTools: true,
    supportsVision: true,
  }),
];

export const OLLAMA_MODELS: ModelInfo[] = [
  model({
    id: "llama3.2:3b",
    name: "Llama 3.2 3B",
    provider: "ollama",
    contextWindow: 128000,
    supportsTools: true,
    description: "Small local model",
  }),
  model({
    id: "llama3.1:8b",
    name: "Llama 3.1 8B",
    provider: "ollama",
    contextWindow: 128000,
    supportsTools: true,
  }),
  model({
    id: "mistral:7b",
    name: "Mistral 7B",
    provider: "ollama",
    contextWindow: 32768,
    supportsTools: true,
  }),
  model({
    id: "deepseek-r1:8b",
    name: "DeepSeek R1 8B",
    provider: "ollama",
    contextWindow: 128000,
    description: "Reasoning model, no tool support",
  }),
];

export const ALL_MODELS: Record<string, ModelInfo[]> = {
  groq: GROQ_MODELS,
  gemini: GEMINI_MODELS,
  ollama: OLLAMA_MODELS,
};

/** Look up model info by id, optionally restricted to one provider. */
export function getModelInfo(
  modelId: string,
  provider?: string,
): ModelInfo | undefined {
  const pools = provider ? [ALL_MODELS[provider] ?? []] : Object.values(ALL_MODELS);
  for (const pool of pools) {
    const found = pool.find((m) => m.id === modelId);
    if (found) return found;
  }
  return undefined;
}
