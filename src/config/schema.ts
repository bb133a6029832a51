import { z } from "zod";

export const PROVIDER_NAMES = ["groq", "gemini", "ollama"] as const;
export const ProviderNameSchema = z.enum(PROVIDER_NAMES);
export type ProviderName = z.infer<typeof ProviderNameSchema>;

export const AssistantConfigSchema = z.object({
  defaultProvider: ProviderNameSchema.default("groq"),
  fallbackProvider: ProviderNameSchema.default("gemini"),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(4096),
  stream: z.boolean().default(true),
  maxIterations: z.number().int().min(1).default(5),
  maxHistory: z.number().int().min(1).default(50),
  providerTimeoutMs: z.number().int().min(0).default(60000),
  toolTimeoutMs: z.number().int().min(0).default(30000),
});
export type AssistantConfig = z.infer<typeof AssistantConfigSchema>;

export const CloudProviderConfigSchema = z.object({
  apiKey: z.string().default(""),
  apiBase: z.string().nullish(),
  defaultModel: z.string().optional(),
});
export type CloudProviderConfig = z.infer<typeof CloudProviderConfigSchema>;

export const OllamaConfigSchema = z.object({
  enabled: z.boolean().default(true),
  apiBase: z.string().default("http://localhost:11434"),
  defaultModel: z.string().default("llama3.2:3b"),
});
export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;

export const ProvidersConfigSchema = z.object({
  groq: CloudProviderConfigSchema.default({
    apiKey: "",
    defaultModel: "moonshotai/kimi-k2-instruct",
  }),
  gemini: CloudProviderConfigSchema.default({
    apiKey: "",
    defaultModel: "gemini-2.5-flash",
  }),
  ollama: OllamaConfigSchema.default({
    enabled: true,
    apiBase: "http://localhost:11434",
    defaultModel: "llama3.2:3b",
  }),
});
export type ProvidersConfig = z.infer<typeof ProvidersConfigSchema>;

export const WebSearchConfigSchema = z.object({
  apiKey: z.string().default(""),
  maxResults: z.number().int().min(1).max(10).default(5),
});

export const WebToolsConfigSchema = z.object({
  search: WebSearchConfigSchema.default({ apiKey: "", maxResults: 5 }),
});

export const ToolsConfigSchema = z.object({
  web: WebToolsConfigSchema.default({
    search: { apiKey: "", maxResults: 5 },
  }),
  /** When non-empty, only these built-in tools are registered. */
  enabled: z.array(z.string()).default([]),
  disabled: z.array(z.string()).default([]),
});
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;

export const ConfigSchema = z.object({
  assistant: AssistantConfigSchema.default({}),
  providers: ProvidersConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
});
export type Config = z.infer<typeof ConfigSchema>;

const PLACEHOLDER_KEY = /^(|your[-_ ].*|<.*>|x+|changeme|placeholder|sk-\.\.\.)$/i;

/** Empty strings and template values such as "your-api-key" count as unset. */
export function isPlaceholderKey(key: string | null | undefined): boolean {
  return PLACEHOLDER_KEY.test((key ?? "").trim());
}

export function isGroqConfigured(config: Config): boolean {
  return !isPlaceholderKey(config.providers.groq.apiKey);
}

export function isGeminiConfigured(config: Config): boolean {
  return !isPlaceholderKey(config.providers.gemini.apiKey);
}

/** Default model per provider, as configured. */
export function getDefaultModels(config: Config): Record<string, string> {
  const models: Record<string, string> = {
    ollama: config.providers.ollama.defaultModel,
  };
  if (config.providers.groq.defaultModel) {
    models.groq = config.providers.groq.defaultModel;
  }
  if (config.providers.gemini.defaultModel) {
    models.gemini = config.providers.gemini.defaultModel;
  }
  return models;
}
