import { readFileSync, writeFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { ConfigSchema, isPlaceholderKey, type Config } from "./schema.js";
import { errorMessage } from "../providers/errors.js";
import { ensureDir } from "../utils/helpers.js";

/** Get the default configuration file path. */
export function getConfigPath(): string {
  return join(homedir(), ".helmsman", "config.json");
}

/**
 * Environment variables that take precedence over the file. Placeholder
 * values are ignored.
 */
export function applyEnvOverrides(
  config: Config,
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const pick = (name: string): string | undefined => {
    const value = env[name];
    return value && !isPlaceholderKey(value) ? value : undefined;
  };

  const groqKey = pick("GROQ_API_KEY");
  const geminiKey = pick("GEMINI_API_KEY");
  const ollamaBase = env.OLLAMA_BASE_URL?.trim() || undefined;
  const braveKey = pick("BRAVE_API_KEY");

  return {
    ...config,
    providers: {
      groq: { ...config.providers.groq, ...(groqKey ? { apiKey: groqKey } : {}) },
      gemini: { ...config.providers.gemini, ...(geminiKey ? { apiKey: geminiKey } : {}) },
      ollama: { ...config.providers.ollama, ...(ollamaBase ? { apiBase: ollamaBase } : {}) },
    },
    tools: {
      ...config.tools,
      web: {
        search: {
          ...config.tools.web.search,
          ...(braveKey ? { apiKey: braveKey } : {}),
        },
      },
    },
  };
}

/** Load configuration from file, falling back to defaults. */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const path = configPath ?? getConfigPath();
  let config = ConfigSchema.parse({});

  if (existsSync(path)) {
    try {
      const raw = readFileSync(path, "utf-8");
      const data: unknown = JSON.parse(raw);
      config = ConfigSchema.parse(data);
    } catch (err) {
      console.warn(`Warning: Failed to load config from ${path}: ${errorMessage(err)}`);
      console.warn("Using default configuration.");
    }
  }

  return applyEnvOverrides(config, env);
}

/** Save configuration to file. */
export function saveConfig(config: Config, configPath?: string): void {
  const path = configPath ?? getConfigPath();
  ensureDir(dirname(path));
  writeFileSync(path, JSON.stringify(config, null, 2));
}
