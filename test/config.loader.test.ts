import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { ConfigSchema } from "../src/config/schema.js";
import { applyEnvOverrides, loadConfig, saveConfig } from "../src/config/loader.js";

describe("config/loader", () => {
  let tempRoot: string;

  beforeEach(() => {
    tempRoot = mkdtempSync(join(tmpdir(), "helmsman-config-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempRoot, { recursive: true, force: true });
  });

  it("loads config from file", () => {
    const path = join(tempRoot, "config.json");
    writeFileSync(path, JSON.stringify({ assistant: { defaultProvider: "ollama" } }));
    const cfg = loadConfig(path, {});
    expect(cfg.assistant.defaultProvider).toBe("ollama");
    expect(cfg.assistant.fallbackProvider).toBe("gemini");
  });

  it("uses defaults when the file is missing", () => {
    const cfg = loadConfig(join(tempRoot, "absent.json"), {});
    expect(cfg).toEqual(ConfigSchema.parse({}));
  });

  it("falls back to defaults when file is invalid", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const path = join(tempRoot, "config.json");
    writeFileSync(path, "{ invalid json");
    const cfg = loadConfig(path, {});
    expect(cfg).toEqual(ConfigSchema.parse({}));
    expect(warnSpy).toHaveBeenCalled();
  });

  it("falls back to defaults when the file fails validation", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const path = join(tempRoot, "config.json");
    writeFileSync(path, JSON.stringify({ assistant: { maxTokens: -1 } }));
    expect(loadConfig(path, {}).assistant.maxTokens).toBe(4096);
  });

  it("saves config to file", () => {
    const path = join(tempRoot, "nested", "config.json");
    const cfg = ConfigSchema.parse({ assistant: { maxHistory: 10 } });
    saveConfig(cfg, path);
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    expect(ConfigSchema.parse(parsed).assistant.maxHistory).toBe(10);
  });

  it("applies environment overrides", () => {
    const path = join(tempRoot, "config.json");
    writeFileSync(path, JSON.stringify({ providers: { groq: { apiKey: "from-file" } } }));
    const cfg = loadConfig(path, {
      GEMINI_API_KEY: "test-gemini-key",
      OLLAMA_BASE_URL: "http://ollama.local:11434",
      BRAVE_API_KEY: "test-brave-key",
    });
    expect(cfg.providers.groq.apiKey).toBe("from-file");
    expect(cfg.providers.gemini.apiKey).toBe("test-gemini-key");
    expect(cfg.providers.ollama.apiBase).toBe("http://ollama.local:11434");
    expect(cfg.tools.web.search.apiKey).toBe("test-brave-key");
  });

  it("ignores placeholder environment values", () => {
    const base = ConfigSchema.parse({ providers: { groq: { apiKey: "from-file" } } });
    const cfg = applyEnvOverrides(base, { GROQ_API_KEY: "your-groq-key", OLLAMA_BASE_URL: "  " });
    expect(cfg.providers.groq.apiKey).toBe("from-file");
    expect(cfg.providers.ollama.apiBase).toBe("http://localhost:11434");
  });
});
