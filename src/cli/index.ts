#!/usr/bin/env node
/**
 * helmsman CLI - desktop assistant core
 */

import { Command } from "commander";
import { existsSync } from "node:fs";
import { createInterface } from "node:readline";
import { VERSION, LOGO } from "../index.js";
import { getConfigPath, loadConfig, saveConfig } from "../config/loader.js";
import {
  ConfigSchema,
  isGeminiConfigured,
  isGroqConfigured,
  isPlaceholderKey,
  type Config,
} from "../config/schema.js";
import { createAssistant, type Assistant } from "../assistant.js";
import { errorMessage } from "../providers/errors.js";

const program = new Command();

program
  .name("helmsman")
  .description(`${LOGO} helmsman - desktop assistant with LLM failover`)
  .version(`${LOGO} helmsman v${VERSION}`, "-v, --version");

// ============================================================================
// Onboard / Setup
// ============================================================================

program
  .command("onboard")
  .description("Write a default configuration file")
  .action(() => {
    const configPath = getConfigPath();

    if (existsSync(configPath)) {
      console.log(`Config already exists at ${configPath}`);
      console.log("Delete it first if you want to start fresh.");
      return;
    }

    saveConfig(ConfigSchema.parse({}), configPath);
    console.log(`Created config at ${configPath}`);

    console.log(`\n${LOGO} helmsman is ready!`);
    console.log("\nNext steps:");
    console.log("  1. Add a Groq or Gemini API key to ~/.helmsman/config.json");
    console.log("     (or set GROQ_API_KEY / GEMINI_API_KEY)");
    console.log("  2. Optionally run Ollama locally for offline answers");
    console.log('  3. Chat: helmsman chat -m "Hello!"');
  });

// ============================================================================
// Chat
// ============================================================================

async function startAssistant(config: Config): Promise<Assistant> {
  const assistant = await createAssistant(config);
  if (assistant.router.availableProviders.length === 0) {
    console.error("Error: No LLM providers available.");
    console.error("Set an API key in ~/.helmsman/config.json or start Ollama.");
    process.exit(1);
  }
  return assistant;
}

async function answer(
  { agent }: Assistant,
  input: string,
  stream: boolean,
): Promise<void> {
  if (!stream) {
    const response = await agent.process(input);
    console.log(`\n${LOGO} ${response}\n`);
  } else {
    process.stdout.write(`\n${LOGO} `);
    for await (const piece of agent.streamProcess(input)) {
      process.stdout.write(piece);
    }
    process.stdout.write("\n\n");
  }

  const meta = agent.lastResponseMeta;
  if (meta) {
    console.log(
      `[${meta.provider}/${meta.model} - ${Math.round(meta.latencyMs)}ms, ${meta.iterations} iteration(s)]`,
    );
  }
}

/** Handle a REPL slash command. Returns false to leave the loop. */
async function runCommand(assistant: Assistant, line: string): Promise<boolean> {
  const [command, ...rest] = line.split(/\s+/);
  switch (command) {
    case "/exit":
    case "/quit":
      return false;
    case "/clear":
      assistant.agent.clearHistory();
      console.log("History cleared.");
      return true;
    case "/image": {
      const [path, ...prompt] = rest;
      if (!path) {
        console.log("Usage: /image <path> [prompt]");
        return true;
      }
      const response = await assistant.agent.processWithImage(prompt.join(" "), path);
      console.log(`\n${LOGO} ${response}\n`);
      return true;
    }
    default:
      console.log("Commands: /clear, /image <path> [prompt], /exit");
      return true;
  }
}

program
  .command("chat")
  .description("Chat with the assistant")
  .option("-m, --message <text>", "Send one message and exit")
  .option("--stream", "Stream the final answer")
  .option("--no-stream", "Wait for the full answer")
  .action(async (opts: { message?: string; stream?: boolean }) => {
    const config = loadConfig();
    const stream = opts.stream ?? config.assistant.stream;
    const assistant = await startAssistant(config);

    if (opts.message) {
      await answer(assistant, opts.message, stream);
      await assistant.router.shutdown();
      return;
    }

    console.log(`${LOGO} Interactive mode (/exit or Ctrl+C to quit)\n`);
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    rl.setPrompt("You: ");
    rl.prompt();

    for await (const input of rl) {
      const trimmed = input.trim();
      if (trimmed.startsWith("/")) {
        if (!(await runCommand(assistant, trimmed))) break;
      } else if (trimmed) {
        try {
          await answer(assistant, trimmed, stream);
        } catch (err) {
          console.error(`Error: ${errorMessage(err)}`);
        }
      }
      rl.prompt();
    }

    rl.close();
    await assistant.router.shutdown();
    console.log("\nGoodbye!");
  });

// ============================================================================
// Models
// ============================================================================

program
  .command("models")
  .description("List models of every available provider")
  .action(async () => {
    const { router } = await startAssistant(loadConfig());
    const all = await router.getAllModels();

    for (const [provider, models] of Object.entries(all)) {
      console.log(`\n${provider}${provider === router.currentProvider ? " (current)" : ""}`);
      console.log("─".repeat(60));
      for (const m of models) {
        const flags = [m.supportsTools ? "tools" : "", m.supportsVision ? "vision" : ""]
          .filter(Boolean)
          .join(", ");
        console.log(`  ${m.id.padEnd(48)} ${flags}`);
      }
    }
    await router.shutdown();
  });

// ============================================================================
// Status
// ============================================================================

program
  .command("status")
  .description("Show helmsman status")
  .action(() => {
    const configPath = getConfigPath();
    const config = loadConfig();
    const { assistant, providers, tools } = config;

    console.log(`${LOGO} helmsman Status\n`);
    console.log(`Config: ${configPath} ${existsSync(configPath) ? "[ok]" : "[missing]"}`);
    console.log(`Default provider: ${assistant.defaultProvider}`);
    console.log(`Fallback provider: ${assistant.fallbackProvider}`);
    console.log(`Groq API: ${isGroqConfigured(config) ? "[set]" : "[not set]"}`);
    console.log(`Gemini API: ${isGeminiConfigured(config) ? "[set]" : "[not set]"}`);
    console.log(
      `Ollama: ${providers.ollama.enabled ? providers.ollama.apiBase : "[disabled]"}`,
    );
    console.log(
      `Web search: ${isPlaceholderKey(tools.web.search.apiKey) ? "[not set]" : "[set]"}`,
    );
  });

await program.parseAsync();
