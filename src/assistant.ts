import type { ProviderAdapter } from "./providers/base.js";
import { createProviders } from "./providers/factory.js";
import { LLMRouter } from "./router/router.js";
import { AssistantAgent } from "./agent/loop.js";
import { createDefaultTools } from "./agent/tools/defaults.js";
import { EventBus } from "./bus/notifier.js";
import { getDefaultModels, type Config } from "./config/schema.js";

export interface Assistant {
  bus: EventBus;
  router: LLMRouter;
  agent: AssistantAgent;
}

/**
 * Wire the bus, router and agent from a config. Pass `adapters` to use
 * providers other than the configured ones.
 */
export async function createAssistant(
  config: Config,
  params: { adapters?: ProviderAdapter[]; bus?: EventBus } = {},
): Promise<Assistant> {
  const bus = params.bus ?? new EventBus();
  const { assistant } = config;

  const router = new LLMRouter(
    params.adapters ?? createProviders(config),
    {
      defaultProvider: assistant.defaultProvider,
      fallbackProvider: assistant.fallbackProvider,
      temperature: assistant.temperature,
      maxTokens: assistant.maxTokens,
      providerTimeoutMs: assistant.providerTimeoutMs,
      defaultModels: getDefaultModels(config),
    },
    bus,
  );
  await router.initialize();

  const agent = new AssistantAgent(router, bus, {
    maxIterations: assistant.maxIterations,
    maxHistory: assistant.maxHistory,
    toolTimeoutMs: assistant.toolTimeoutMs,
    tools: createDefaultTools(config.tools),
  });

  return { bus, router, agent };
}
