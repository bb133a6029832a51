import type {
  ChatMessage,
  GenerateOutcome,
  LLMResponse,
  ModelInfo,
  ProviderAdapter,
  StreamChunk,
  ToolCallFormat,
  ToolDefinition,
} from "../providers/base.js";
import { totalTokens } from "../providers/base.js";
import {
  AllProvidersFailedError,
  LLMError,
  ProviderNotAvailableError,
  RateLimitError,
  StreamInterruptedError,
  errorMessage,
  type ProviderFailure,
} from "../providers/errors.js";
import { silentNotifier, type Notifier } from "../bus/notifier.js";
import { withTimeout } from "../utils/timeout.js";
import {
  classifyQuery,
  extractLatestUserQuery,
  type Tier,
} from "./classifier.js";
import { tierModelFor } from "./tiers.js";

/** Providers that run on this machine and need no network. */
export const LOCAL_PROVIDERS: readonly string[] = ["ollama"];

export interface RouterOptions {
  defaultProvider?: string;
  fallbackProvider?: string;
  temperature?: number;
  maxTokens?: number;
  /** Deadline per provider call; for streams, per chunk. 0 disables it. */
  providerTimeoutMs?: number;
  /** Default model per provider name. */
  defaultModels?: Record<string, string>;
}

export interface RouteRequest {
  messages: ChatMessage[];
  provider?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  tools?: ToolDefinition[];
  /** Pick the model from the query tier. Defaults to true. */
  autoRoute?: boolean;
  /** Skip classification and route as this tier. */
  tier?: Tier;
}

export type StreamRouteRequest = Omit<RouteRequest, "tools">;

export interface RouterStats {
  totalRequests: number;
  totalTokens: number;
  avgLatencyMs: number;
  providers: string[];
  current: string;
}

interface Attempt {
  provider: string;
  model: string;
}

/**
 * Routes LLM requests across the active providers with tier-based model
 * selection and failover. Providers are tried in order: the requested one,
 * then the configured default and fallback, then the rest.
 */
export class LLMRouter {
  private candidates: ProviderAdapter[];
  private providers = new Map<string, ProviderAdapter>();
  private failoverOrder: string[] = [];
  private _currentProvider: string | undefined;
  private _currentModel: string | undefined;

  private defaultProvider: string;
  private fallbackProvider: string;
  private temperature: number;
  private maxTokens: number;
  private providerTimeoutMs: number;
  private defaultModels: Record<string, string>;

  private requestCount = 0;
  private tokenCount = 0;
  private latencyTotalMs = 0;

  constructor(
    adapters: ProviderAdapter[],
    options: RouterOptions = {},
    private notifier: Notifier = silentNotifier,
  ) {
    this.candidates = adapters;
    this.defaultProvider = options.defaultProvider ?? "groq";
    this.fallbackProvider = options.fallbackProvider ?? "gemini";
    this.temperature = options.temperature ?? 0.7;
    this.maxTokens = options.maxTokens ?? 4096;
    this.providerTimeoutMs = options.providerTimeoutMs ?? 60000;
    this.defaultModels = options.defaultModels ?? {};
  }

  /** Initialize every candidate; those that answer become active. */
  async initialize(): Promise<void> {
    console.log("[router] initializing LLM providers...");
    const ready = await Promise.all(
      this.candidates.map(async (adapter) => {
        try {
          return await adapter.initialize();
        } catch (err) {
          console.warn(`[router] ${adapter.name} failed to initialize: ${errorMessage(err)}`);
          return false;
        }
      }),
    );

    this.providers.clear();
    this.candidates.forEach((adapter, i) => {
      if (ready[i]) this.providers.set(adapter.name, adapter);
    });
    this.failoverOrder = this.buildFailoverOrder();

    const first = this.failoverOrder[0];
    if (first === undefined) {
      this._currentProvider = undefined;
      this._currentModel = undefined;
      console.error("[router] no LLM providers available, check your API keys");
      return;
    }

    this._currentProvider = this.providers.has(this.defaultProvider)
      ? this.defaultProvider
      : first;
    this._currentModel = this.defaultModelFor(this._currentProvider);
    console.log(`[router] using ${this._currentProvider} / ${this._currentModel}`);
    this.notifier.notify("llm.provider.changed", {
      provider: this._currentProvider,
      model: this._currentModel,
    });
  }

  private buildFailoverOrder(): string[] {
    const order: string[] = [];
    const names = [
      this.defaultProvider,
      this.fallbackProvider,
      ...this.candidates.map((a) => a.name),
    ];
    for (const name of names) {
      if (this.providers.has(name) && !order.includes(name)) {
        order.push(name);
      }
    }
    return order;
  }

  private defaultModelFor(provider: string): string {
    return this.defaultModels[provider] ?? tierModelFor("normal", provider) ?? "";
  }

  /**
   * Resolve the provider/model pair for each attempt. The requested
   * provider keeps the resolved (possibly tier-routed) model; failover
   * candidates use their own model for the same tier.
   */
  private plan(request: StreamRouteRequest): { attempts: Attempt[]; tier: Tier } {
    const provider = request.provider ?? this._currentProvider;
    let model =
      request.model ??
      (provider !== undefined && provider === this._currentProvider
        ? this._currentModel
        : undefined);

    const query = extractLatestUserQuery(request.messages);
    const tier: Tier =
      request.tier ??
      (query.text || query.hasImage ? classifyQuery(query.text, query.hasImage) : "normal");

    if (provider !== undefined && (request.autoRoute ?? true)) {
      const routed = tierModelFor(tier, provider);
      if (routed && routed !== model) {
        console.log(`[router] auto-route [${tier}] -> ${provider}/${routed}`);
        model = routed;
      }
    }

    const names: string[] = provider !== undefined ? [provider] : [];
    names.push(...this.failoverOrder.filter((p) => p !== provider));

    const attempts: Attempt[] = [];
    for (const name of names) {
      if (!this.providers.has(name)) continue;
      attempts.push({
        provider: name,
        model:
          name === provider && model
            ? model
            : tierModelFor(tier, name) ?? this.defaultModelFor(name),
      });
    }
    return { attempts, tier };
  }

  private recordFailure(
    failures: ProviderFailure[],
    attempt: Attempt,
    error: LLMError,
  ): void {
    const rateLimited = error instanceof RateLimitError;
    failures.push({
      provider: attempt.provider,
      model: attempt.model,
      message: error.message,
      rateLimited,
    });
    console.warn(
      rateLimited
        ? `[router] ${attempt.provider} rate limited, trying next...`
        : `[router] ${attempt.provider} failed: ${error.message}`,
    );
    this.notifier.notify("llm.error", {
      provider: attempt.provider,
      model: attempt.model,
      error: error.message,
      rateLimited,
    });
  }

  private async attempt(
    adapter: ProviderAdapter,
    request: RouteRequest,
    model: string,
  ): Promise<GenerateOutcome> {
    try {
      return await withTimeout(
        (signal) =>
          adapter.generate({
            messages: request.messages,
            model,
            temperature: request.temperature ?? this.temperature,
            maxTokens: request.maxTokens ?? this.maxTokens,
            tools: request.tools,
            signal,
          }),
        this.providerTimeoutMs,
        `Provider '${adapter.name}'`,
      );
    } catch (err) {
      const error = err instanceof LLMError ? err : new LLMError(errorMessage(err));
      return error instanceof RateLimitError
        ? { status: "rate_limited", error }
        : { status: "failed", error };
    }
  }

  /** Generate a response, failing over until one provider answers. */
  async generate(request: RouteRequest): Promise<LLMResponse> {
    const { attempts, tier } = this.plan(request);
    const failures: ProviderFailure[] = [];

    for (const attempt of attempts) {
      const adapter = this.providers.get(attempt.provider);
      if (!adapter) continue;

      this.notifier.notify("llm.request", { ...attempt, tier });
      const outcome = await this.attempt(adapter, request, attempt.model);
      if (outcome.status !== "ok") {
        this.recordFailure(failures, attempt, outcome.error);
        continue;
      }

      const response = outcome.response;
      this.requestCount++;
      this.tokenCount += totalTokens(response);
      this.latencyTotalMs += response.latencyMs;
      this.notifier.notify("llm.response", {
        provider: response.provider,
        model: response.model,
        latencyMs: response.latencyMs,
        tokens: totalTokens(response),
      });
      return response;
    }

    throw new AllProvidersFailedError(failures);
  }

  /**
   * Stream a response. A provider that fails before its first chunk is
   * skipped; once output has been delivered a failure ends the stream with
   * StreamInterruptedError.
   */
  async *stream(request: StreamRouteRequest): AsyncGenerator<StreamChunk> {
    const { attempts, tier } = this.plan(request);
    const failures: ProviderFailure[] = [];

    for (const attempt of attempts) {
      const adapter = this.providers.get(attempt.provider);
      if (!adapter) continue;

      const controller = new AbortController();
      const start = performance.now();
      let delivered = false;
      let partial = "";

      this.notifier.notify("llm.request", { ...attempt, tier });
      this.notifier.notify("llm.stream.start", attempt);

      try {
        const iterator = adapter
          .stream({
            messages: request.messages,
            model: attempt.model,
            temperature: request.temperature ?? this.temperature,
            maxTokens: request.maxTokens ?? this.maxTokens,
            signal: controller.signal,
          })
          [Symbol.asyncIterator]();

        let sawFinal = false;
        while (!sawFinal) {
          let next: IteratorResult<StreamChunk>;
          try {
            next = await withTimeout(
              () => iterator.next(),
              this.providerTimeoutMs,
              `Stream from '${adapter.name}'`,
            );
          } catch (err) {
            controller.abort(err);
            const error = err instanceof LLMError ? err : new LLMError(errorMessage(err));
            if (delivered) {
              this.recordFailure(failures, attempt, error);
              throw new StreamInterruptedError(adapter.name, partial, error.message);
            }
            throw error;
          }

          if (next.done) break;
          const chunk = next.value;
          sawFinal = chunk.isFinal;
          partial += chunk.content;
          delivered = true;
          yield chunk;
        }

        if (!sawFinal) {
          yield { content: "", isFinal: true, model: attempt.model, provider: adapter.name };
        }

        this.requestCount++;
        this.latencyTotalMs += performance.now() - start;
        this.notifier.notify("llm.stream.end", { ...attempt, chars: partial.length });
        return;
      } catch (err) {
        if (err instanceof StreamInterruptedError) throw err;
        const error = err instanceof LLMError ? err : new LLMError(errorMessage(err));
        this.recordFailure(failures, attempt, error);
      } finally {
        controller.abort();
      }
    }

    throw new AllProvidersFailedError(failures);
  }

  /** Make `provider` current; its default model unless one is given. */
  switchProvider(provider: string, model?: string): void {
    if (!this.providers.has(provider)) {
      throw new ProviderNotAvailableError(provider);
    }
    this._currentProvider = provider;
    this._currentModel = model ?? this.defaultModelFor(provider);
    this.notifier.notify("llm.provider.changed", {
      provider,
      model: this._currentModel,
    });
    console.log(`[router] switched to ${provider} / ${this._currentModel}`);
  }

  switchModel(model: string): void {
    this._currentModel = model;
    this.notifier.notify("llm.model.changed", {
      provider: this._currentProvider ?? "",
      model,
    });
  }

  /** Models per active provider; a provider that errors reports none. */
  async getAllModels(): Promise<Record<string, ModelInfo[]>> {
    const result: Record<string, ModelInfo[]> = {};
    for (const [name, adapter] of this.providers) {
      try {
        result[name] = await adapter.getModels();
      } catch {
        result[name] = [];
      }
    }
    return result;
  }

  getToolCallFormat(provider: string): ToolCallFormat {
    return this.providers.get(provider)?.toolCallFormat ?? "openai";
  }

  get currentProvider(): string | undefined {
    return this._currentProvider;
  }

  get currentModel(): string | undefined {
    return this._currentModel;
  }

  get availableProviders(): string[] {
    return Array.from(this.providers.keys());
  }

  /** True when a cloud provider is active. */
  get isOnline(): boolean {
    return this.availableProviders.some((p) => !LOCAL_PROVIDERS.includes(p));
  }

  get isOfflineCapable(): boolean {
    return this.availableProviders.some((p) => LOCAL_PROVIDERS.includes(p));
  }

  get stats(): RouterStats {
    const avg = this.requestCount > 0 ? this.latencyTotalMs / this.requestCount : 0;
    return {
      totalRequests: this.requestCount,
      totalTokens: this.tokenCount,
      avgLatencyMs: Math.round(avg * 10) / 10,
      providers: this.availableProviders,
      current: `${this._currentProvider ?? "none"}/${this._currentModel ?? "none"}`,
    };
  }

  /** Close every provider and forget them. */
  async shutdown(): Promise<void> {
    for (const [name, adapter] of this.providers) {
      try {
        await adapter.close?.();
      } catch (err) {
        console.warn(`[router] error closing ${name}: ${errorMessage(err)}`);
      }
    }
    this.providers.clear();
    this.failoverOrder = [];
    console.log("[router] shut down");
  }
}
