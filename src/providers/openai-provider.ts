import OpenAI from "openai";
import type {
  ChatMessage,
  GenerateOutcome,
  GenerateRequest,
  ModelInfo,
  ProviderAdapter,
  StreamChunk,
  StreamRequest,
} from "./base.js";
import { messageText } from "./base.js";
import { LLMError, RateLimitError, errorMessage } from "./errors.js";

export interface OpenAICompatibleOptions {
  name: string;
  apiKey: string;
  apiBase?: string | null;
  defaultModel: string;
  /** Models advertised once the endpoint answers. */
  catalog: ModelInfo[];
  timeoutMs?: number;
}

function toOpenAIMessage(msg: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (msg.role) {
    case "system":
      return { role: "system", content: messageText(msg) };
    case "user":
      return { role: "user", content: msg.content };
    case "assistant":
      return {
        role: "assistant",
        content: messageText(msg),
        ...(msg.tool_calls ? { tool_calls: msg.tool_calls } : {}),
      };
    case "tool":
      return {
        role: "tool",
        content: messageText(msg),
        tool_call_id: msg.tool_call_id ?? "",
      };
  }
}

function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const seconds = Number.parseFloat(value);
  return Number.isFinite(seconds) ? seconds : undefined;
}

/**
 * Provider for any OpenAI-compatible chat completions endpoint, using the
 * OpenAI SDK. Failover is the router's job, so SDK retries are off.
 */
export class OpenAICompatibleProvider implements ProviderAdapter {
  readonly name: string;
  readonly toolCallFormat = "openai" as const;

  protected client: OpenAI;
  protected defaultModel: string;
  private catalog: ModelInfo[];

  constructor(options: OpenAICompatibleOptions) {
    this.name = options.name;
    this.defaultModel = options.defaultModel;
    this.catalog = options.catalog;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.apiBase ?? undefined,
      maxRetries: 0,
      ...(options.timeoutMs ? { timeout: options.timeoutMs } : {}),
    });
  }

  async initialize(): Promise<boolean> {
    const models = await this.getModels();
    if (models.length === 0) {
      console.warn(`[${this.name}] health check failed, check the API key`);
      return false;
    }
    console.log(`[${this.name}] provider ready`);
    return true;
  }

  private toLLMError(err: unknown, action: string): LLMError {
    if (err instanceof OpenAI.RateLimitError) {
      return new RateLimitError(this.name, parseRetryAfter(err.headers?.["retry-after"]));
    }
    if (err instanceof LLMError) return err;
    if (err instanceof OpenAI.APIError) {
      return new LLMError(`${this.name} API error: ${err.status ?? "?"} - ${err.message}`);
    }
    return new LLMError(`${this.name} ${action} failed: ${errorMessage(err)}`);
  }

  async generate(request: GenerateRequest): Promise<GenerateOutcome> {
    const model = request.model || this.defaultModel;
    const start = performance.now();

    const params: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: request.messages.map(toOpenAIMessage),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    };
    if (request.tools && request.tools.length > 0) {
      params.tools = request.tools;
      params.tool_choice = "auto";
    }

    try {
      const completion = await this.client.chat.completions.create(params, {
        signal: request.signal,
      });
      const choice = completion.choices[0];
      if (!choice) {
        return {
          status: "failed",
          error: new LLMError(`${this.name} returned no choices`),
        };
      }

      return {
        status: "ok",
        response: {
          content: choice.message.content ?? "",
          model: completion.model || model,
          provider: this.name,
          promptTokens: completion.usage?.prompt_tokens ?? 0,
          completionTokens: completion.usage?.completion_tokens ?? 0,
          latencyMs: performance.now() - start,
          finishReason: choice.finish_reason ?? "stop",
          rawResponse: completion,
        },
      };
    } catch (err) {
      const error = this.toLLMError(err, "request");
      return error instanceof RateLimitError
        ? { status: "rate_limited", error }
        : { status: "failed", error };
    }
  }

  async *stream(request: StreamRequest): AsyncGenerator<StreamChunk> {
    const model = request.model || this.defaultModel;

    try {
      const stream = await this.client.chat.completions.create(
        {
          model,
          messages: request.messages.map(toOpenAIMessage),
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          stream: true,
        },
        { signal: request.signal },
      );

      for await (const chunk of stream) {
        const content = chunk.choices[0]?.delta?.content;
        if (content) {
          yield { content, isFinal: false, model, provider: this.name };
        }
      }
    } catch (err) {
      throw this.toLLMError(err, "stream");
    }

    yield { content: "", isFinal: true, model, provider: this.name };
  }

  async getModels(): Promise<ModelInfo[]> {
    try {
      await this.client.models.list();
      return this.catalog;
    } catch {
      return [];
    }
  }
}
