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
import { OLLAMA_MODELS } from "./models.js";
import { LLMError, toLLMError } from "./errors.js";
import { parseToolArguments } from "./tool-calls.js";
import {
  asArray,
  asNumber,
  asString,
  isRecord,
  readLines,
} from "../utils/helpers.js";

export const OLLAMA_API_BASE = "http://localhost:11434";

interface OllamaMessage {
  role: string;
  content: string;
  images?: string[];
  tool_calls?: Array<{
    function: { name: string; arguments: Record<string, unknown> };
  }>;
}

/** Ollama takes images as bare base64 beside the text. */
export function toOllamaMessage(msg: ChatMessage): OllamaMessage {
  const out: OllamaMessage = { role: msg.role, content: messageText(msg) };
  if (Array.isArray(msg.content)) {
    const images: string[] = [];
    for (const part of msg.content) {
      if (part.type !== "image_url") continue;
      const url = part.image_url.url;
      const comma = url.indexOf(",");
      images.push(url.startsWith("data:") && comma !== -1 ? url.slice(comma + 1) : url);
    }
    if (images.length > 0) out.images = images;
  }
  if (msg.tool_calls && msg.tool_calls.length > 0) {
    out.tool_calls = msg.tool_calls.map((tc) => ({
      function: {
        name: tc.function.name,
        arguments: parseToolArguments(tc.function.arguments),
      },
    }));
  }
  return out;
}

/** Local inference through an Ollama server. */
export class OllamaProvider implements ProviderAdapter {
  readonly name = "ollama";
  readonly toolCallFormat = "ollama" as const;

  private apiBase: string;
  private defaultModel: string;

  constructor(params: { apiBase?: string | null; defaultModel?: string } = {}) {
    this.apiBase = (params.apiBase ?? OLLAMA_API_BASE).replace(/\/+$/, "");
    this.defaultModel = params.defaultModel ?? "llama3.2:3b";
  }

  async initialize(): Promise<boolean> {
    const models = await this.getModels();
    if (models.length === 0) {
      console.warn(`[ollama] not reachable at ${this.apiBase}`);
      return false;
    }
    console.log(`[ollama] ${models.length} local models available`);
    return true;
  }

  private post(path: string, payload: Record<string, unknown>, signal?: AbortSignal): Promise<Response> {
    return fetch(`${this.apiBase}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal,
    });
  }

  async generate(request: GenerateRequest): Promise<GenerateOutcome> {
    const model = request.model || this.defaultModel;
    const start = performance.now();
    const payload: Record<string, unknown> = {
      model,
      messages: request.messages.map(toOllamaMessage),
      stream: false,
      options: {
        temperature: request.temperature,
        num_predict: request.maxTokens,
      },
    };
    if (request.tools && request.tools.length > 0) {
      payload.tools = request.tools;
    }

    try {
      const resp = await this.post("/api/chat", payload, request.signal);
      if (!resp.ok) {
        const body = await resp.text();
        return {
          status: "failed",
          error: new LLMError(`Ollama error: ${resp.status} - ${body}`),
        };
      }

      const data: unknown = await resp.json();
      if (!isRecord(data)) {
        return { status: "failed", error: new LLMError("Ollama returned a non-object body") };
      }
      const message: Record<string, unknown> = isRecord(data.message) ? data.message : {};

      return {
        status: "ok",
        response: {
          content: asString(message.content),
          model,
          provider: this.name,
          promptTokens: asNumber(data.prompt_eval_count),
          completionTokens: asNumber(data.eval_count),
          latencyMs: performance.now() - start,
          finishReason: asString(data.done_reason, "stop"),
          rawResponse: data,
        },
      };
    } catch (err) {
      return { status: "failed", error: toLLMError(err, "Ollama request failed") };
    }
  }

  async *stream(request: StreamRequest): AsyncGenerator<StreamChunk> {
    const model = request.model || this.defaultModel;
    const payload = {
      model,
      messages: request.messages.map(toOllamaMessage),
      stream: true,
      options: {
        temperature: request.temperature,
        num_predict: request.maxTokens,
      },
    };

    let resp: Response;
    try {
      resp = await this.post("/api/chat", payload, request.signal);
    } catch (err) {
      throw toLLMError(err, "Ollama stream failed");
    }
    if (!resp.ok || !resp.body) {
      await resp.body?.cancel();
      throw new LLMError(`Ollama stream failed: HTTP ${resp.status}`);
    }

    try {
      for await (const line of readLines(resp.body)) {
        if (!line.trim()) continue;
        let data: unknown;
        try {
          data = JSON.parse(line);
        } catch {
          continue;
        }
        if (!isRecord(data)) continue;
        const message: Record<string, unknown> = isRecord(data.message) ? data.message : {};
        const content = asString(message.content);
        if (content) {
          yield { content, isFinal: false, model, provider: this.name };
        }
        if (data.done === true) break;
      }
    } catch (err) {
      throw toLLMError(err, "Ollama stream failed");
    }

    yield { content: "", isFinal: true, model, provider: this.name };
  }

  /** Locally pulled models, described from the catalog where it knows them. */
  async getModels(): Promise<ModelInfo[]> {
    try {
      const resp = await fetch(`${this.apiBase}/api/tags`, {
        signal: AbortSignal.timeout(5000),
      });
      if (!resp.ok) return [];
      const data: unknown = await resp.json();
      if (!isRecord(data)) return [];

      const models: ModelInfo[] = [];
      for (const entry of asArray(data.models)) {
        if (!isRecord(entry)) continue;
        const id = asString(entry.name);
        if (!id) continue;
        const known = OLLAMA_MODELS.find((m) => m.id === id);
        models.push(
          known ?? {
            id,
            name: id,
            provider: this.name,
            contextWindow: 4096,
            maxOutput: 4096,
            supportsTools: false,
            supportsVision: false,
            supportsStreaming: true,
            description: "Local model",
          },
        );
      }
      return models;
    } catch {
      return [];
    }
  }
}
