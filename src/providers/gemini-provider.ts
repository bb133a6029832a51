import type {
  ChatMessage,
  ContentPart,
  GenerateOutcome,
  GenerateRequest,
  ModelInfo,
  ProviderAdapter,
  StreamChunk,
  StreamRequest,
  ToolDefinition,
} from "./base.js";
import { messageText } from "./base.js";
import { GEMINI_MODELS } from "./models.js";
import { LLMError, RateLimitError, toLLMError } from "./errors.js";
import { parseToolArguments } from "./tool-calls.js";
import {
  asArray,
  asNumber,
  asString,
  isRecord,
  readLines,
} from "../utils/helpers.js";

export const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta";

type GeminiPart = Record<string, unknown>;

interface GeminiContent {
  role: "user" | "model";
  parts: GeminiPart[];
}

interface GeminiPayload {
  contents: GeminiContent[];
  generationConfig: Record<string, number>;
  systemInstruction?: { parts: GeminiPart[] };
  tools?: Array<{ functionDeclarations: Array<Record<string, unknown>> }>;
}

function convertPart(part: ContentPart): GeminiPart | null {
  if (part.type === "text") return { text: part.text };
  const url = part.image_url.url;
  const match = /^data:([^;,]+);base64,(.*)$/s.exec(url);
  if (!match) return null;
  return { inlineData: { mimeType: match[1], data: match[2] } };
}

/** Split out system text and map the rest onto Gemini's contents. */
export function convertMessages(messages: ChatMessage[]): {
  systemInstruction: string;
  contents: GeminiContent[];
} {
  const system: string[] = [];
  const contents: GeminiContent[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        system.push(messageText(msg));
        break;
      case "user": {
        const parts =
          typeof msg.content === "string"
            ? [{ text: msg.content }]
            : msg.content
                .map(convertPart)
                .filter((p): p is GeminiPart => p !== null);
        contents.push({ role: "user", parts: parts.length > 0 ? parts : [{ text: "" }] });
        break;
      }
      case "assistant": {
        const parts: GeminiPart[] = [];
        const text = messageText(msg);
        if (text) parts.push({ text });
        for (const call of msg.tool_calls ?? []) {
          parts.push({
            functionCall: {
              name: call.function.name,
              args: parseToolArguments(call.function.arguments),
            },
          });
        }
        contents.push({ role: "model", parts: parts.length > 0 ? parts : [{ text: "" }] });
        break;
      }
      case "tool": {
        const part: GeminiPart = {
          functionResponse: {
            name: msg.name ?? "tool",
            response: { result: messageText(msg) },
          },
        };
        // Responses to one model turn share a single user turn.
        const last = contents.at(-1);
        if (last?.role === "user" && last.parts.every((p) => "functionResponse" in p)) {
          last.parts.push(part);
        } else {
          contents.push({ role: "user", parts: [part] });
        }
        break;
      }
    }
  }

  return { systemInstruction: system.join("\n\n"), contents };
}

/** Convert OpenAI-style tool schemas to Gemini function declarations. */
export function convertTools(
  tools: ToolDefinition[],
): Array<{ functionDeclarations: Array<Record<string, unknown>> }> {
  if (tools.length === 0) return [];
  return [
    {
      functionDeclarations: tools.map((t) => ({
        name: t.function.name,
        description: t.function.description,
        parameters: t.function.parameters,
      })),
    },
  ];
}

function candidateText(data: unknown): string {
  if (!isRecord(data)) return "";
  const [candidate] = asArray(data.candidates);
  if (!isRecord(candidate) || !isRecord(candidate.content)) return "";
  return asArray(candidate.content.parts)
    .map((p) => (isRecord(p) ? asString(p.text) : ""))
    .join("");
}

function retryAfterSeconds(resp: Response): number | undefined {
  const header = resp.headers.get("retry-after");
  if (!header) return undefined;
  const seconds = Number.parseFloat(header);
  return Number.isFinite(seconds) ? seconds : undefined;
}

/** Google Gemini through the v1beta REST API. */
export class GeminiProvider implements ProviderAdapter {
  readonly name = "gemini";
  readonly toolCallFormat = "gemini" as const;

  private apiKey: string;
  private apiBase: string;
  private defaultModel: string;

  constructor(params: {
    apiKey: string;
    apiBase?: string | null;
    defaultModel?: string;
  }) {
    this.apiKey = params.apiKey;
    this.apiBase = (params.apiBase ?? GEMINI_API_BASE).replace(/\/+$/, "");
    this.defaultModel = params.defaultModel ?? "gemini-2.5-flash";
  }

  async initialize(): Promise<boolean> {
    const models = await this.getModels();
    if (models.length === 0) {
      console.warn("[gemini] health check failed, check the API key");
      return false;
    }
    console.log("[gemini] provider ready");
    return true;
  }

  private buildPayload(
    messages: ChatMessage[],
    temperature: number,
    maxTokens: number,
    tools?: ToolDefinition[],
  ): GeminiPayload {
    const { systemInstruction, contents } = convertMessages(messages);
    const payload: GeminiPayload = {
      contents,
      generationConfig: {
        temperature,
        maxOutputTokens: maxTokens,
        topP: 0.95,
      },
    };
    if (systemInstruction) {
      payload.systemInstruction = { parts: [{ text: systemInstruction }] };
    }
    const declarations = convertTools(tools ?? []);
    if (declarations.length > 0) {
      payload.tools = declarations;
    }
    return payload;
  }

  private post(url: string, payload: GeminiPayload, signal?: AbortSignal): Promise<Response> {
    return fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-goog-api-key": this.apiKey,
      },
      body: JSON.stringify(payload),
      signal,
    });
  }

  async generate(request: GenerateRequest): Promise<GenerateOutcome> {
    const model = request.model || this.defaultModel;
    const start = performance.now();
    const payload = this.buildPayload(
      request.messages,
      request.temperature,
      request.maxTokens,
      request.tools,
    );

    try {
      const resp = await this.post(
        `${this.apiBase}/models/${model}:generateContent`,
        payload,
        request.signal,
      );

      if (resp.status === 429) {
        await resp.body?.cancel();
        return {
          status: "rate_limited",
          error: new RateLimitError(this.name, retryAfterSeconds(resp)),
        };
      }
      if (!resp.ok) {
        const body = await resp.text();
        return {
          status: "failed",
          error: new LLMError(`Gemini API error: ${resp.status} - ${body}`),
        };
      }

      const data: unknown = await resp.json();
      if (!isRecord(data)) {
        return { status: "failed", error: new LLMError("Gemini returned a non-object body") };
      }
      const [candidate] = asArray(data.candidates);
      if (!isRecord(candidate)) {
        return { status: "failed", error: new LLMError("Gemini returned no candidates") };
      }
      const usage: Record<string, unknown> = isRecord(data.usageMetadata) ? data.usageMetadata : {};

      return {
        status: "ok",
        response: {
          content: candidateText(data),
          model,
          provider: this.name,
          promptTokens: asNumber(usage.promptTokenCount),
          completionTokens: asNumber(usage.candidatesTokenCount),
          latencyMs: performance.now() - start,
          finishReason: asString(candidate.finishReason, "STOP"),
          rawResponse: data,
        },
      };
    } catch (err) {
      return { status: "failed", error: toLLMError(err, "Gemini request failed") };
    }
  }

  async *stream(request: StreamRequest): AsyncGenerator<StreamChunk> {
    const model = request.model || this.defaultModel;
    const payload = this.buildPayload(request.messages, request.temperature, request.maxTokens);

    let resp: Response;
    try {
      resp = await this.post(
        `${this.apiBase}/models/${model}:streamGenerateContent?alt=sse`,
        payload,
        request.signal,
      );
    } catch (err) {
      throw toLLMError(err, "Gemini stream failed");
    }
    if (resp.status === 429) {
      await resp.body?.cancel();
      throw new RateLimitError(this.name, retryAfterSeconds(resp));
    }
    if (!resp.ok || !resp.body) {
      await resp.body?.cancel();
      throw new LLMError(`Gemini stream failed: HTTP ${resp.status}`);
    }

    try {
      for await (const line of readLines(resp.body)) {
        if (!line.startsWith("data: ")) continue;
        const dataStr = line.slice(6).trim();
        if (!dataStr) continue;
        let data: unknown;
        try {
          data = JSON.parse(dataStr);
        } catch {
          continue;
        }
        const text = candidateText(data);
        if (text) {
          yield { content: text, isFinal: false, model, provider: this.name };
        }
      }
    } catch (err) {
      throw toLLMError(err, "Gemini stream failed");
    }

    yield { content: "", isFinal: true, model, provider: this.name };
  }

  async getModels(): Promise<ModelInfo[]> {
    try {
      const resp = await fetch(`${this.apiBase}/models`, {
        headers: { "x-goog-api-key": this.apiKey },
        signal: AbortSignal.timeout(10000),
      });
      return resp.ok ? GEMINI_MODELS : [];
    } catch {
      return [];
    }
  }
}
