import type { LLMError, RateLimitError } from "./errors.js";

export type Role = "system" | "user" | "assistant" | "tool";

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

/** Tool call descriptor as replayed to the backend on assistant messages. */
export interface ToolCallDescriptor {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

/** Message in the LLM conversation. */
export interface ChatMessage {
  role: Role;
  content: string | ContentPart[];
  name?: string;
  tool_calls?: ToolCallDescriptor[];
  tool_call_id?: string;
}

/** Tool call request from the LLM, after normalization. */
export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/** Tool definition for the LLM. */
export interface ToolDefinition {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

/** Static description of a model a provider can serve. */
export interface ModelInfo {
  id: string;
  name: string;
  provider: string;
  contextWindow: number;
  maxOutput: number;
  supportsTools: boolean;
  supportsVision: boolean;
  supportsStreaming: boolean;
  description: string;
}

/** Response from a non-streaming LLM call. */
export interface LLMResponse {
  content: string;
  model: string;
  provider: string;
  promptTokens: number;
  completionTokens: number;
  latencyMs: number;
  finishReason: string;
  /** Backend-native payload. Tool-call extraction reads only this. */
  rawResponse: unknown;
}

/** A single piece of a streamed response. */
export interface StreamChunk {
  content: string;
  isFinal: boolean;
  model: string;
  provider: string;
}

/** Wire families for tool calls; one parser per family. */
export type ToolCallFormat = "openai" | "gemini" | "ollama";

export interface GenerateRequest {
  messages: ChatMessage[];
  model: string;
  temperature: number;
  maxTokens: number;
  tools?: ToolDefinition[];
  signal?: AbortSignal;
}

export type StreamRequest = Omit<GenerateRequest, "tools">;

export type GenerateOutcome =
  | { status: "ok"; response: LLMResponse }
  | { status: "rate_limited"; error: RateLimitError }
  | { status: "failed"; error: LLMError };

/** Contract every LLM backend implements to take part in routing. */
export interface ProviderAdapter {
  readonly name: string;
  readonly toolCallFormat: ToolCallFormat;

  /** Liveness/credential check. Resolves false instead of throwing. */
  initialize(): Promise<boolean>;

  generate(request: GenerateRequest): Promise<GenerateOutcome>;

  /**
   * Stream a response. Iteration rejects with RateLimitError or LLMError
   * on failure.
   */
  stream(request: StreamRequest): AsyncIterable<StreamChunk>;

  getModels(): Promise<ModelInfo[]>;

  close?(): Promise<void>;
}

export function totalTokens(response: LLMResponse): number {
  return response.promptTokens + response.completionTokens;
}

/** Concatenated text of a message's content. */
export function messageText(message: ChatMessage): string {
  if (typeof message.content === "string") return message.content;
  return message.content
    .filter((part): part is { type: "text"; text: string } => part.type === "text")
    .map((part) => part.text)
    .join(" ");
}

export function systemMessage(content: string): ChatMessage {
  return { role: "system", content };
}

export function userMessage(content: string): ChatMessage {
  return { role: "user", content };
}

export function userMessageWithImage(text: string, imageUrl: string): ChatMessage {
  return {
    role: "user",
    content: [
      { type: "text", text },
      { type: "image_url", image_url: { url: imageUrl } },
    ],
  };
}

export function assistantMessage(
  content: string,
  toolCalls?: ToolCallDescriptor[],
): ChatMessage {
  const msg: ChatMessage = { role: "assistant", content };
  if (toolCalls && toolCalls.length > 0) {
    msg.tool_calls = toolCalls;
  }
  return msg;
}

export function toolMessage(
  content: string,
  name: string,
  toolCallId: string,
): ChatMessage {
  return { role: "tool", content, name, tool_call_id: toolCallId };
}
