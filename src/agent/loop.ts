import type {
  ChatMessage,
  LLMResponse,
  ToolCallRequest,
  ToolDefinition,
} from "../providers/base.js";
import {
  assistantMessage,
  systemMessage,
  toolMessage,
  userMessage,
  userMessageWithImage,
} from "../providers/base.js";
import { errorMessage } from "../providers/errors.js";
import {
  extractToolCalls,
  normalizeToolCalls,
  toToolCallDescriptors,
} from "../providers/tool-calls.js";
import type { LLMRouter } from "../router/router.js";
import { silentNotifier, type Notifier } from "../bus/notifier.js";
import { truncateString } from "../utils/helpers.js";
import { ContextBuilder, readImageAsDataUrl } from "./context.js";
import { ToolRegistry } from "./tools/registry.js";
import { renderToolResult, type Tool } from "./tools/base.js";

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_MAX_HISTORY = 50;

export const EXHAUSTED_MESSAGE =
  "I've done extensive research but couldn't finalize an answer. Here's what I found so far.";

const DEFAULT_IMAGE_PROMPT = "Describe this image in detail.";

/** The parts of the router the agent drives. */
export type AgentRouter = Pick<LLMRouter, "generate" | "stream" | "getToolCallFormat">;

export interface AgentOptions {
  maxIterations?: number;
  maxHistory?: number;
  /** Deadline per tool call; 0 disables it. */
  toolTimeoutMs?: number;
  tools?: Tool[];
  systemPrompt?: string;
}

/** Where the last answer came from. */
export interface ResponseMeta {
  provider: string;
  model: string;
  latencyMs: number;
  iterations: number;
}

type TurnResult =
  | { kind: "final"; response: LLMResponse; iterations: number }
  | { kind: "exhausted" }
  | { kind: "error"; message: string };

export function apologyFor(err: unknown): string {
  return `Sorry, I encountered an error: ${errorMessage(err)}`;
}

/**
 * The assistant's think-act-observe loop.
 *
 * 1. Appends the user message to history
 * 2. Calls the router with the registered tool schemas
 * 3. Runs requested tools concurrently and feeds the results back
 * 4. Stops at a plain answer or after maxIterations calls
 */
export class AssistantAgent {
  readonly tools = new ToolRegistry();
  readonly context: ContextBuilder;

  private router: AgentRouter;
  private notifier: Notifier;
  private maxIterations: number;
  private maxHistory: number;
  private toolTimeoutMs: number;
  private history: ChatMessage[] = [];
  private _lastResponseMeta: ResponseMeta | undefined;

  constructor(router: AgentRouter, notifier: Notifier = silentNotifier, options: AgentOptions = {}) {
    this.router = router;
    this.notifier = notifier;
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
    this.toolTimeoutMs = options.toolTimeoutMs ?? 0;
    this.context = new ContextBuilder({ systemPrompt: options.systemPrompt });
    for (const tool of options.tools ?? []) {
      this.tools.register(tool);
    }
  }

  /** Answer a user message, calling tools as the model asks. */
  async process(userText: string, ragContext?: string): Promise<string> {
    this._lastResponseMeta = undefined;
    const start = performance.now();
    this.remember(userMessage(userText));
    const messages = this.buildMessages(ragContext);

    const turn = await this.runToolLoop(messages);
    switch (turn.kind) {
      case "error":
        return turn.message;
      case "exhausted":
        return EXHAUSTED_MESSAGE;
      case "final": {
        const { response, iterations } = turn;
        this.remember(assistantMessage(response.content));
        this.recordAnswer(response.content, response.provider, response.model, iterations, start);
        return response.content;
      }
    }
  }

  /**
   * Like process(), but the final answer is streamed. Tool turns run
   * through generate(); only the answer after them is streamed.
   */
  async *streamProcess(userText: string, ragContext?: string): AsyncGenerator<string> {
    this._lastResponseMeta = undefined;
    const start = performance.now();
    this.remember(userMessage(userText));
    const messages = this.buildMessages(ragContext);

    const turn = await this.runToolLoop(messages);
    if (turn.kind === "error") {
      yield turn.message;
      return;
    }
    if (turn.kind === "exhausted") {
      yield EXHAUSTED_MESSAGE;
      return;
    }

    let full = "";
    let provider = turn.response.provider;
    let model = turn.response.model;
    try {
      for await (const chunk of this.router.stream({ messages })) {
        provider = chunk.provider;
        model = chunk.model;
        if (chunk.content) {
          full += chunk.content;
          yield chunk.content;
        }
      }
    } catch (err) {
      this.notifier.notify("agent.error", { error: errorMessage(err) });
      console.error(`[agent] stream failed: ${errorMessage(err)}`);
      yield full ? `\n\n${apologyFor(err)}` : apologyFor(err);
      return;
    }

    this.remember(assistantMessage(full));
    this.recordAnswer(full, provider, model, turn.iterations, start);
  }

  /** One-shot question about an image, routed to a vision model. No tools. */
  async processWithImage(text: string, imagePath: string): Promise<string> {
    this._lastResponseMeta = undefined;
    const start = performance.now();
    const image = await readImageAsDataUrl(imagePath);
    if (!image) {
      return `Image file not found: ${imagePath}`;
    }

    const prompt = text.trim() || DEFAULT_IMAGE_PROMPT;
    this.remember(userMessage(`[Image: ${image.fileName}] ${prompt}`));
    const messages: ChatMessage[] = [
      systemMessage(this.context.buildSystemPrompt(this.tools.getNames())),
      userMessageWithImage(prompt, image.url),
    ];

    this.notifier.notify("agent.thinking", { iteration: 1 });
    try {
      const response = await this.router.generate({
        messages,
        autoRoute: true,
        tier: "vision",
      });
      this.remember(assistantMessage(response.content));
      this.recordAnswer(response.content, response.provider, response.model, 1, start);
      return response.content;
    } catch (err) {
      return this.fail(err);
    }
  }

  private buildMessages(ragContext?: string): ChatMessage[] {
    return this.context.buildMessages({
      history: this.history,
      toolNames: this.tools.getNames(),
      ragContext,
      maxHistory: this.maxHistory,
    });
  }

  /** Mutates `messages` with each tool round; history is left alone. */
  private async runToolLoop(messages: ChatMessage[]): Promise<TurnResult> {
    const schemas = this.getToolSchemas();

    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      this.notifier.notify("agent.thinking", { iteration });

      let response: LLMResponse;
      try {
        response = await this.router.generate({
          messages,
          tools: schemas.length > 0 ? schemas : undefined,
        });
      } catch (err) {
        return { kind: "error", message: this.fail(err) };
      }

      const format = this.router.getToolCallFormat(response.provider);
      const raw = extractToolCalls(format, response.rawResponse);
      if (raw.length === 0) {
        return { kind: "final", response, iterations: iteration };
      }

      const calls = normalizeToolCalls(raw);
      messages.push(assistantMessage(response.content, toToolCallDescriptors(calls)));
      messages.push(...(await this.executeToolCalls(calls)));
    }

    console.warn(`[agent] no final answer after ${this.maxIterations} iterations`);
    this.notifier.notify("agent.exhausted", { iterations: this.maxIterations });
    return { kind: "exhausted" };
  }

  /** Run every call at once; messages come back in request order. */
  private async executeToolCalls(calls: ToolCallRequest[]): Promise<ChatMessage[]> {
    for (const call of calls) {
      console.log(`[agent] executing tool: ${call.name}(${truncateString(JSON.stringify(call.arguments), 200)})`);
      this.notifier.notify("agent.tool.call", {
        id: call.id,
        name: call.name,
        arguments: call.arguments,
      });
    }

    const results = await Promise.all(
      calls.map((call) =>
        this.tools.execute(call.name, call.arguments, { timeoutMs: this.toolTimeoutMs }),
      ),
    );

    return calls.map((call, i) => {
      const output = renderToolResult(results[i]);
      this.notifier.notify("agent.tool.result", {
        id: call.id,
        name: call.name,
        success: results[i].success,
        output: truncateString(output, 200),
      });
      return toolMessage(output, call.name, call.id);
    });
  }

  private fail(err: unknown): string {
    const message = errorMessage(err);
    console.error(`[agent] ${message}`);
    this.notifier.notify("agent.error", { error: message });
    return apologyFor(err);
  }

  private recordAnswer(
    content: string,
    provider: string,
    model: string,
    iterations: number,
    start: number,
  ): void {
    const latencyMs = performance.now() - start;
    this._lastResponseMeta = { provider, model, latencyMs, iterations };
    this.notifier.notify("agent.response", { content, provider, model, iterations });
  }

  private remember(message: ChatMessage): void {
    this.history.push(message);
    if (this.history.length > this.maxHistory) {
      this.history = this.history.slice(-this.maxHistory);
    }
  }

  get lastResponseMeta(): ResponseMeta | undefined {
    return this._lastResponseMeta;
  }

  clearHistory(): void {
    this.history = [];
  }

  getHistory(): ChatMessage[] {
    return [...this.history];
  }

  registerTool(tool: Tool): void {
    this.tools.register(tool);
    console.log(`[agent] registered tool: ${tool.name}`);
  }

  getToolSchemas(): ToolDefinition[] {
    return this.tools.getDefinitions();
  }

  get toolNames(): string[] {
    return this.tools.getNames();
  }

  get toolCount(): number {
    return this.tools.size;
  }
}
