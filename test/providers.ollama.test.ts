import { describe, it, expect, vi, afterEach } from "vitest";

import { OLLAMA_API_BASE, OllamaProvider, toOllamaMessage } from "../src/providers/ollama-provider.js";
import type { GenerateRequest, StreamChunk } from "../src/providers/base.js";
import { assistantMessage, userMessage, userMessageWithImage } from "../src/providers/base.js";

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function stubFetch(respond: (...args: FetchArgs) => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (...args: FetchArgs) => respond(...args));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

const REQUEST: GenerateRequest = {
  messages: [userMessage("hello")],
  model: "llama3.2:3b",
  temperature: 0.7,
  maxTokens: 256,
};

describe("providers/ollama messages", () => {
  it("moves images out of the content", () => {
    expect(toOllamaMessage(userMessageWithImage("look", "data:image/jpeg;base64,QUJD"))).toEqual({
      role: "user",
      content: "look",
      images: ["QUJD"],
    });
  });

  it("decodes tool call arguments", () => {
    const msg = assistantMessage("", [
      { id: "c", type: "function", function: { name: "t", arguments: '{"a":1}' } },
    ]);
    expect(toOllamaMessage(msg)).toEqual({
      role: "assistant",
      content: "",
      tool_calls: [{ function: { name: "t", arguments: { a: 1 } } }],
    });
  });
});

describe("providers/OllamaProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("generates a response", async () => {
    const fetchMock = stubFetch(() =>
      Response.json({
        message: { role: "assistant", content: "Hi!" },
        done: true,
        done_reason: "stop",
        prompt_eval_count: 11,
        eval_count: 4,
      }),
    );

    const outcome = await new OllamaProvider().generate(REQUEST);

    expect(outcome.status === "ok" && outcome.response).toMatchObject({
      content: "Hi!",
      model: "llama3.2:3b",
      provider: "ollama",
      promptTokens: 11,
      completionTokens: 4,
      finishReason: "stop",
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${OLLAMA_API_BASE}/api/chat`);
    expect(JSON.parse(typeof init?.body === "string" ? init.body : "null")).toEqual({
      model: "llama3.2:3b",
      messages: [{ role: "user", content: "hello" }],
      stream: false,
      options: { temperature: 0.7, num_predict: 256 },
    });
  });

  it("reports HTTP errors", async () => {
    stubFetch(() => new Response("model not found", { status: 404 }));
    const outcome = await new OllamaProvider().generate(REQUEST);
    expect(outcome.status === "failed" && outcome.error.message).toBe(
      "Ollama error: 404 - model not found",
    );
  });

  it("reports an unreachable server", async () => {
    stubFetch(() => {
      throw new TypeError("fetch failed");
    });
    const outcome = await new OllamaProvider().generate(REQUEST);
    expect(outcome.status === "failed" && outcome.error.message).toBe(
      "Ollama request failed: fetch failed",
    );
  });

  it("streams newline-delimited JSON until done", async () => {
    const body = [
      JSON.stringify({ message: { content: "Hel" }, done: false }),
      JSON.stringify({ message: { content: "lo" }, done: false }),
      JSON.stringify({ message: { content: "" }, done: true }),
      JSON.stringify({ message: { content: "ignored" }, done: false }),
      "",
    ].join("\n");
    stubFetch(() => new Response(body));

    const out: StreamChunk[] = [];
    for await (const chunk of new OllamaProvider({ apiBase: "http://gpu-box:11434/" }).stream(REQUEST)) {
      out.push(chunk);
    }

    expect(out).toEqual([
      { content: "Hel", isFinal: false, model: "llama3.2:3b", provider: "ollama" },
      { content: "lo", isFinal: false, model: "llama3.2:3b", provider: "ollama" },
      { content: "", isFinal: true, model: "llama3.2:3b", provider: "ollama" },
    ]);
  });

  it("lists local models", async () => {
    const fetchMock = stubFetch(() =>
      Response.json({ models: [{ name: "llama3.2:3b" }, { name: "my-custom:latest" }] }),
    );

    const models = await new OllamaProvider({ apiBase: "http://gpu-box:11434/" }).getModels();

    expect(fetchMock.mock.calls[0][0]).toBe("http://gpu-box:11434/api/tags");
    expect(models.map((m) => m.id)).toEqual(["llama3.2:3b", "my-custom:latest"]);
    expect(models[1]).toEqual({
      id: "my-custom:latest",
      name: "my-custom:latest",
      provider: "ollama",
      contextWindow: 4096,
      maxOutput: 4096,
      supportsTools: false,
      supportsVision: false,
      supportsStreaming: true,
      description: "Local model",
    });
  });

  it("is unavailable when no server answers", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    stubFetch(() => {
      throw new TypeError("fetch failed");
    });
    expect(await new OllamaProvider().initialize()).toBe(false);
  });
});
