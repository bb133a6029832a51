import { describe, it, expect } from "vitest";

import {
  TIERS,
  classifyQuery,
  extractLatestUserQuery,
} from "../src/router/classifier.js";
import { TIER_MODELS, tierModelFor } from "../src/router/tiers.js";
import { getModelInfo } from "../src/providers/models.js";
import {
  assistantMessage,
  systemMessage,
  userMessage,
  userMessageWithImage,
} from "../src/providers/base.js";

describe("router/classifier", () => {
  it.each(["hello", "Hi!", "good morning", "thanks", "bye", "  how are you?  "])(
    "classifies %j as simple",
    (text) => {
      expect(classifyQuery(text)).toBe("simple");
    },
  );

  it.each([
    "search for the latest TypeScript news",
    "what's the weather in Tokyo?",
    "calculate 15 * 37",
    "open notepad",
    "run this script please",
    "set a timer for 5 minutes",
  ])("classifies %j as tool", (text) => {
    expect(classifyQuery(text)).toBe("tool");
  });

  it.each([
    "explain how transformers work in deep learning",
    "compare React vs Vue",
    "debug this function and optimize it",
    "write a detailed essay on climate change",
  ])("classifies %j as complex", (text) => {
    expect(classifyQuery(text)).toBe("complex");
  });

  it.each(["how does a car engine work", "what is photosynthesis"])(
    "classifies %j as normal",
    (text) => {
      expect(classifyQuery(text)).toBe("normal");
    },
  );

  it.each([
    "describe this image",
    "analyze the photo I uploaded",
    "what do you see in this picture",
    "read the text in this screenshot",
  ])("classifies %j as vision", (text) => {
    expect(classifyQuery(text)).toBe("vision");
  });

  it("treats any query with an image as vision", () => {
    expect(classifyQuery("hello", true)).toBe("vision");
    expect(classifyQuery("calculate 2 + 2", true)).toBe("vision");
    expect(classifyQuery("", true)).toBe("vision");
  });

  it("routes long generic messages to complex", () => {
    const text = "This is a message. ".repeat(30);
    expect(text.trim().length).toBeGreaterThan(500);
    expect(classifyQuery(text)).toBe("complex");
  });

  it("keeps short generic messages normal", () => {
    expect(classifyQuery("a".repeat(500))).toBe("normal");
    expect(classifyQuery("a".repeat(501))).toBe("complex");
  });

  it("only treats a greeting as simple when it is the whole message", () => {
    expect(classifyQuery("hello, how does a car engine work")).toBe("normal");
  });

  it("is deterministic", () => {
    const text = "compare the pros and cons of electric cars";
    const first = classifyQuery(text);
    for (let i = 0; i < 5; i++) {
      expect(classifyQuery(text)).toBe(first);
    }
  });
});

describe("router/classifier extractLatestUserQuery", () => {
  it("returns the last user message", () => {
    const messages = [
      systemMessage("sys"),
      userMessage("first"),
      assistantMessage("answer"),
      userMessage("second"),
      assistantMessage("another"),
    ];
    expect(extractLatestUserQuery(messages)).toEqual({ text: "second", hasImage: false });
  });

  it("joins text parts and flags images", () => {
    const messages = [userMessageWithImage("what is in it", "data:image/png;base64,AAAA")];
    expect(extractLatestUserQuery(messages)).toEqual({
      text: "what is in it",
      hasImage: true,
    });
  });

  it("returns empty text without user messages", () => {
    expect(extractLatestUserQuery([systemMessage("sys")])).toEqual({
      text: "",
      hasImage: false,
    });
  });
});

describe("router/tiers", () => {
  it("has a model for every tier and provider", () => {
    for (const tier of TIERS) {
      for (const provider of ["groq", "gemini", "ollama"]) {
        expect(TIER_MODELS[tier][provider]).toBeTruthy();
      }
    }
  });

  it("only names catalogued models", () => {
    for (const tier of TIERS) {
      for (const [provider, model] of Object.entries(TIER_MODELS[tier])) {
        expect(getModelInfo(model, provider)?.provider).toBe(provider);
      }
    }
    expect(getModelInfo("no-such-model")).toBeUndefined();
  });

  it("looks up tier models per provider", () => {
    expect(tierModelFor("simple", "groq")).toBe("llama-3.1-8b-instant");
    expect(tierModelFor("complex", "gemini")).toBe("gemini-2.5-pro");
    expect(tierModelFor("vision", "groq")).toBe("meta-llama/llama-4-scout-17b-16e-instruct");
    expect(tierModelFor("normal", "unknown")).toBeUndefined();
  });
});
