import { describe, it, expect, vi, afterEach } from "vitest";

import { EventBus, silentNotifier } from "../src/bus/notifier.js";
import { EVENT_TYPES, createEvent } from "../src/bus/events.js";

describe("bus/events", () => {
  it("creates events with a source and timestamp", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2020-01-01T00:00:00.000Z"));
    const event = createEvent("agent.thinking", { iteration: 1 });
    expect(event).toEqual({
      type: "agent.thinking",
      data: { iteration: 1 },
      source: "system",
      timestamp: new Date("2020-01-01T00:00:00.000Z"),
    });
    vi.useRealTimers();
  });

  it("lists every event type once", () => {
    expect(new Set(EVENT_TYPES).size).toBe(EVENT_TYPES.length);
    expect(EVENT_TYPES).toContain("llm.stream.end");
    expect(EVENT_TYPES).toContain("agent.exhausted");
  });
});

describe("bus/EventBus", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("delivers events to subscribers of that type", () => {
    const bus = new EventBus();
    const seen: number[] = [];
    bus.on("agent.thinking", (event) => {
      seen.push(event.data.iteration);
    });
    bus.on("agent.exhausted", () => {
      seen.push(-1);
    });

    bus.notify("agent.thinking", { iteration: 1 });
    bus.notify("agent.thinking", { iteration: 2 });

    expect(seen).toEqual([1, 2]);
  });

  it("unsubscribes", () => {
    const bus = new EventBus();
    const handler = vi.fn();
    const off = bus.on("agent.error", handler);
    bus.notify("agent.error", { error: "a" });
    off();
    bus.notify("agent.error", { error: "b" });
    expect(handler).toHaveBeenCalledTimes(1);
    expect(bus.listenerCount("agent.error")).toBe(0);
  });

  it("runs once handlers a single time", () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.once("agent.error", handler);
    bus.notify("agent.error", { error: "a" });
    bus.notify("agent.error", { error: "b" });
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("delivers everything to wildcard handlers", () => {
    const bus = new EventBus();
    const types: string[] = [];
    const off = bus.onAny((event) => {
      types.push(event.type);
    });
    bus.notify("agent.thinking", { iteration: 1 }, "agent");
    bus.notify("llm.model.changed", { provider: "groq", model: "m" });
    off();
    bus.notify("agent.error", { error: "ignored" });
    expect(types).toEqual(["agent.thinking", "llm.model.changed"]);
  });

  it("keeps going when a handler throws or rejects", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const bus = new EventBus();
    const after = vi.fn();
    bus.on("agent.error", () => {
      throw new Error("sync failure");
    });
    bus.on("agent.error", async () => {
      throw new Error("async failure");
    });
    bus.on("agent.error", after);

    bus.notify("agent.error", { error: "x" });
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(2);
  });

  it("keeps a bounded history", () => {
    const bus = new EventBus();
    for (let i = 1; i <= 120; i++) {
      bus.notify("agent.thinking", { iteration: i });
    }
    bus.notify("agent.error", { error: "last" }, "agent");

    const all = bus.history(undefined, 1000);
    expect(all).toHaveLength(100);
    expect(all[0].data).toEqual({ iteration: 22 });
    expect(bus.history("agent.error")).toHaveLength(1);
    expect(bus.history("agent.error")[0].source).toBe("agent");
    expect(bus.history("agent.thinking", 2).map((e) => e.data)).toEqual([
      { iteration: 119 },
      { iteration: 120 },
    ]);

    bus.clear();
    expect(bus.history()).toEqual([]);
  });

  it("silent notifier accepts events", () => {
    expect(() => silentNotifier.notify("agent.thinking", { iteration: 1 })).not.toThrow();
  });
});
