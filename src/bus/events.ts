/** Payload carried by each event type. */
export interface EventPayloads {
  "llm.request": { provider: string; model: string; tier?: string };
  "llm.response": {
    provider: string;
    model: string;
    latencyMs: number;
    tokens: number;
  };
  "llm.error": {
    provider: string;
    model: string;
    error: string;
    rateLimited: boolean;
  };
  "llm.stream.start": { provider: string; model: string };
  "llm.stream.end": { provider: string; model: string; chars: number };
  "llm.provider.changed": { provider: string; model: string };
  "llm.model.changed": { provider: string; model: string };
  "agent.thinking": { iteration: number };
  "agent.tool.call": {
    id: string;
    name: string;
    arguments: Record<string, unknown>;
  };
  "agent.tool.result": {
    id: string;
    name: string;
    success: boolean;
    output: string;
  };
  "agent.response": {
    content: string;
    provider: string;
    model: string;
    iterations: number;
  };
  "agent.error": { error: string };
  "agent.exhausted": { iterations: number };
}

export type EventType = keyof EventPayloads;

export const EVENT_TYPES: readonly EventType[] = [
  "llm.request",
  "llm.response",
  "llm.error",
  "llm.stream.start",
  "llm.stream.end",
  "llm.provider.changed",
  "llm.model.changed",
  "agent.thinking",
  "agent.tool.call",
  "agent.tool.result",
  "agent.response",
  "agent.error",
  "agent.exhausted",
];

/** An emitted event. */
export interface AssistantEvent<K extends EventType = EventType> {
  type: K;
  data: EventPayloads[K];
  source: string;
  timestamp: Date;
}

/** Create an event with defaults. */
export function createEvent<K extends EventType>(
  type: K,
  data: EventPayloads[K],
  source = "system",
): AssistantEvent<K> {
  return { type, data, source, timestamp: new Date() };
}
