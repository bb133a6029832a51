import { randomBytes } from "node:crypto";
import type {
  ToolCallDescriptor,
  ToolCallFormat,
  ToolCallRequest,
} from "./base.js";
import { asArray, asString, isRecord } from "../utils/helpers.js";

/** A tool call as found on the wire; backends may omit the id. */
export interface RawToolCall {
  id?: string;
  name: string;
  arguments: Record<string, unknown>;
}

type Parser = (raw: unknown) => RawToolCall[];

/** JSON-encoded or already-decoded arguments; anything else becomes {}. */
export function parseToolArguments(value: unknown): Record<string, unknown> {
  if (isRecord(value)) return value;
  if (typeof value !== "string" || !value.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(value);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/** choices[0].message.tool_calls[] = {id, function: {name, arguments}} */
const parseOpenAI: Parser = (raw) => {
  if (!isRecord(raw)) return [];
  const [choice] = asArray(raw.choices);
  if (!isRecord(choice) || !isRecord(choice.message)) return [];

  const calls: RawToolCall[] = [];
  for (const call of asArray(choice.message.tool_calls)) {
    if (!isRecord(call)) continue;
    const fn: Record<string, unknown> = isRecord(call.function)
      ? call.function
      : {};
    const id = asString(call.id);
    calls.push({
      ...(id ? { id } : {}),
      name: asString(fn.name),
      arguments: parseToolArguments(fn.arguments),
    });
  }
  return calls;
};

/** candidates[0].content.parts[].functionCall = {name, args}; no ids. */
const parseGemini: Parser = (raw) => {
  if (!isRecord(raw)) return [];
  const [candidate] = asArray(raw.candidates);
  if (!isRecord(candidate) || !isRecord(candidate.content)) return [];

  const calls: RawToolCall[] = [];
  for (const part of asArray(candidate.content.parts)) {
    if (!isRecord(part) || !isRecord(part.functionCall)) continue;
    calls.push({
      name: asString(part.functionCall.name),
      arguments: parseToolArguments(part.functionCall.args),
    });
  }
  return calls;
};

/** message.tool_calls[] = {function: {name, arguments: object}}; no ids. */
const parseOllama: Parser = (raw) => {
  if (!isRecord(raw) || !isRecord(raw.message)) return [];

  const calls: RawToolCall[] = [];
  for (const call of asArray(raw.message.tool_calls)) {
    if (!isRecord(call) || !isRecord(call.function)) continue;
    calls.push({
      name: asString(call.function.name),
      arguments: parseToolArguments(call.function.arguments),
    });
  }
  return calls;
};

const PARSERS: Record<ToolCallFormat, Parser> = {
  openai: parseOpenAI,
  gemini: parseGemini,
  ollama: parseOllama,
};

/** Extract tool calls from a backend-native response. */
export function extractToolCalls(
  format: ToolCallFormat,
  rawResponse: unknown,
): RawToolCall[] {
  return PARSERS[format](rawResponse);
}

export function generateToolCallId(): string {
  return `call_${randomBytes(4).toString("hex")}`;
}

/**
 * Give every call a non-empty id that is unique within the batch. Existing
 * ids are kept unless they repeat.
 */
export function normalizeToolCalls(
  calls: RawToolCall[],
  makeId: () => string = generateToolCallId,
): ToolCallRequest[] {
  const used = new Set<string>();
  return calls.map((call) => {
    let id = call.id ?? "";
    while (!id || used.has(id)) {
      id = makeId();
    }
    used.add(id);
    return { id, name: call.name, arguments: call.arguments };
  });
}

/** Descriptors attached to the assistant message so the backend sees its own call. */
export function toToolCallDescriptors(
  calls: ToolCallRequest[],
): ToolCallDescriptor[] {
  return calls.map((tc) => ({
    id: tc.id,
    type: "function" as const,
    function: {
      name: tc.name,
      arguments: JSON.stringify(tc.arguments),
    },
  }));
}
