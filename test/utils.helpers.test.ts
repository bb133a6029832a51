import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  asArray,
  asNumber,
  asString,
  ensureDir,
  isRecord,
  readLines,
  truncateString,
} from "../src/utils/helpers.js";

function streamOf(pieces: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream({
    start(controller) {
      for (const piece of pieces) controller.enqueue(encoder.encode(piece));
      controller.close();
    },
  });
}

describe("utils/helpers", () => {
  let tempRoot: string | undefined;

  afterEach(() => {
    if (tempRoot) rmSync(tempRoot, { recursive: true, force: true });
    tempRoot = undefined;
  });

  it("ensureDir creates missing directories", () => {
    tempRoot = mkdtempSync(join(tmpdir(), "helmsman-helpers-"));
    const target = join(tempRoot, "a", "b", "c");
    expect(existsSync(target)).toBe(false);
    expect(ensureDir(target)).toBe(target);
    expect(existsSync(target)).toBe(true);
    expect(ensureDir(target)).toBe(target);
  });

  it("truncateString shortens with suffix", () => {
    expect(truncateString("hello", 10)).toBe("hello");
    expect(truncateString("hello world", 8)).toBe("hello...");
    expect(truncateString("abcdef", 4, "~")).toBe("abc~");
  });

  it("narrows unknown values", () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord([1])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(asArray([1, 2])).toEqual([1, 2]);
    expect(asArray("x")).toEqual([]);
    expect(asString(5, "fallback")).toBe("fallback");
    expect(asString("s")).toBe("s");
    expect(asNumber(Number.NaN)).toBe(0);
    expect(asNumber("3", 7)).toBe(7);
    expect(asNumber(42)).toBe(42);
  });

  it("readLines splits chunks on newlines", async () => {
    const lines: string[] = [];
    for await (const line of readLines(streamOf(["data: a\r\nda", "ta: b\n", "\ntail"]))) {
      lines.push(line);
    }
    expect(lines).toEqual(["data: a", "data: b", "", "tail"]);
  });
});
