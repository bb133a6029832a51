import type { ChatMessage } from "../providers/base.js";

export type Tier = "vision" | "simple" | "tool" | "complex" | "normal";

export const TIERS: readonly Tier[] = ["vision", "simple", "tool", "complex", "normal"];

/** Messages longer than this are treated as complex. */
export const LONG_QUERY_CHARS = 500;

function wordPattern(alternatives: string[]): RegExp {
  return new RegExp(String.raw`\b(` + alternatives.join("|") + String.raw`)\b`, "i");
}

const VISION_PATTERN = wordPattern([
  String.raw`image|picture|photo|describe\s+this`,
  String.raw`what(?:'s| is)\s+(?:in|on)\s+(?:this|the)\s+(?:image|photo|picture)`,
  String.raw`look\s+at|analyze\s+(?:this|the)\s+(?:image|photo|picture)`,
  String.raw`ocr|read\s+(?:this|the)\s+(?:text|image)|identify|recognize`,
  String.raw`vision|visual`,
]);

const SIMPLE_PATTERN = new RegExp(
  String.raw`^(hi|hello|hey|thanks|thank you|ok|okay|yes|no|bye|good\s?(morning|night|evening)` +
    String.raw`|what(?:'s| is) (?:your name|the time|the date|up)` +
    String.raw`|how are you|who are you|tell me a joke)[\s!?.]*$`,
  "i",
);

const TOOL_PATTERN = wordPattern([
  // web search
  String.raw`search|google|look\s+up|find\s+(?:me|out)`,
  String.raw`what(?:'s| is) the weather`,
  // math
  String.raw`calculate|compute|solve|(?:what|how much) is \d`,
  // apps
  String.raw`open\s+\w+|close\s+\w+|launch\s+\w+|start\s+\w+|run\s+\w+|quit\s+\w+|kill\s+\w+|exit\s+\w+`,
  // audio, display
  String.raw`volume|mute|unmute|louder|quieter|sound`,
  String.raw`brightness|bright|dim`,
  String.raw`screenshot|screen\s*shot|capture|snap`,
  String.raw`lock\s+(screen|computer|pc)|sleep|shut\s*down|restart|power\s+off`,
  // browser
  String.raw`play\s+|search\s+(for|on)\s+youtube|youtube|google\s+`,
  String.raw`open\s+(?:website|url|link|page)|go\s+to\s+\w+`,
  String.raw`browse|navigate`,
  String.raw`wifi|wi-fi|bluetooth|internet`,
  // files and windows
  String.raw`open\s+(?:folder|file|document|desktop|download)`,
  String.raw`show\s+(?:desktop|files|folder)`,
  String.raw`minimize|maximize|switch\s+(?:to|window)|close\s+(?:this|window|tab)`,
  String.raw`copy|clipboard|paste|type\s+\w+`,
  // lookups
  String.raw`wikipedia|wiki|who (?:is|was)|when (?:did|was)`,
  String.raw`run (?:this |the )?(?:code|script|python)`,
  // timers and reminders
  String.raw`set\s+(?:a\s+)?timer|alarm|stopwatch|countdown|remind\s+me`,
  String.raw`wake\s+me|\d+\s*(?:minutes?|hours?|seconds?)\s+timer`,
  String.raw`remind(?:er)?|don'?t\s+(?:let\s+me\s+)?forget|remember\s+to`,
  // conversion
  String.raw`translate|translat\w+|convert\s+\d|how\s+(?:many|much)\s+\w+\s+(?:in|to)\s+\w+`,
  String.raw`\d+\s*(?:miles?|km|kg|lbs?|pounds?|celsius|fahrenheit|meters?)\s+(?:in|to)`,
  String.raw`define\s+\w+|meaning\s+of|definition\s+of|what\s+does\s+\w+\s+mean`,
  // notes
  String.raw`(?:add|create|make|take|write)\s+(?:a\s+)?(?:note|todo|to-do)`,
  String.raw`(?:my|list|show)\s+(?:notes?|todos?|to-dos?)`,
  String.raw`delete\s+(?:note|todo)|complete\s+todo`,
  // system
  String.raw`system\s+info|battery|processes|kill\s+process`,
  String.raw`recycle\s+bin|wallpaper|zip\s+|unzip`,
]);

const COMPLEX_PATTERN = wordPattern([
  String.raw`explain|analyze|compare|contrast|summarize|write\s+(?:a\s+)?(?:code|essay|report|article|story|poem)`,
  String.raw`debug|refactor|optimize|implement|architecture|algorithm|design pattern`,
  String.raw`step[\s-]?by[\s-]?step|in[\s-]?depth|detailed|comprehensive|thoroughly`,
  String.raw`pros?\s+and\s+cons?|advantages?\s+and\s+disadvantages?`,
  String.raw`translate|convert|rewrite|improve|review`,
  String.raw`math|equation|calculus|physics|chemistry|science`,
  String.raw`research|thesis|academic|peer[\s-]?review`,
]);

/**
 * Assign a query to the cheapest tier that can answer it. Checks run in
 * priority order: vision, simple, tool, complex, then length.
 */
export function classifyQuery(text: string, hasImage = false): Tier {
  const query = text.trim();

  if (hasImage || VISION_PATTERN.test(query)) return "vision";
  if (SIMPLE_PATTERN.test(query)) return "simple";
  if (TOOL_PATTERN.test(query)) return "tool";
  if (COMPLEX_PATTERN.test(query)) return "complex";
  if (query.length > LONG_QUERY_CHARS) return "complex";
  return "normal";
}

/** Text of the last user message and whether it carried an image. */
export function extractLatestUserQuery(messages: ChatMessage[]): {
  text: string;
  hasImage: boolean;
} {
  for (let i = messages.length - 1; i >= 0; i--) {
    const msg = messages[i];
    if (msg.role !== "user") continue;
    if (typeof msg.content === "string") {
      return { text: msg.content, hasImage: false };
    }
    const texts: string[] = [];
    let hasImage = false;
    for (const part of msg.content) {
      if (part.type === "text") texts.push(part.text);
      else hasImage = true;
    }
    return { text: texts.join(" "), hasImage };
  }
  return { text: "", hasImage: false };
}
