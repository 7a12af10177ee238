import type { DesignRequest, DesignStyle } from "@shirtsmith/contracts";
import { normalisePhrase } from "./schema";
import type { IntentStrategy } from "./strategy";
import { escapeRegExp } from "./triggers";

// Lead-in words dropped only before the phrase starts.
const LEADING_FILLERS = [
  "can you make me a",
  "can i get a",
  "could i get a",
  "i would like a",
  "i'd like a",
  "make me a",
  "i want a",
  "i need a",
  "i want",
  "i need",
  "please"
];

const TRIGGER_CONNECTORS = ["with"];

const TRAILING_CONNECTORS = ["on a", "on my", "for a", "for my", "on"];

const COURTESY = ["please", "thanks", "thank you"];

const SAYS_MARKER = /\b(?:that says|which says|that reads|saying|says|reading|with the words|with the text)\b/gi;

const QUOTED_PATTERNS = [/"([^"]+)"/g, /“([^”]+)”/g, /(?:^|\s)'([^']+)'(?=$|[\s.,!?;:])/g];

const EDGE_PUNCTUATION = /^[\s"'“”‘’.,!?:;-]+|[\s"'“”‘’.,!?:;-]+$/g;

export function longestQuoted(message: string): string | null {
  let best: string | null = null;

  for (const pattern of QUOTED_PATTERNS) {
    for (const match of message.matchAll(pattern)) {
      const candidate = match[1]?.trim() ?? "";
      if (candidate && (best === null || candidate.length > best.length)) {
        best = candidate;
      }
    }
  }

  return best;
}

function textAfterLastMarker(message: string): string | null {
  let end = -1;
  for (const match of message.matchAll(SAYS_MARKER)) {
    end = (match.index ?? 0) + match[0].length;
  }
  return end >= 0 ? message.slice(end) : null;
}

const LEADING_SEPARATORS = /^[\s:;,.!?\u2013\u2014-]+/;
const TRAILING_SEPARATORS = /[\s:;,.!?\u2013\u2014-]+$/;

function byLength(terms: readonly string[]): string[] {
  return [...terms].sort((a, b) => b.length - a.length);
}

function consumeLeading(text: string, terms: readonly string[], pluralise: boolean): string | null {
  for (const term of byLength(terms)) {
    const match = new RegExp(`^${escapeRegExp(term)}${pluralise ? "s?" : ""}(?![\\w-])`, "i").exec(text);
    if (match) {
      return text.slice(match[0].length).replace(LEADING_SEPARATORS, "");
    }
  }
  return null;
}

function consumeTrailing(text: string, terms: readonly string[], pluralise: boolean): string | null {
  for (const term of byLength(terms)) {
    const match = new RegExp(`(^|[^\\w-])${escapeRegExp(term)}${pluralise ? "s?" : ""}$`, "i").exec(text);
    if (match) {
      return text.slice(0, match.index + (match[1]?.length ?? 0)).replace(TRAILING_SEPARATORS, "");
    }
  }
  return null;
}

/** Drops "make me a shirt with" style lead-ins; everything after the trigger stays as written. */
function stripLeadIn(text: string, triggerKeywords: string[]): string {
  let rest = text;
  for (let next = consumeLeading(rest, LEADING_FILLERS, false); next !== null; next = consumeLeading(rest, LEADING_FILLERS, false)) {
    rest = next;
  }

  const afterTrigger = consumeLeading(rest, triggerKeywords, true);
  if (afterTrigger === null) {
    return rest;
  }
  return consumeLeading(afterTrigger, TRIGGER_CONNECTORS, false) ?? afterTrigger;
}

/** Drops a closing "please" and a closing "on a shirt". */
function stripTail(text: string, triggerKeywords: string[]): string {
  let rest = text;
  for (let next = consumeTrailing(rest, COURTESY, false); next !== null; next = consumeTrailing(rest, COURTESY, false)) {
    rest = next;
  }

  const beforeTrigger = consumeTrailing(rest, triggerKeywords, true);
  if (beforeTrigger === null) {
    return rest;
  }
  return consumeTrailing(beforeTrigger, TRAILING_CONNECTORS, false) ?? beforeTrigger;
}

export function extractPhrase(message: string, triggerKeywords: string[]): string {
  const quoted = longestQuoted(message);
  if (quoted) {
    return quoted;
  }

  // Text after "says" is the phrase; a bare message only loses its lead-in and tail.
  const remainder = textAfterLastMarker(message);
  const text = (remainder ?? message).replace(LEADING_SEPARATORS, "").replace(TRAILING_SEPARATORS, "");
  const cleaned =
    remainder === null ? stripTail(stripLeadIn(text, triggerKeywords), triggerKeywords) : stripTail(text, []);

  return cleaned.replace(/\s+/g, " ").replace(EDGE_PUNCTUATION, "").trim();
}

export interface FallbackOptions {
  triggerKeywords: string[];
  defaultStyle: DesignStyle;
}

export function fallbackParse(message: string, options: FallbackOptions): DesignRequest {
  return {
    phrase: normalisePhrase(extractPhrase(message, options.triggerKeywords)),
    style: options.defaultStyle,
    wantsImage: false,
    imageDescription: null,
    colorPreference: null
  };
}

export function createFallbackStrategy(options: FallbackOptions): IntentStrategy {
  return {
    source: "fallback",
    extract: async (message) => fallbackParse(message, options)
  };
}
