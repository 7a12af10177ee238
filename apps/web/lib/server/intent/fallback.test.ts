import { describe, expect, it } from "vitest";
import { extractPhrase, fallbackParse, longestQuoted } from "./fallback";

const KEYWORDS = ["tshirt", "t-shirt", "shirt", "merch"];

describe("longestQuoted", () => {
  it("prefers the longest quoted span across quote styles", () => {
    expect(longestQuoted(`make "Hi" or “Hello there” on a shirt`)).toBe("Hello there");
    expect(longestQuoted("shirt saying 'Stay weird'")).toBe("Stay weird");
  });

  it("does not treat apostrophes as quotes", () => {
    expect(longestQuoted("I'd like a shirt, it's for Sam")).toBeNull();
  });
});

describe("extractPhrase", () => {
  it("returns quoted text verbatim", () => {
    expect(extractPhrase('I want a t-shirt that says "Hello World"', KEYWORDS)).toBe("Hello World");
  });

  it("takes the text after a says marker", () => {
    expect(extractPhrase("I want a t-shirt that says Hello World", KEYWORDS)).toBe("Hello World");
    expect(extractPhrase("merch saying coffee with cream!", KEYWORDS)).toBe("coffee with cream");
  });

  it("strips triggers and filler words when there is no marker", () => {
    expect(extractPhrase("I need a tshirt with Coffee Time on it", KEYWORDS)).toBe("Coffee Time on it");
  });

  it("keeps filler-like words once the phrase has started", () => {
    expect(extractPhrase("shirt: Live with passion", KEYWORDS)).toBe("Live with passion");
    expect(extractPhrase("merch: Please be kind", KEYWORDS)).toBe("Please be kind");
    expect(extractPhrase("shirt: I want a pony", KEYWORDS)).toBe("I want a pony");
  });

  it("drops a closing trigger and courtesy words", () => {
    expect(extractPhrase("Hello World t-shirt please", KEYWORDS)).toBe("Hello World");
    expect(extractPhrase("Good Vibes on a shirt", KEYWORDS)).toBe("Good Vibes");
  });

  it("leaves nothing when the message is only a request", () => {
    expect(extractPhrase("make me a shirt please", KEYWORDS)).toBe("");
  });
});

describe("fallbackParse", () => {
  it("uses the placeholder phrase and default style", () => {
    expect(fallbackParse("make me a shirt please", { triggerKeywords: KEYWORDS, defaultStyle: "retro" })).toEqual({
      phrase: "Custom",
      style: "retro",
      wantsImage: false,
      imageDescription: null,
      colorPreference: null
    });
  });

  it("caps the phrase at 100 characters", () => {
    const request = fallbackParse(`shirt that says ${"a".repeat(150)}`, {
      triggerKeywords: KEYWORDS,
      defaultStyle: "modern"
    });
    expect(request.phrase).toBe("a".repeat(100));
  });
});
