import { describe, expect, it } from "vitest";
import { hangingModel, recordingLogger, scriptedModel } from "../testing/fakes";
import type { IntentModel } from "./llm";
import { IntentParser } from "./parser";

const KEYWORDS = ["tshirt", "t-shirt", "shirt", "merch"];

function parserWith(model?: IntentModel, timeoutMs = 1000) {
  const { logger, records } = recordingLogger();
  const parser = IntentParser.create({
    triggerKeywords: KEYWORDS,
    defaultStyle: "modern",
    timeoutMs,
    logger,
    model
  });
  return { parser, records };
}

describe("IntentParser", () => {
  it("uses the model's structured answer when it is valid", async () => {
    const model = scriptedModel(async () =>
      JSON.stringify({
        phrase: "  Coffee   is life ",
        style: "RETRO",
        wants_image: true,
        image_description: "a steaming mug",
        color_preference: "red"
      })
    );
    const { parser } = parserWith(model);

    const parsed = await parser.parseWithSource("I need a shirt that says 'Coffee is life' in retro red with a mug");

    expect(parsed).toEqual({
      source: "llm",
      request: {
        phrase: "Coffee is life",
        style: "retro",
        wantsImage: true,
        imageDescription: "a steaming mug",
        colorPreference: "red"
      }
    });
  });

  it("falls back to the default style for styles outside the table", async () => {
    const model = scriptedModel(async () =>
      JSON.stringify({ phrase: "Hi", style: "gothic", wants_image: false, image_description: null, color_preference: null })
    );
    const { parser } = parserWith(model);

    expect((await parser.parse("shirt")).style).toBe("modern");
  });

  it("falls back when the model times out", async () => {
    const { parser, records } = parserWith(hangingModel, 50);

    const parsed = await parser.parseWithSource("I want a t-shirt that says Hello World");

    expect(parsed.source).toBe("fallback");
    expect(parsed.request.phrase).toBe("Hello World");
    expect(records.find((record) => record.event === "intent.llm_failed")?.reason).toBe("call_failed");
  });

  it.each([
    ["malformed JSON", "{not json", "schema_mismatch"],
    ["a missing phrase", JSON.stringify({ style: "bold" }), "schema_mismatch"],
    ["an empty phrase", JSON.stringify({ phrase: "   " }), "empty_phrase"],
    ["no content", null, "empty_response"]
  ])("falls back on %s", async (_label, content, reason) => {
    const { parser, records } = parserWith(scriptedModel(async () => content));

    const parsed = await parser.parseWithSource('merch that says "Stay weird"');

    expect(parsed).toEqual({
      source: "fallback",
      request: {
        phrase: "Stay weird",
        style: "modern",
        wantsImage: false,
        imageDescription: null,
        colorPreference: null
      }
    });
    expect(records.find((record) => record.event === "intent.llm_failed")?.reason).toBe(reason);
  });

  it("falls back when the model call rejects", async () => {
    const { parser } = parserWith(scriptedModel(async () => Promise.reject(new Error("rate limited"))));

    expect(await parser.parse("shirt that says Late again")).toMatchObject({ phrase: "Late again" });
  });

  it("never returns an empty phrase", async () => {
    const { parser } = parserWith();

    for (const message of ["shirt", "   ", "!!!", "make me a shirt please", '""']) {
      const request = await parser.parse(message);
      expect(request.phrase.length).toBeGreaterThan(0);
    }
    expect((await parser.parse("shirt")).phrase).toBe("Custom");
  });
});
