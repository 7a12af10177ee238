import OpenAI from "openai";
import type { DesignStyle } from "@shirtsmith/contracts";
import { abortable } from "../abortable";
import type { Logger } from "../logger";
import { ExtractedIntentSchema, INTENT_JSON_SCHEMA, toDesignRequest } from "./schema";
import type { IntentStrategy } from "./strategy";

const SYSTEM_PROMPT =
  "You extract t-shirt design requests from chat messages. " +
  "Identify the exact phrase to print, the lettering style (infer it from context when it is not explicit), " +
  "whether the user wants artwork, what that artwork should show and any colour preference. " +
  'For "I need a shirt that says \'Coffee is life\'" the phrase is "Coffee is life". ' +
  "Return JSON matching the schema only.";

export interface IntentModel {
  readonly name: string;
  complete(message: string, options: { signal: AbortSignal }): Promise<string | null>;
}

export class OpenAIIntentModel implements IntentModel {
  readonly name: string;
  private readonly client: OpenAI;

  constructor(apiKey: string, model: string) {
    this.name = model;
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async complete(message: string, options: { signal: AbortSignal }): Promise<string | null> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.name,
        temperature: 0,
        response_format: {
          type: "json_schema",
          json_schema: {
            name: "design_request",
            strict: true,
            schema: INTENT_JSON_SCHEMA
          }
        },
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: message }
        ]
      },
      { signal: options.signal }
    );

    const choice = completion.choices[0]?.message;
    if (!choice || choice.refusal) {
      return null;
    }
    return choice.content;
  }
}

export interface LlmStrategyOptions {
  timeoutMs: number;
  defaultStyle: DesignStyle;
  logger: Logger;
}

function parseJSON(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function combineSignals(timeoutMs: number, outer?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return outer ? AbortSignal.any([outer, timeout]) : timeout;
}

export function createLlmStrategy(model: IntentModel, options: LlmStrategyOptions): IntentStrategy {
  const logger = options.logger.child({ model: model.name });

  return {
    source: "llm",
    async extract(message, { signal }) {
      let content: string | null;
      try {
        const callSignal = combineSignals(options.timeoutMs, signal);
        content = await abortable(model.complete(message, { signal: callSignal }), callSignal);
      } catch (error) {
        logger.warn("intent.llm_failed", { reason: "call_failed", error });
        return null;
      }

      if (!content) {
        logger.warn("intent.llm_failed", { reason: "empty_response" });
        return null;
      }

      const parsed = ExtractedIntentSchema.safeParse(parseJSON(content));
      if (!parsed.success) {
        logger.warn("intent.llm_failed", {
          reason: "schema_mismatch",
          issues: parsed.error.issues.map((issue) => issue.message)
        });
        return null;
      }

      if (!parsed.data.phrase.trim()) {
        logger.warn("intent.llm_failed", { reason: "empty_phrase" });
        return null;
      }

      return toDesignRequest(parsed.data, options.defaultStyle);
    }
  };
}
