import {
  PLACEHOLDER_PHRASE,
  type DesignRequest,
  type DesignStyle
} from "@shirtsmith/contracts";
import type { Logger } from "../logger";
import { createFallbackStrategy } from "./fallback";
import { createLlmStrategy, type IntentModel } from "./llm";
import { normalisePhrase } from "./schema";
import type { ExtractOptions, IntentSource, IntentStrategy } from "./strategy";

export interface ParsedIntent {
  request: DesignRequest;
  source: IntentSource;
}

export interface IntentParserOptions {
  triggerKeywords: string[];
  defaultStyle: DesignStyle;
  timeoutMs: number;
  logger: Logger;
  model?: IntentModel;
}

function placeholderRequest(defaultStyle: DesignStyle): DesignRequest {
  return {
    phrase: PLACEHOLDER_PHRASE,
    style: defaultStyle,
    wantsImage: false,
    imageDescription: null,
    colorPreference: null
  };
}

export class IntentParser {
  constructor(
    private readonly strategies: IntentStrategy[],
    private readonly defaultStyle: DesignStyle,
    private readonly logger: Logger
  ) {}

  static create(options: IntentParserOptions): IntentParser {
    const strategies: IntentStrategy[] = [];
    if (options.model) {
      strategies.push(
        createLlmStrategy(options.model, {
          timeoutMs: options.timeoutMs,
          defaultStyle: options.defaultStyle,
          logger: options.logger
        })
      );
    }
    strategies.push(
      createFallbackStrategy({
        triggerKeywords: options.triggerKeywords,
        defaultStyle: options.defaultStyle
      })
    );
    return new IntentParser(strategies, options.defaultStyle, options.logger);
  }

  async parse(rawMessage: string, options: ExtractOptions = {}): Promise<DesignRequest> {
    const parsed = await this.parseWithSource(rawMessage, options);
    return parsed.request;
  }

  async parseWithSource(rawMessage: string, options: ExtractOptions = {}): Promise<ParsedIntent> {
    const message = rawMessage.trim();

    for (const strategy of this.strategies) {
      const request = await strategy.extract(message, options);
      if (!request) {
        continue;
      }

      const validated: DesignRequest = { ...request, phrase: normalisePhrase(request.phrase) };
      this.logger.info("intent.parsed", {
        source: strategy.source,
        phrase: validated.phrase,
        style: validated.style,
        wantsImage: validated.wantsImage
      });
      return { request: validated, source: strategy.source };
    }

    this.logger.warn("intent.parsed", { source: "fallback", phrase: PLACEHOLDER_PHRASE });
    return { request: placeholderRequest(this.defaultStyle), source: "fallback" };
  }
}
