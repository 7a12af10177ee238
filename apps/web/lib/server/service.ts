import { loadConfig, type AppConfig } from "./config";
import type { FulfillmentClient } from "./fulfillment/client";
import { createFulfillmentClient } from "./fulfillment";
import type { FetchLike } from "./fulfillment/session";
import { DesignHistoryIndex } from "./history/design-history";
import { OpenAIIntentModel, type IntentModel } from "./intent/llm";
import { IntentParser } from "./intent/parser";
import { createLogger, type Logger } from "./logger";
import { RequestOrchestrator } from "./orchestration/orchestrator";
import { DesignRenderer } from "./render/renderer";

export interface DesignService {
  config: AppConfig;
  logger: Logger;
  fulfillment: FulfillmentClient;
  orchestrator: RequestOrchestrator;
  history: DesignHistoryIndex;
}

export interface DesignServiceOverrides {
  logger?: Logger;
  model?: IntentModel | null;
  fetch?: FetchLike;
}

export function buildDesignService(config: AppConfig, overrides: DesignServiceOverrides = {}): DesignService {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel, bindings: { service: "shirtsmith" } });

  let model: IntentModel | undefined;
  if (overrides.model !== undefined) {
    model = overrides.model ?? undefined;
  } else if (config.llm.apiKey) {
    model = new OpenAIIntentModel(config.llm.apiKey, config.llm.model);
  } else {
    logger.warn("intent.llm_disabled", { reason: "OPENAI_API_KEY is not set" });
  }

  const parser = IntentParser.create({
    triggerKeywords: config.triggerKeywords,
    defaultStyle: config.defaultStyle,
    timeoutMs: config.llm.timeoutMs,
    logger,
    model
  });

  const renderer = new DesignRenderer({ ...config.render, logger });
  const fulfillment = createFulfillmentClient(config.fulfillment, { logger, fetch: overrides.fetch });

  return {
    config,
    logger,
    fulfillment,
    orchestrator: new RequestOrchestrator({
      parser,
      renderer,
      fulfillment,
      retry: config.retry,
      referencePrefix: config.referencePrefix,
      logger
    }),
    history: new DesignHistoryIndex(fulfillment, config.referencePrefix, logger)
  };
}

let cachedService: DesignService | undefined;

export function getDesignService(): DesignService {
  if (!cachedService) {
    cachedService = buildDesignService(loadConfig());
    cachedService.logger.info("service.started", {
      vendor: cachedService.fulfillment.vendor,
      llm: Boolean(cachedService.config.llm.apiKey)
    });
  }
  return cachedService;
}

export async function shutdownDesignService(): Promise<void> {
  const service = cachedService;
  cachedService = undefined;
  if (!service) {
    return;
  }
  await service.fulfillment.close();
  service.logger.info("service.stopped");
}
