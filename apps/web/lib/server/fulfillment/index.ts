import type { FulfillmentSettings } from "../config";
import type { Logger } from "../logger";
import type { FulfillmentClient } from "./client";
import { PrintifyClient } from "./printify";
import { ProdigiClient } from "./prodigi";
import type { FetchLike } from "./session";

export interface FulfillmentClientOptions {
  logger: Logger;
  fetch?: FetchLike;
  timeoutMs?: number;
}

export function createFulfillmentClient(
  settings: FulfillmentSettings,
  options: FulfillmentClientOptions
): FulfillmentClient {
  switch (settings.vendor) {
    case "printify":
      return new PrintifyClient(settings.printify, options);
    case "prodigi":
      return new ProdigiClient(settings.prodigi, options);
  }
}
