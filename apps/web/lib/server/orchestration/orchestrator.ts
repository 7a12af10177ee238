import { randomUUID } from "node:crypto";
import type {
  DesignRequest,
  ErrorKind,
  FulfillmentOrder,
  RenderedDesign,
  RequestOutcome,
  RequestStage
} from "@shirtsmith/contracts";
import type { FulfillmentClient } from "../fulfillment/client";
import { FulfillmentError, isRetryableFailure } from "../fulfillment/errors";
import { createNonce, encodeReference } from "../fulfillment/reference";
import type { ExtractOptions } from "../intent/strategy";
import type { Logger } from "../logger";
import { RenderError, type Renderer } from "../render/renderer";
import {
  FAILURE_TEXT,
  pickRandomPhrase,
  RESPONSE_PHRASES,
  TEXT_ONLY_NOTE,
  type PhrasePicker
} from "./phrases";
import { withRetry, type RetryPolicy, type Sleep } from "./retry";

const TITLE_PHRASE_LENGTH = 50;

export interface MessageParser {
  parse(rawMessage: string, options?: ExtractOptions): Promise<DesignRequest>;
}

export interface OrchestratorOptions {
  parser: MessageParser;
  renderer: Renderer;
  fulfillment: FulfillmentClient;
  retry: RetryPolicy;
  referencePrefix: string;
  logger: Logger;
  createNonce?: () => string;
  pickPhrase?: PhrasePicker;
  sleep?: Sleep;
}

export interface HandleOptions {
  signal?: AbortSignal;
}

export function productTitle(phrase: string): string {
  return `${phrase.slice(0, TITLE_PHRASE_LENGTH)} - Custom Tee`;
}

export function productDescription(displayName: string): string {
  return `Custom design created by ${displayName}`;
}

/** Stage failures that already carry their error kind. */
class StageFailure extends Error {
  constructor(
    readonly kind: ErrorKind,
    readonly failedAt: RequestStage,
    options: { cause: unknown }
  ) {
    super(`Request failed with ${kind}`, options);
    this.name = "StageFailure";
  }
}

/**
 * Drives one chat request through parse, render and submit. Every outcome is
 * returned as a value; nothing thrown by a collaborator reaches the caller.
 */
export class RequestOrchestrator {
  private readonly logger: Logger;
  private readonly createNonce: () => string;
  private readonly pickPhrase: PhrasePicker;

  constructor(private readonly options: OrchestratorOptions) {
    this.logger = options.logger.child({ component: "orchestrator" });
    this.createNonce = options.createNonce ?? createNonce;
    this.pickPhrase = options.pickPhrase ?? pickRandomPhrase;
  }

  async handleRequest(
    rawMessage: string,
    userId: string,
    displayName: string,
    options: HandleOptions = {}
  ): Promise<RequestOutcome> {
    const { signal } = options;
    const log = this.logger.child({ requestId: randomUUID(), userId });
    let stage: RequestStage = "received";
    let phrase: string | undefined;

    const advance = (next: RequestStage) => {
      log.info("request.stage", { from: stage, to: next });
      stage = next;
    };

    try {
      const request = await this.options.parser.parse(rawMessage, { signal });
      phrase = request.phrase;
      advance("parsed");

      const design = await this.renderStage(request);
      advance("rendered");

      if (request.wantsImage) {
        log.info("render.image_skipped", { imageDescription: request.imageDescription });
      }

      signal?.throwIfAborted();

      const externalReference = encodeReference(this.options.referencePrefix, userId, this.createNonce());
      const order = await this.submitStage(design, request.phrase, displayName, externalReference, log, signal);
      advance("submitted");

      let responseText = this.pickPhrase(RESPONSE_PHRASES);
      if (request.wantsImage) {
        responseText = `${responseText} ${TEXT_ONLY_NOTE}`;
      }
      advance("done");

      return {
        success: true,
        stage: "done",
        responseText,
        orderUrl: order.orderUrl,
        orderId: order.orderId,
        phrase
      };
    } catch (error) {
      const failure =
        error instanceof StageFailure ? error : new StageFailure("internal_error", stage, { cause: error });
      return this.fail(log, failure, phrase);
    }
  }

  private async renderStage(request: DesignRequest): Promise<RenderedDesign> {
    try {
      return await this.options.renderer.render(request);
    } catch (error) {
      throw new StageFailure("render_failure", "parsed", { cause: error });
    }
  }

  private async submitStage(
    design: RenderedDesign,
    phrase: string,
    displayName: string,
    externalReference: string,
    log: Logger,
    signal?: AbortSignal
  ): Promise<FulfillmentOrder> {
    const { fulfillment, retry, sleep } = this.options;
    let attempts = 0;

    try {
      const order = await withRetry(
        (attempt) => {
          attempts = attempt;
          return fulfillment.submit(design, productTitle(phrase), externalReference, {
            description: productDescription(displayName),
            signal
          });
        },
        retry,
        {
          isRetryable: isRetryableFailure,
          sleep,
          signal,
          onRetry: (error, attempt, delayMs) => {
            log.warn("fulfillment.retry", { attempt, delayMs, externalReference, error });
          }
        }
      );

      if (order.status === "failed") {
        throw new FulfillmentError(`Order ${order.orderId} was rejected by the vendor.`, {
          vendor: fulfillment.vendor,
          status: null,
          retryable: false
        });
      }

      log.info("fulfillment.submitted", { attempts, orderId: order.orderId, externalReference });
      return order;
    } catch (error) {
      log.warn("fulfillment.gave_up", { attempts, externalReference });
      throw new StageFailure("fulfillment_failure", "rendered", { cause: error });
    }
  }

  private fail(log: Logger, failure: StageFailure, phrase: string | undefined): RequestOutcome {
    const cause = failure.cause;
    log.error("request.failed", {
      errorKind: failure.kind,
      failedAt: failure.failedAt,
      error: cause,
      ...(cause instanceof FulfillmentError
        ? { vendor: cause.vendor, status: cause.status, vendorBody: cause.body }
        : {}),
      ...(cause instanceof RenderError ? { renderCause: cause.cause } : {})
    });
    log.info("request.stage", { from: failure.failedAt, to: "failed" });

    return {
      success: false,
      stage: "failed",
      responseText: FAILURE_TEXT[failure.kind],
      errorKind: failure.kind,
      ...(phrase !== undefined ? { phrase } : {})
    };
  }
}
