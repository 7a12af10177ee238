import { Buffer } from "node:buffer";
import { z } from "zod";
import type { FulfillmentOrder, OrderPage, OrderStatus, RenderedDesign } from "@shirtsmith/contracts";
import type { ProdigiSettings } from "../config";
import type { Logger } from "../logger";
import type { FulfillmentClient, ListOptions, SubmitOptions } from "./client";
import { FulfillmentError } from "./errors";
import { parseVendorBody, VendorSession, type FetchLike } from "./session";

const LIVE_URL = "https://api.prodigi.com/v4.0";
const SANDBOX_URL = "https://api.sandbox.prodigi.com/v4.0";
const ORDER_PAGE_SIZE = 50;

const DEFAULT_RECIPIENT = {
  name: "Print on Demand",
  email: "orders@example.com",
  address: {
    line1: "1 Example Street",
    postalOrZipCode: "EC1A 1AA",
    countryCode: "GB",
    townOrCity: "London"
  }
};

const CostSchema = z.object({ amount: z.string(), currency: z.string() });

const OrderSchema = z.object({
  id: z.string(),
  created: z.string().optional(),
  merchantReference: z.string().nullable().optional(),
  status: z.object({ stage: z.string() }),
  items: z
    .array(
      z.object({
        sku: z.string().optional(),
        recipientCost: CostSchema.nullable().optional()
      })
    )
    .optional(),
  metadata: z.record(z.unknown()).nullable().optional()
});

const CreateOrderSchema = z.object({
  outcome: z.string(),
  order: OrderSchema
});

const OrderListSchema = z.object({
  orders: z.array(OrderSchema),
  hasMore: z.boolean().optional()
});

type ProdigiOrder = z.infer<typeof OrderSchema>;

const STAGE_STATUS: Record<string, OrderStatus> = {
  InProgress: "in_progress",
  Complete: "complete",
  Cancelled: "failed"
};

export interface ProdigiClientOptions {
  logger: Logger;
  fetch?: FetchLike;
  timeoutMs?: number;
}

export function orderUrl(orderId: string): string {
  return `https://dashboard.prodigi.com/orders/${orderId}`;
}

export function stageToStatus(stage: string): OrderStatus {
  return STAGE_STATUS[stage] ?? "pending";
}

function displayNameOf(order: ProdigiOrder): string {
  const productName = order.metadata?.productName;
  if (typeof productName === "string" && productName.trim()) {
    return productName;
  }
  return order.merchantReference ?? order.id;
}

export function toOrder(order: ProdigiOrder): FulfillmentOrder {
  const cost = order.items?.[0]?.recipientCost;
  const amount = cost ? Number(cost.amount) : Number.NaN;

  return {
    orderId: order.id,
    externalReference: order.merchantReference ?? "",
    displayName: displayNameOf(order),
    orderUrl: orderUrl(order.id),
    ...(cost && Number.isFinite(amount) ? { price: amount, currency: cost.currency } : {}),
    status: stageToStatus(order.status.stage),
    ...(order.created ? { createdAt: order.created } : {})
  };
}

/**
 * Prodigi takes orders directly. The external reference doubles as the
 * idempotency key, so a retried submit collapses onto the first order.
 */
export class ProdigiClient implements FulfillmentClient {
  readonly vendor = "prodigi" as const;
  private readonly session: VendorSession;
  private readonly logger: Logger;

  constructor(
    private readonly settings: ProdigiSettings,
    options: ProdigiClientOptions
  ) {
    this.session = new VendorSession({
      vendor: this.vendor,
      baseUrl: settings.sandbox ? SANDBOX_URL : LIVE_URL,
      headers: { "X-API-Key": settings.apiKey },
      timeoutMs: options.timeoutMs,
      fetch: options.fetch
    });
    this.logger = options.logger.child({ vendor: this.vendor });
  }

  async submit(
    image: RenderedDesign,
    displayName: string,
    externalReference: string,
    options: SubmitOptions = {}
  ): Promise<FulfillmentOrder> {
    const dataUrl = `data:image/png;base64,${Buffer.from(image.imageBytes).toString("base64")}`;

    const body = await this.session.request("POST", "Orders", {
      signal: options.signal,
      body: {
        merchantReference: externalReference,
        idempotencyKey: externalReference,
        shippingMethod: "Budget",
        recipient: DEFAULT_RECIPIENT,
        items: [
          {
            merchantReference: externalReference,
            sku: this.settings.sku,
            copies: 1,
            sizing: "fillPrintArea",
            attributes: { color: "white" },
            assets: [{ printArea: "default", url: dataUrl }]
          }
        ],
        metadata: {
          productName: displayName,
          description: options.description ?? displayName
        }
      }
    });

    const created = parseVendorBody(this.vendor, CreateOrderSchema, body, "order");
    if (created.outcome.toLowerCase().includes("fail")) {
      throw new FulfillmentError(`Prodigi rejected the order (${created.outcome}).`, {
        vendor: this.vendor,
        status: null,
        retryable: false,
        body: created.outcome
      });
    }

    this.logger.info("fulfillment.order_created", {
      orderId: created.order.id,
      outcome: created.outcome,
      externalReference
    });

    return {
      ...toOrder(created.order),
      externalReference,
      displayName
    };
  }

  async list(cursor: string | null, options: ListOptions = {}): Promise<OrderPage> {
    const skip = cursor ? Number.parseInt(cursor, 10) : 0;
    if (!Number.isInteger(skip) || skip < 0) {
      throw new FulfillmentError(`Invalid Prodigi offset cursor "${cursor}".`, {
        vendor: this.vendor,
        status: null,
        retryable: false
      });
    }

    const body = await this.session.request("GET", "Orders", {
      signal: options.signal,
      query: { top: ORDER_PAGE_SIZE, skip }
    });
    const listing = parseVendorBody(this.vendor, OrderListSchema, body, "order list");

    return {
      orders: listing.orders.map(toOrder),
      nextCursor: listing.hasMore && listing.orders.length > 0 ? String(skip + listing.orders.length) : null
    };
  }

  async verify(): Promise<boolean> {
    try {
      await this.session.request("GET", "Orders", { query: { top: 1 } });
      this.logger.info("fulfillment.verified");
      return true;
    } catch (error) {
      this.logger.error("fulfillment.verify_failed", { error });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.session.close();
  }
}
