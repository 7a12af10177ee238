import { Buffer } from "node:buffer";
import { z } from "zod";
import type { FulfillmentOrder, OrderPage, RenderedDesign } from "@shirtsmith/contracts";
import type { PrintifySettings } from "../config";
import { abortable } from "../abortable";
import type { Logger } from "../logger";
import type { FulfillmentClient, ListOptions, SubmitOptions } from "./client";
import { FulfillmentError } from "./errors";
import { parseVendorBody, VendorSession, type FetchLike } from "./session";

const BASE_URL = "https://api.printify.com/v1";
const PRODUCT_PAGE_SIZE = 50;
const VARIANT_COUNT = 3;
const DEFAULT_PRICE_CENTS = 2500;
const REFERENCE_TAG = "ref:";

const UploadSchema = z.object({ id: z.string() });

const ProvidersSchema = z.array(z.object({ id: z.number(), title: z.string().optional() }));

const VariantsSchema = z.object({
  variants: z.array(z.object({ id: z.number(), title: z.string().optional() }))
});

const ProductSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string().nullable().optional(),
  tags: z.array(z.string()).optional(),
  visible: z.boolean().optional(),
  created_at: z.string().optional(),
  external: z.object({ id: z.string().optional() }).nullable().optional(),
  variants: z
    .array(z.object({ id: z.number(), price: z.number().optional(), is_enabled: z.boolean().optional() }))
    .optional()
});

const ProductListSchema = z.object({
  current_page: z.number(),
  last_page: z.number(),
  data: z.array(ProductSchema)
});

type PrintifyProduct = z.infer<typeof ProductSchema>;

export interface PrintifyClientOptions {
  logger: Logger;
  fetch?: FetchLike;
  timeoutMs?: number;
}

export function productUrl(productId: string): string {
  return `https://printify.com/app/products/${productId}`;
}

function fileStem(value: string): string {
  const stem = value.replace(/[^a-z0-9_-]+/gi, "-").replace(/-+/g, "-").replace(/^-|-$/g, "");
  return stem.slice(0, 60) || "design";
}

function referenceOf(product: PrintifyProduct): string {
  const tagged = product.tags?.find((tag) => tag.startsWith(REFERENCE_TAG));
  if (tagged) {
    return tagged.slice(REFERENCE_TAG.length);
  }
  return product.external?.id ?? "";
}

export function toOrder(product: PrintifyProduct): FulfillmentOrder {
  const price = product.variants?.find((variant) => variant.is_enabled !== false)?.price;
  return {
    orderId: product.id,
    externalReference: referenceOf(product),
    displayName: product.title,
    orderUrl: productUrl(product.id),
    ...(price !== undefined ? { price: price / 100, currency: "USD" } : {}),
    status: product.visible ? "complete" : "pending",
    ...(product.created_at ? { createdAt: product.created_at } : {})
  };
}

/**
 * Printify publishes designs as shop products. The API has no idempotency key,
 * so a retried submit after an ambiguous failure can leave two products behind.
 */
export class PrintifyClient implements FulfillmentClient {
  readonly vendor = "printify" as const;
  private readonly session: VendorSession;
  private readonly logger: Logger;
  private providerLookup: Promise<number> | null = null;

  constructor(
    private readonly settings: PrintifySettings,
    options: PrintifyClientOptions
  ) {
    this.session = new VendorSession({
      vendor: this.vendor,
      baseUrl: BASE_URL,
      headers: { Authorization: `Bearer ${settings.apiKey}` },
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
    const { signal } = options;
    const providerId = await this.printProvider(signal);
    const imageId = await this.uploadImage(image, displayName, signal);
    const variantIds = await this.variantIds(providerId, signal);

    const body = await this.session.request("POST", `shops/${this.settings.shopId}/products.json`, {
      signal,
      body: {
        title: displayName,
        description: `${options.description ?? displayName}\n\nReference: ${externalReference}`,
        blueprint_id: this.settings.blueprintId,
        print_provider_id: providerId,
        tags: [`${REFERENCE_TAG}${externalReference}`],
        variants: variantIds.map((id) => ({ id, price: DEFAULT_PRICE_CENTS, is_enabled: true })),
        print_areas: [
          {
            variant_ids: variantIds,
            placeholders: [
              {
                position: "front",
                images: [{ id: imageId, x: 0.5, y: 0.5, scale: 1, angle: 0 }]
              }
            ]
          }
        ]
      }
    });

    const product = parseVendorBody(this.vendor, ProductSchema, body, "product");
    this.logger.info("fulfillment.product_created", { orderId: product.id, externalReference });

    return {
      ...toOrder(product),
      externalReference,
      price: DEFAULT_PRICE_CENTS / 100,
      currency: "USD"
    };
  }

  async list(cursor: string | null, options: ListOptions = {}): Promise<OrderPage> {
    const page = cursor ? Number.parseInt(cursor, 10) : 1;
    if (!Number.isInteger(page) || page < 1) {
      throw new FulfillmentError(`Invalid Printify page cursor "${cursor}".`, {
        vendor: this.vendor,
        status: null,
        retryable: false
      });
    }

    const body = await this.session.request("GET", `shops/${this.settings.shopId}/products.json`, {
      signal: options.signal,
      query: { limit: PRODUCT_PAGE_SIZE, page }
    });
    const listing = parseVendorBody(this.vendor, ProductListSchema, body, "product list");

    return {
      orders: listing.data.map(toOrder),
      nextCursor: listing.current_page < listing.last_page ? String(listing.current_page + 1) : null
    };
  }

  async verify(): Promise<boolean> {
    try {
      const shops = await this.session.request("GET", "shops.json");
      const count = Array.isArray(shops) ? shops.length : 0;
      this.logger.info("fulfillment.verified", { shops: count });
      return true;
    } catch (error) {
      this.logger.error("fulfillment.verify_failed", { error });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.session.close();
  }

  private async printProvider(signal?: AbortSignal): Promise<number> {
    if (this.settings.printProviderId !== undefined) {
      return this.settings.printProviderId;
    }

    // Shared by concurrent submits, so only the session lifetime may cancel it.
    let lookup = this.providerLookup;
    if (!lookup) {
      lookup = this.detectPrintProvider();
      this.providerLookup = lookup;
      lookup.catch(() => {
        this.providerLookup = null;
      });
    }

    if (!signal) {
      return lookup;
    }

    try {
      return await abortable(lookup, signal);
    } catch (error) {
      if (signal.aborted) {
        throw new FulfillmentError(`${this.vendor} request was cancelled.`, {
          vendor: this.vendor,
          status: null,
          retryable: false,
          cause: error
        });
      }
      throw error;
    }
  }

  private async detectPrintProvider(): Promise<number> {
    const body = await this.session.request(
      "GET",
      `catalog/blueprints/${this.settings.blueprintId}/print_providers.json`
    );
    const providers = parseVendorBody(this.vendor, ProvidersSchema, body, "print provider list");
    const first = providers[0];
    if (!first) {
      throw new FulfillmentError(`No print providers offer blueprint ${this.settings.blueprintId}.`, {
        vendor: this.vendor,
        status: null,
        retryable: false
      });
    }

    this.logger.info("fulfillment.provider_selected", { providerId: first.id, title: first.title });
    return first.id;
  }

  private async uploadImage(image: RenderedDesign, displayName: string, signal?: AbortSignal): Promise<string> {
    const body = await this.session.request("POST", "uploads/images.json", {
      signal,
      body: {
        file_name: `${fileStem(displayName)}.png`,
        contents: Buffer.from(image.imageBytes).toString("base64")
      }
    });
    return parseVendorBody(this.vendor, UploadSchema, body, "upload").id;
  }

  private async variantIds(providerId: number, signal?: AbortSignal): Promise<number[]> {
    const body = await this.session.request(
      "GET",
      `catalog/blueprints/${this.settings.blueprintId}/print_providers/${providerId}/variants.json`,
      { signal }
    );
    const { variants } = parseVendorBody(this.vendor, VariantsSchema, body, "variant list");
    if (variants.length === 0) {
      throw new FulfillmentError("No variants available for this blueprint.", {
        vendor: this.vendor,
        status: null,
        retryable: false
      });
    }
    return variants.slice(0, VARIANT_COUNT).map((variant) => variant.id);
  }
}
