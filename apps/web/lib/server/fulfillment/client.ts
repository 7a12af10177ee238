import type {
  FulfillmentOrder,
  FulfillmentVendor,
  OrderPage,
  RenderedDesign
} from "@shirtsmith/contracts";

export interface SubmitOptions {
  description?: string;
  signal?: AbortSignal;
}

export interface ListOptions {
  signal?: AbortSignal;
}

/**
 * What every print-on-demand vendor has to offer the pipeline. Each vendor gets
 * its own implementation; nothing above this interface knows which one is live.
 */
export interface FulfillmentClient {
  readonly vendor: FulfillmentVendor;
  submit(
    image: RenderedDesign,
    displayName: string,
    externalReference: string,
    options?: SubmitOptions
  ): Promise<FulfillmentOrder>;
  list(cursor: string | null, options?: ListOptions): Promise<OrderPage>;
  verify(): Promise<boolean>;
  close(): Promise<void>;
}
