import type { FulfillmentVendor } from "@shirtsmith/contracts";

export interface FulfillmentErrorDetails {
  vendor: FulfillmentVendor;
  status: number | null;
  retryable: boolean;
  body?: string;
  cause?: unknown;
}

export class FulfillmentError extends Error {
  readonly vendor: FulfillmentVendor;
  readonly status: number | null;
  readonly retryable: boolean;
  readonly body?: string;

  constructor(message: string, details: FulfillmentErrorDetails) {
    super(message, { cause: details.cause });
    this.name = "FulfillmentError";
    this.vendor = details.vendor;
    this.status = details.status;
    this.retryable = details.retryable;
    this.body = details.body;
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function isRetryableFailure(error: unknown): boolean {
  return error instanceof FulfillmentError && error.retryable;
}
