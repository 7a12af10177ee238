import type { z } from "zod";
import type { FulfillmentVendor } from "@shirtsmith/contracts";
import { FulfillmentError, isRetryableStatus } from "./errors";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface VendorSessionOptions {
  vendor: FulfillmentVendor;
  baseUrl: string;
  headers: Record<string, string>;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export interface SessionRequestOptions {
  query?: Record<string, string | number | undefined>;
  body?: unknown;
  signal?: AbortSignal;
}

const DEFAULT_TIMEOUT_MS = 30000;
const MAX_ERROR_BODY = 2000;

/**
 * Long-lived HTTP session for one vendor. Created once when the service starts
 * and shared by every request; `close()` cancels whatever is still in flight.
 */
export class VendorSession {
  private readonly lifetime = new AbortController();
  private readonly fetchImpl: FetchLike;
  private closed = false;

  constructor(private readonly options: VendorSessionOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  buildUrl(path: string, query: SessionRequestOptions["query"] = {}): string {
    const base = this.options.baseUrl.endsWith("/") ? this.options.baseUrl : `${this.options.baseUrl}/`;
    const url = new URL(path.replace(/^\/+/, ""), base);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  async request(method: HttpMethod, path: string, options: SessionRequestOptions = {}): Promise<unknown> {
    const { vendor } = this.options;

    if (this.closed) {
      throw new FulfillmentError(`${vendor} session is closed.`, {
        vendor,
        status: null,
        retryable: false
      });
    }

    const signals = [this.lifetime.signal, AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS)];
    if (options.signal) {
      signals.push(options.signal);
    }

    const headers: Record<string, string> = { Accept: "application/json", ...this.options.headers };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await this.fetchImpl(this.buildUrl(path, options.query), {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.any(signals)
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      const cancelled = Boolean(options.signal?.aborted) || this.lifetime.signal.aborted;
      throw new FulfillmentError(
        cancelled ? `${vendor} request was cancelled.` : `${vendor} request failed before a response arrived.`,
        { vendor, status: null, retryable: !cancelled, cause: error }
      );
    }

    if (!ok) {
      throw new FulfillmentError(`${vendor} responded with HTTP ${status}.`, {
        vendor,
        status,
        retryable: isRetryableStatus(status),
        body: text.slice(0, MAX_ERROR_BODY)
      });
    }

    if (!text.trim()) {
      return null;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new FulfillmentError(`${vendor} returned a body that is not JSON.`, {
        vendor,
        status,
        retryable: false,
        body: text.slice(0, MAX_ERROR_BODY),
        cause: error
      });
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.lifetime.abort();
  }
}

export function parseVendorBody<T extends z.ZodTypeAny>(
  vendor: FulfillmentVendor,
  schema: T,
  body: unknown,
  what: string
): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new FulfillmentError(`${vendor} returned an unexpected ${what} payload.`, {
      vendor,
      status: null,
      retryable: false,
      body: parsed.error.issues
        .slice(0, 5)
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; "),
      cause: parsed.error
    });
  }
  return parsed.data;
}
