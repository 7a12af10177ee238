import { describe, expect, it } from "vitest";
import { z } from "zod";
import { scriptedFetch } from "../testing/fakes";
import { FulfillmentError } from "./errors";
import { parseVendorBody, VendorSession } from "./session";

function session(responses: Parameters<typeof scriptedFetch>[0]) {
  const scripted = scriptedFetch(responses);
  return {
    requests: scripted.requests,
    session: new VendorSession({
      vendor: "printify",
      baseUrl: "https://vendor.example.test/v1",
      headers: { Authorization: "Bearer test-secret" },
      fetch: scripted.fetch
    })
  };
}

async function failure(promise: Promise<unknown>): Promise<FulfillmentError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof FulfillmentError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the request to fail");
}

describe("VendorSession", () => {
  it("sends JSON with the session headers and parses the reply", async () => {
    const { session: subject, requests } = session([{ body: { id: "img-1" } }]);

    const body = await subject.request("POST", "/uploads/images.json", { body: { file_name: "a.png" } });

    expect(body).toEqual({ id: "img-1" });
    expect(requests[0]).toEqual({
      method: "POST",
      url: "https://vendor.example.test/v1/uploads/images.json",
      headers: {
        accept: "application/json",
        authorization: "Bearer test-secret",
        "content-type": "application/json"
      },
      body: { file_name: "a.png" }
    });
  });

  it("builds query strings and skips undefined values", () => {
    const { session: subject } = session([]);
    expect(subject.buildUrl("shops/1/products.json", { page: 2, limit: 50, skip: undefined })).toBe(
      "https://vendor.example.test/v1/shops/1/products.json?page=2&limit=50"
    );
  });

  it.each([
    [503, true],
    [429, true],
    [500, true],
    [400, false],
    [401, false],
    [404, false]
  ])("classifies HTTP %i as retryable=%s", async (status, retryable) => {
    const { session: subject } = session([{ status, text: "nope" }]);

    const error = await failure(subject.request("GET", "shops.json"));

    expect(error.status).toBe(status);
    expect(error.retryable).toBe(retryable);
    expect(error.body).toBe("nope");
  });

  it("treats network errors as retryable", async () => {
    const { session: subject } = session([new TypeError("fetch failed")]);

    const error = await failure(subject.request("GET", "shops.json"));

    expect(error).toMatchObject({ status: null, retryable: true });
  });

  it("does not retry a request the caller cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const { session: subject } = session([new DOMException("aborted", "AbortError")]);

    const error = await failure(subject.request("GET", "shops.json", { signal: controller.signal }));

    expect(error.retryable).toBe(false);
  });

  it("returns null for empty bodies and rejects non-JSON ones", async () => {
    const { session: subject } = session([{ status: 204 }, { text: "<html>" }]);

    expect(await subject.request("DELETE", "thing")).toBeNull();
    expect((await failure(subject.request("GET", "thing"))).retryable).toBe(false);
  });

  it("refuses requests once closed", async () => {
    const { session: subject, requests } = session([]);
    await subject.close();

    const error = await failure(subject.request("GET", "shops.json"));

    expect(error.message).toBe("printify session is closed.");
    expect(requests).toHaveLength(0);
  });
});

describe("parseVendorBody", () => {
  it("turns schema mismatches into terminal errors", () => {
    expect(() => parseVendorBody("prodigi", z.object({ id: z.string() }), { id: 7 }, "order")).toThrow(
      "prodigi returned an unexpected order payload."
    );
  });
});
