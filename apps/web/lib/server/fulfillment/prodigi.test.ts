import { describe, expect, it } from "vitest";
import { silentLogger } from "../logger";
import { scriptedFetch, stubDesign, type FakeResponse } from "../testing/fakes";
import { ProdigiClient, stageToStatus } from "./prodigi";

const REFERENCE = "tee-7531-0a1b2c3d";

function client(responses: Array<FakeResponse | Error>, sandbox = true) {
  const scripted = scriptedFetch(responses);
  return {
    requests: scripted.requests,
    client: new ProdigiClient(
      { apiKey: "test-secret", sandbox, sku: "TEST-SKU" },
      { logger: silentLogger, fetch: scripted.fetch }
    )
  };
}

function order(id: string, stage: string, extra: Record<string, unknown> = {}) {
  return { id, created: "2026-01-02T03:04:05Z", merchantReference: REFERENCE, status: { stage }, ...extra };
}

describe("ProdigiClient.submit", () => {
  it("creates an order keyed by the external reference", async () => {
    const { client: subject, requests } = client([
      {
        body: {
          outcome: "Created",
          order: order("ord_1", "InProgress", {
            items: [{ sku: "TEST-SKU", recipientCost: { amount: "18.50", currency: "GBP" } }]
          })
        }
      }
    ]);

    const result = await subject.submit(stubDesign(), "Hello World - Custom Tee", REFERENCE, {
      description: "Custom design created by Sam"
    });

    expect(result).toEqual({
      orderId: "ord_1",
      externalReference: REFERENCE,
      displayName: "Hello World - Custom Tee",
      orderUrl: "https://dashboard.prodigi.com/orders/ord_1",
      price: 18.5,
      currency: "GBP",
      status: "in_progress",
      createdAt: "2026-01-02T03:04:05Z"
    });

    const [request] = requests;
    expect(request?.url).toBe("https://api.sandbox.prodigi.com/v4.0/Orders");
    expect(request?.headers["x-api-key"]).toBe("test-secret");
    expect(request?.body).toMatchObject({
      merchantReference: REFERENCE,
      idempotencyKey: REFERENCE,
      items: [
        {
          sku: "TEST-SKU",
          copies: 1,
          assets: [{ printArea: "default", url: "data:image/png;base64,iVBORw==" }]
        }
      ],
      metadata: { productName: "Hello World - Custom Tee", description: "Custom design created by Sam" }
    });
  });

  it("uses the live endpoint outside the sandbox", async () => {
    const { client: subject, requests } = client([{ body: { outcome: "Created", order: order("ord_2", "InProgress") } }], false);
    await subject.submit(stubDesign(), "Hi", REFERENCE);
    expect(requests[0]?.url).toBe("https://api.prodigi.com/v4.0/Orders");
  });

  it("treats a failed outcome as a terminal rejection", async () => {
    const { client: subject } = client([{ body: { outcome: "ValidationFailed", order: order("ord_3", "InProgress") } }]);

    await expect(subject.submit(stubDesign(), "Hi", REFERENCE)).rejects.toMatchObject({
      vendor: "prodigi",
      retryable: false,
      body: "ValidationFailed"
    });
  });
});

describe("ProdigiClient.list", () => {
  it("pages by offset while the vendor reports more", async () => {
    const { client: subject, requests } = client([
      { body: { orders: [order("ord_2", "Complete"), order("ord_1", "Cancelled")], hasMore: true } },
      { body: { orders: [order("ord_0", "Draft", { merchantReference: null })], hasMore: false } }
    ]);

    const first = await subject.list(null);
    const second = await subject.list(first.nextCursor);

    expect(first.nextCursor).toBe("2");
    expect(first.orders.map((entry) => entry.status)).toEqual(["complete", "failed"]);
    expect(second.nextCursor).toBeNull();
    expect(second.orders[0]).toMatchObject({ orderId: "ord_0", externalReference: "", displayName: "ord_0" });
    expect(new URL(requests[1]?.url ?? "").searchParams.get("skip")).toBe("2");
  });
});

describe("stageToStatus", () => {
  it("maps unknown stages to pending", () => {
    expect(stageToStatus("InProgress")).toBe("in_progress");
    expect(stageToStatus("Draft")).toBe("pending");
  });
});
