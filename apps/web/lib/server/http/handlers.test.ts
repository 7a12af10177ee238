import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../config";
import { encodeReference } from "../fulfillment/reference";
import { DesignHistoryIndex } from "../history/design-history";
import { IntentParser } from "../intent/parser";
import { RequestOrchestrator } from "../orchestration/orchestrator";
import { buildDesignService, type DesignService } from "../service";
import { FakeFulfillmentClient, recordingLogger, StubRenderer } from "../testing/fakes";
import { createDesign, designStatistics, health, listDesigns, outcomeStatus } from "./handlers";

function service(fulfillment = new FakeFulfillmentClient()): DesignService {
  const config = loadConfig({ PRINTIFY_API_KEY: "test-secret", PRINTIFY_SHOP_ID: "shop-1" });
  const { logger } = recordingLogger();
  return {
    config,
    logger,
    fulfillment,
    orchestrator: new RequestOrchestrator({
      parser: IntentParser.create({
        triggerKeywords: config.triggerKeywords,
        defaultStyle: config.defaultStyle,
        timeoutMs: 100,
        logger
      }),
      renderer: new StubRenderer(),
      fulfillment,
      retry: { maxAttempts: 1, backoffBaseMs: 0 },
      referencePrefix: config.referencePrefix,
      logger,
      createNonce: () => "cafebabe"
    }),
    history: new DesignHistoryIndex(fulfillment, config.referencePrefix, logger)
  };
}

function post(body: unknown): Request {
  return new Request("http://localhost/api/v1/requests", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body)
  });
}

describe("createDesign", () => {
  it("rejects malformed bodies", async () => {
    const provide = () => service();

    const invalidJson = await createDesign(post("{"), provide);
    const missingUser = await createDesign(post({ message: "shirt", displayName: "Sam" }), provide);

    expect(invalidJson.status).toBe(400);
    expect(await invalidJson.text()).toBe("Invalid JSON body.");
    expect(missingUser.status).toBe(400);
    expect(await missingUser.text()).toBe("Field 'userId' Required.");
  });

  it("ignores messages without a trigger keyword", async () => {
    const fulfillment = new FakeFulfillmentClient();
    const response = await createDesign(
      post({ message: "hello there", userId: "u1", displayName: "Sam" }),
      () => service(fulfillment)
    );

    expect(response.status).toBe(422);
    expect(fulfillment.submitCalls).toHaveLength(0);
  });

  it("returns the outcome with 201 on success", async () => {
    const response = await createDesign(
      post({ message: 'shirt that says "Hello World"', userId: "u1", displayName: "Sam" }),
      () => service()
    );

    expect(response.status).toBe(201);
    expect(await response.json()).toMatchObject({
      success: true,
      orderUrl: "https://shop.example.test/orders/order-1",
      phrase: "Hello World"
    });
  });

  it("reports a missing configuration as a server error", async () => {
    const response = await createDesign(post({ message: "shirt", userId: "u1", displayName: "Sam" }), () => {
      throw new ConfigError(["PRINTIFY_API_KEY Required"]);
    });

    expect(response.status).toBe(500);
  });
});

describe("outcomeStatus", () => {
  it("maps failures by kind", () => {
    expect(outcomeStatus({ success: false, stage: "failed", responseText: "", errorKind: "fulfillment_failure" })).toBe(502);
    expect(outcomeStatus({ success: false, stage: "failed", responseText: "", errorKind: "render_failure" })).toBe(500);
  });
});

describe("history routes", () => {
  it("lists a user's designs and overall statistics", async () => {
    const fulfillment = new FakeFulfillmentClient();
    fulfillment.seed(encodeReference("tee", "u1", "00000001"));
    fulfillment.seed(encodeReference("tee", "u2", "00000002"));
    const provide = () => service(fulfillment);

    const mine = await listDesigns(new Request("http://localhost/api/v1/designs?userId=u1"), provide);
    const stats = await designStatistics(new Request("http://localhost/api/v1/designs/stats"), provide);

    expect(await mine.json()).toEqual({
      designs: [expect.objectContaining({ orderId: "order-1" })]
    });
    expect(await stats.json()).toMatchObject({ totalCount: 2, distinctUserCount: 2, perUserAverage: 1 });
  });

  it("hides vendor failures behind a 502", async () => {
    const fulfillment = new FakeFulfillmentClient();
    fulfillment.list = async () => {
      throw new Error("socket hang up");
    };

    const response = await listDesigns(new Request("http://localhost/api/v1/designs"), () => service(fulfillment));

    expect(response.status).toBe(502);
    expect(await response.text()).toBe("The print shop could not be reached.");
  });
});

describe("health", () => {
  it("reports the vendor and its connectivity", async () => {
    const fulfillment = new FakeFulfillmentClient();
    expect(await (await health(() => service(fulfillment))).json()).toEqual({ vendor: "printify", connected: true });

    await fulfillment.close();
    expect(await (await health(() => service(fulfillment))).json()).toEqual({ vendor: "printify", connected: false });
  });
});

describe("buildDesignService", () => {
  it("wires the configured vendor without a language model", () => {
    const config = loadConfig({ PRINTIFY_API_KEY: "test-secret", PRINTIFY_SHOP_ID: "shop-1" });
    const built = buildDesignService(config, { logger: recordingLogger().logger });

    expect(built.fulfillment.vendor).toBe("printify");
  });
});
