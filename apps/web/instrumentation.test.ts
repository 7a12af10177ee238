import { afterEach, describe, expect, it, vi } from "vitest";
import { register } from "./instrumentation";

describe("register", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("logs a missing vendor key instead of failing startup", async () => {
    vi.stubEnv("NEXT_RUNTIME", "nodejs");
    vi.stubEnv("FULFILLMENT_VENDOR", "printify");
    vi.stubEnv("PRINTIFY_API_KEY", "");
    vi.stubEnv("PRINTIFY_SHOP_ID", "shop-1");
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const listeners = process.listenerCount("SIGTERM");

    await expect(register()).resolves.toBeUndefined();

    expect(process.listenerCount("SIGTERM")).toBe(listeners);
    expect(errors).toHaveBeenCalledTimes(1);
    const [line] = errors.mock.calls[0] ?? [];
    expect(JSON.parse(String(line))).toEqual(
      expect.objectContaining({
        level: "error",
        event: "service.misconfigured",
        service: "shirtsmith",
        issues: ["PRINTIFY_API_KEY is required when FULFILLMENT_VENDOR=printify"]
      })
    );
  });

  it("does nothing outside the Node.js runtime", async () => {
    vi.stubEnv("NEXT_RUNTIME", "edge");
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await register();

    expect(errors).not.toHaveBeenCalled();
  });
});
