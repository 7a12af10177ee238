import { describe, expect, it, vi } from "vitest";
import { backoffDelay, sleep, withRetry } from "./retry";

const POLICY = { maxAttempts: 3, backoffBaseMs: 100 };

class Flaky extends Error {}

describe("backoffDelay", () => {
  it("doubles per attempt and honours the cap", () => {
    expect([1, 2, 3].map((attempt) => backoffDelay(attempt, POLICY))).toEqual([100, 200, 400]);
    expect(backoffDelay(5, { ...POLICY, maxBackoffMs: 250 })).toBe(250);
  });
});

describe("withRetry", () => {
  it("retries retryable failures with exponential waits", async () => {
    const waits: number[] = [];
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Flaky("first"))
      .mockRejectedValueOnce(new Flaky("second"))
      .mockResolvedValueOnce("ok");

    const result = await withRetry(operation, POLICY, {
      isRetryable: (error) => error instanceof Flaky,
      sleep: async (ms) => {
        waits.push(ms);
      }
    });

    expect(result).toBe("ok");
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(waits).toEqual([100, 200]);
  });

  it("gives up after the attempt budget with the last error", async () => {
    const operation = vi.fn(async (attempt: number): Promise<string> => {
      throw new Flaky(`attempt ${attempt}`);
    });

    await expect(
      withRetry(operation, POLICY, { isRetryable: () => true, sleep: async () => undefined })
    ).rejects.toThrow("attempt 3");
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("stops at the first terminal failure", async () => {
    const onRetry = vi.fn();
    const operation = vi.fn(async (): Promise<string> => {
      throw new Error("bad request");
    });

    await expect(withRetry(operation, POLICY, { isRetryable: () => false, onRetry })).rejects.toThrow("bad request");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it("does not retry once the caller has aborted", async () => {
    const controller = new AbortController();
    const operation = vi.fn(async (): Promise<string> => {
      controller.abort();
      throw new Flaky("gone");
    });

    await expect(
      withRetry(operation, POLICY, { isRetryable: () => true, signal: controller.signal })
    ).rejects.toThrow("gone");
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe("sleep", () => {
  it("rejects when aborted mid-wait", async () => {
    const controller = new AbortController();
    const waiting = sleep(10_000, controller.signal);
    controller.abort(new Error("stop"));

    await expect(waiting).rejects.toThrow("stop");
  });
});
