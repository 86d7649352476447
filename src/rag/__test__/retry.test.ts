import { describe, expect, test } from "vitest";
import { KeyedLock, mapWithConcurrency } from "../concurrency.js";
import { ApiError, isTransient } from "../errors.js";
import { withRetry } from "../retry.js";

describe("isTransient", () => {
  test("rate limits, server errors and network failures", () => {
    expect(isTransient(new ApiError(429, ""))).toBe(true);
    expect(isTransient(new ApiError(503, ""))).toBe(true);
    expect(isTransient(new ApiError(408, ""))).toBe(true);
    expect(isTransient(new ApiError(401, ""))).toBe(false);
    expect(isTransient(new TypeError("fetch failed"))).toBe(true);
    expect(isTransient(new DOMException("timed out", "TimeoutError"))).toBe(true);
    expect(isTransient(new Error("parse error"))).toBe(false);
  });
});

describe("withRetry", () => {
  test("doubles the delay after each failure", async () => {
    const delays: number[] = [];
    let attempts = 0;
    const value = await withRetry(
      async () => {
        attempts++;
        if (attempts < 3) throw new ApiError(500, "down");
        return "ok";
      },
      { attempts: 5, baseDelayMs: 1, onRetry: (_err, _attempt, delay) => delays.push(delay) },
    );

    expect(value).toBe("ok");
    expect(delays).toEqual([1, 2]);
  });

  test("stops at the first error that is not retryable", async () => {
    let attempts = 0;
    await expect(
      withRetry(
        async () => {
          attempts++;
          throw new ApiError(400, "bad");
        },
        { attempts: 5, baseDelayMs: 1 },
      ),
    ).rejects.toThrow("API error (400): bad");
    expect(attempts).toBe(1);
  });

  test("an aborted signal ends the wait", async () => {
    const controller = new AbortController();
    const pending = withRetry(
      async () => {
        throw new ApiError(503, "busy");
      },
      { attempts: 3, baseDelayMs: 60_000, signal: controller.signal, onRetry: () => controller.abort() },
    );
    await expect(pending).rejects.toMatchObject({ name: "AbortError" });
  });
});

describe("mapWithConcurrency", () => {
  test("keeps input order and the concurrency limit", async () => {
    let running = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (ms, i) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, ms));
      running--;
      return `${i}:${ms}`;
    });

    expect(results).toEqual(["0:30", "1:10", "2:20", "3:5"]);
    expect(peak).toBe(2);
  });
});

describe("KeyedLock", () => {
  test("runs work for one key in order", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    await Promise.all([
      lock.run("a", async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        order.push("a1");
      }),
      lock.run("a", async () => {
        order.push("a2");
      }),
      lock.run("b", async () => {
        order.push("b1");
      }),
    ]);

    expect(order).toEqual(["b1", "a1", "a2"]);
  });

  test("a failure does not block the next caller", async () => {
    const lock = new KeyedLock();
    await expect(lock.run("a", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(await lock.run("a", async () => "next")).toBe("next");
  });
});
