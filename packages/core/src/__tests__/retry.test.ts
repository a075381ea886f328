import { describe, it, expect, vi } from "vitest";
import { withRetry, sleep } from "../retry.js";
import { FatalError, PublishError, TransientError } from "../errors.js";

const fast = { initialDelayMs: 1, maxDelayMs: 2 };

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn(async () => "ok");
    await expect(withRetry(fn, "test", fast)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries transient errors until success", async () => {
    let calls = 0;
    const result = await withRetry(
      async (attempt) => {
        calls++;
        if (attempt < 3) throw new TransientError("rate limited", 429);
        return attempt;
      },
      "test",
      { ...fast, maxAttempts: 3 }
    );
    expect(result).toBe(3);
    expect(calls).toBe(3);
  });

  it("rethrows fatal errors without retrying", async () => {
    const fn = vi.fn(async () => {
      throw new FatalError("bad output");
    });
    await expect(withRetry(fn, "test", fast)).rejects.toBeInstanceOf(FatalError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("rethrows the last transient error when attempts run out", async () => {
    const fn = vi.fn(async (attempt: number) => {
      throw new TransientError(`failure ${attempt}`);
    });
    await expect(
      withRetry(fn, "test", { ...fast, maxAttempts: 2 })
    ).rejects.toThrow("failure 2");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("retries transient publish errors only", async () => {
    const transient = vi.fn(async () => {
      throw new PublishError("502", true);
    });
    const permanent = vi.fn(async () => {
      throw new PublishError("401");
    });

    await expect(withRetry(transient, "t", { ...fast, maxAttempts: 2 })).rejects.toThrow("502");
    await expect(withRetry(permanent, "p", { ...fast, maxAttempts: 2 })).rejects.toThrow("401");
    expect(transient).toHaveBeenCalledTimes(2);
    expect(permanent).toHaveBeenCalledTimes(1);
  });

  it("stops retrying when the signal aborts during backoff", async () => {
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      throw new TransientError("connection reset");
    });
    await expect(
      withRetry(fn, "test", {
        initialDelayMs: 60_000,
        maxAttempts: 3,
        signal: controller.signal,
        onRetry: () => controller.abort(),
      })
    ).rejects.toThrow("connection reset");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("reports each retry to onRetry", async () => {
    const onRetry = vi.fn();
    await withRetry(
      async (attempt) => {
        if (attempt === 1) throw new TransientError("flaky");
        return "ok";
      },
      "test",
      { ...fast, onRetry }
    );
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[0]).toBe(1);
  });
});

describe("sleep", () => {
  it("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    const start = Date.now();
    const pending = sleep(5_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - start).toBeLessThan(1_000);
  });
});
