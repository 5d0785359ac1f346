import { describe, expect, it, vi } from "vitest";
import { MigrateError, statusOf } from "../../../src/connectors/core/errors.js";
import { retryAfterFromHeaders, withRetry } from "../../../src/connectors/core/retry.js";

describe("withRetry", () => {
  it("returns on first success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    const result = await withRetry(fn);
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries on failure then succeeds", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockResolvedValue("ok");
    const result = await withRetry(fn, { baseDelayMs: 10 });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws after max retries", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("ECONNRESET"));
    await expect(
      withRetry(fn, { maxRetries: 2, baseDelayMs: 10 }),
    ).rejects.toThrow("ECONNRESET");
    expect(fn).toHaveBeenCalledTimes(3); // initial + 2 retries
  });

  it("does not retry non-retryable errors", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("bad input"));
    await expect(
      withRetry(fn, { maxRetries: 3, baseDelayMs: 10 }),
    ).rejects.toThrow("bad input");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries 5xx statuses by default", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new MigrateError("unavailable", { status: 503 }))
      .mockResolvedValue("ok");
    await expect(withRetry(fn, { baseDelayMs: 0 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("respects custom retryOn", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new MigrateError("conflict", { status: 409 }))
      .mockResolvedValue("ok");
    const result = await withRetry(fn, {
      baseDelayMs: 10,
      retryOn: (err: unknown) => statusOf(err) === 409,
    });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("reports doubling delays with exponential backoff", async () => {
    const delays: number[] = [];
    const fn = vi.fn().mockRejectedValue(new Error("fetch failed"));
    await expect(
      withRetry(fn, {
        maxRetries: 3,
        baseDelayMs: 1,
        onRetry: (_err, _attempt, delayMs) => delays.push(delayMs),
      }),
    ).rejects.toThrow("fetch failed");
    expect(delays).toEqual([1, 2, 4]);
  });

  it("keeps the same delay with fixed backoff", async () => {
    const attempts: number[] = [];
    const delays: number[] = [];
    const fn = vi.fn().mockRejectedValue(new Error("socket hang up"));
    await expect(
      withRetry(fn, {
        maxRetries: 2,
        baseDelayMs: 3,
        backoff: "fixed",
        onRetry: (_err, attempt, delayMs) => {
          attempts.push(attempt);
          delays.push(delayMs);
        },
      }),
    ).rejects.toThrow("socket hang up");
    expect(attempts).toEqual([1, 2]);
    expect(delays).toEqual([3, 3]);
  });
});

describe("withRetry with a server-mandated delay", () => {
  it("waits the mandated delay instead of the backoff, capped at maxDelayMs", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockResolvedValue("ok");
    const delays: number[] = [];
    const mandated = [0, 90_000];

    const result = await withRetry(fn, {
      baseDelayMs: 1_000,
      maxDelayMs: 5,
      retryAfterMs: () => mandated.shift(),
      onRetry: (_err, _attempt, delayMs) => delays.push(delayMs),
    });

    expect(result).toBe("ok");
    expect(delays).toEqual([0, 5]);
  });
});

class HeaderError extends Error {
  constructor(readonly headers: unknown) {
    super("rate limited");
  }
}

describe("retryAfterFromHeaders", () => {
  it("reads Retry-After seconds from fetch Headers", () => {
    expect(retryAfterFromHeaders(new HeaderError(new Headers({ "Retry-After": "2" })))).toBe(2000);
  });

  it("reads a plain header record", () => {
    expect(retryAfterFromHeaders(new HeaderError({ "retry-after": "0.5" }))).toBe(500);
  });

  it("ignores missing or unparsable values", () => {
    expect(retryAfterFromHeaders(new HeaderError({}))).toBeUndefined();
    expect(retryAfterFromHeaders(new HeaderError({ "retry-after": "soon" }))).toBeUndefined();
    expect(retryAfterFromHeaders(new Error("plain"))).toBeUndefined();
  });
});
