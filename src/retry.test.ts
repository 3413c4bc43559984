import { describe, expect, it, vi } from "vitest";
import { GraphApiError } from "./errors.js";
import { DEFAULT_RETRY_POLICY, backoffDelay, withRetry, type RetryPolicy } from "./retry.js";

const fast: RetryPolicy = { ...DEFAULT_RETRY_POLICY, unitMs: 0 };

const transient = () => new GraphApiError("RateLimited", "slow down", { error: { code: 4 } });

describe("backoffDelay", () => {
  it("grows exponentially and stays within [minWait, maxWait]", () => {
    const delays = [1, 2, 3, 4, 5, 6].map((attempt) => backoffDelay(attempt, DEFAULT_RETRY_POLICY));
    expect(delays).toEqual([4000, 4000, 4000, 8000, 10000, 10000]);
  });

  it("scales with the multiplier and unit", () => {
    const policy = { ...DEFAULT_RETRY_POLICY, multiplier: 3, unitMs: 10 };
    expect([1, 2, 3].map((a) => backoffDelay(a, policy))).toEqual([40, 60, 100]);
  });
});

describe("withRetry", () => {
  it("returns the first success after transient failures", async () => {
    const op = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce("done");

    await expect(withRetry(fast, op)).resolves.toBe("done");
    expect(op).toHaveBeenCalledTimes(3);
    expect(op.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  it("re-throws the last failure unchanged once attempts run out", async () => {
    const failures = [transient(), transient(), transient()];
    let i = 0;
    const op = vi.fn(async () => {
      throw failures[i++];
    });

    const err = await withRetry(fast, op).catch((e: unknown) => e);
    expect(err).toBe(failures[2]);
    expect(failures[2].attempts).toBe(3);
    expect(op).toHaveBeenCalledTimes(3);
  });

  it("does not retry failures the predicate rejects", async () => {
    const auth = new GraphApiError("AuthenticationError", "bad token", { error: { code: 190 } });
    const op = vi.fn(async () => {
      throw auth;
    });

    await expect(withRetry(fast, op)).rejects.toBe(auth);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it("reports each retry to the listener", async () => {
    const onRetry = vi.fn();
    const op = vi.fn(async () => {
      throw transient();
    });

    await expect(withRetry({ ...fast, maxAttempts: 4 }, op, onRetry)).rejects.toBeInstanceOf(GraphApiError);
    expect(op).toHaveBeenCalledTimes(4);
    expect(onRetry.mock.calls.map(([info]) => info.attempt)).toEqual([1, 2, 3]);
  });

  it("accepts a custom retry predicate", async () => {
    const op = vi
      .fn<(attempt: number) => Promise<number>>()
      .mockRejectedValueOnce(new Error("socket reset"))
      .mockResolvedValueOnce(7);

    const policy = { ...fast, isRetryable: (e: unknown) => e instanceof Error && e.message === "socket reset" };
    await expect(withRetry(policy, op)).resolves.toBe(7);
    expect(op).toHaveBeenCalledTimes(2);
  });

  it("runs once when maxAttempts is below one", async () => {
    const op = vi.fn(async () => {
      throw transient();
    });
    await expect(withRetry({ ...fast, maxAttempts: 0 }, op)).rejects.toBeInstanceOf(GraphApiError);
    expect(op).toHaveBeenCalledTimes(1);
  });
});
