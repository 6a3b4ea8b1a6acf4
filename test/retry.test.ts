import { describe, it, expect, vi } from "vitest";
import { UpstreamHttpError } from "@/lib/errors";
import { backoffDelay, withRetry } from "@/lib/llm/retry";

describe("backoffDelay", () => {
  it("doubles per attempt with jitter and a ceiling", () => {
    expect(backoffDelay(0, 250, 4000, () => 1)).toBe(250);
    expect(backoffDelay(3, 250, 4000, () => 0)).toBe(1000);
    expect(backoffDelay(10, 250, 4000, () => 1)).toBe(4000);
  });
});

describe("withRetry", () => {
  const transient = () => new UpstreamHttpError("503", 503, true);

  it("retries retryable errors until success", async () => {
    let n = 0;
    const onRetry = vi.fn();
    const result = await withRetry(
      async () => {
        if (n++ < 2) throw transient();
        return "ok";
      },
      { retries: 3, sleep: async () => {}, random: () => 1, onRetry }
    );

    expect(result).toBe("ok");
    expect(onRetry.mock.calls.map((c) => [c[1], c[2]])).toEqual([
      [1, 250],
      [2, 500],
    ]);
  });

  it("stops at the first non-retryable error", async () => {
    const fn = vi.fn(async () => {
      throw new UpstreamHttpError("400", 400, false);
    });
    await expect(withRetry(fn, { retries: 3, sleep: async () => {} })).rejects.toThrow("400");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("rethrows the last error once retries are spent", async () => {
    const fn = vi.fn(async () => {
      throw transient();
    });
    await expect(withRetry(fn, { retries: 2, sleep: async () => {} })).rejects.toBeInstanceOf(UpstreamHttpError);
    expect(fn).toHaveBeenCalledTimes(3);
  });
});
