import { describe, it, expect } from "vitest";
import { constantTimeEqual, keyFingerprint, matchApiKey } from "@/lib/gateway/api-keys";
import { checkRequest } from "@/lib/gateway/gateway";
import { UsagePlan, periodStart } from "@/lib/gateway/usage-plan";
import { captureLogger } from "./fakes";

const keys = ["test-key-one", "test-key-two"];

function request(method: string, headers: Record<string, string> = {}): Request {
  return new Request("http://localhost/query", { method, headers });
}

describe("api keys", () => {
  it("matches only exact keys", () => {
    expect(constantTimeEqual("abc", "abc")).toBe(true);
    expect(constantTimeEqual("abc", "abd")).toBe(false);
    expect(constantTimeEqual("abc", "abcd")).toBe(false);
    expect(matchApiKey("test-key-two", keys)).toBe("test-key-two");
    expect(matchApiKey("test-key", keys)).toBeNull();
    expect(matchApiKey(null, keys)).toBeNull();
    expect(matchApiKey("", keys)).toBeNull();
  });

  it("fingerprints keys as 12 stable hex chars", async () => {
    const id = await keyFingerprint("test-key-one");
    expect(id).toMatch(/^[0-9a-f]{12}$/);
    expect(await keyFingerprint("test-key-one")).toBe(id);
    expect(await keyFingerprint("test-key-two")).not.toBe(id);
  });
});

describe("UsagePlan", () => {
  const start = Date.UTC(2026, 3, 22, 15, 0, 0);

  it("throttles past the burst and refills at the steady rate", () => {
    let t = start;
    const plan = new UsagePlan({ rateLimit: 1, burstLimit: 2, quotaLimit: 100, quotaPeriod: "DAY" }, () => t);

    expect(plan.consume("k")).toEqual({ allowed: true, remainingQuota: 99 });
    expect(plan.consume("k")).toEqual({ allowed: true, remainingQuota: 98 });
    expect(plan.consume("k")).toEqual({ allowed: false, reason: "throttled" });
    expect(plan.consume("other")).toEqual({ allowed: true, remainingQuota: 99 });

    t += 1000;
    expect(plan.consume("k")).toEqual({ allowed: true, remainingQuota: 97 });
  });

  it("enforces the quota until the period rolls over", () => {
    let t = start;
    const plan = new UsagePlan({ rateLimit: 100, burstLimit: 200, quotaLimit: 3, quotaPeriod: "DAY" }, () => t);

    expect([1, 2, 3].map(() => plan.consume("k"))).toEqual([
      { allowed: true, remainingQuota: 2 },
      { allowed: true, remainingQuota: 1 },
      { allowed: true, remainingQuota: 0 },
    ]);
    expect(plan.consume("k")).toEqual({ allowed: false, reason: "quota_exceeded" });

    t = Date.UTC(2026, 3, 23, 0, 0, 1);
    expect(plan.consume("k")).toEqual({ allowed: true, remainingQuota: 2 });
  });

  it("computes period starts in UTC with weeks starting on Monday", () => {
    expect(periodStart(start, "DAY")).toBe(Date.UTC(2026, 3, 22));
    expect(periodStart(start, "WEEK")).toBe(Date.UTC(2026, 3, 20));
    expect(periodStart(start, "MONTH")).toBe(Date.UTC(2026, 3, 1));
  });
});

describe("checkRequest", () => {
  function options(burstLimit = 200) {
    const { logger, lines } = captureLogger();
    const plan = new UsagePlan({ rateLimit: 1, burstLimit, quotaLimit: 1000, quotaPeriod: "MONTH" }, () => 0);
    return { opts: { apiKeys: keys, plan, logger }, lines };
  }

  it("answers preflight requests without a key", async () => {
    const result = await checkRequest(request("OPTIONS"), options().opts);
    expect(result.kind).toBe("respond");
    if (result.kind !== "respond") return;
    expect(result.response.status).toBe(204);
    expect(result.response.headers.get("access-control-allow-headers")).toBe("Content-Type,X-Api-Key");
  });

  it("forbids requests without a key", async () => {
    const { opts, lines } = options();
    const result = await checkRequest(request("POST"), opts);

    expect(result.kind).toBe("respond");
    if (result.kind !== "respond") return;
    expect(result.response.status).toBe(403);
    expect(await result.response.json()).toEqual({ message: "Forbidden" });
    expect(lines[0].record).toMatchObject({ event: "gateway.rejected", path: "/query", reason: "missing_key" });
  });

  it("forbids unknown keys", async () => {
    const { opts, lines } = options();
    const result = await checkRequest(request("POST", { "x-api-key": "wrong-key" }), opts);

    expect(result.kind).toBe("respond");
    expect(lines[0].record).toMatchObject({ reason: "invalid_key" });
    expect(JSON.stringify(lines)).not.toContain("wrong-key");
  });

  it("allows a valid key and identifies it by fingerprint", async () => {
    const result = await checkRequest(request("POST", { "x-api-key": "test-key-one" }), options().opts);
    expect(result).toEqual({ kind: "allow", keyId: await keyFingerprint("test-key-one") });
  });

  it("forbids a key over its throttle", async () => {
    const { opts, lines } = options(1);
    const headers = { "x-api-key": "test-key-one" };
    expect((await checkRequest(request("POST", headers), opts)).kind).toBe("allow");

    const second = await checkRequest(request("POST", headers), opts);
    expect(second.kind).toBe("respond");
    if (second.kind !== "respond") return;
    expect(second.response.status).toBe(403);
    expect(lines.at(-1)?.record).toMatchObject({ reason: "throttled" });
  });
});
