// lib/gateway/usage-plan.ts
// Per-key throttle (token bucket: steady rate + burst) and period quota.
// Counters live in this process only.
import type { QuotaPeriod } from "@/lib/config";

export type UsagePlanLimits = {
  rateLimit: number; // requests per second
  burstLimit: number;
  quotaLimit: number;
  quotaPeriod: QuotaPeriod;
};

export type UsageDecision =
  | { allowed: true; remainingQuota: number }
  | { allowed: false; reason: "throttled" | "quota_exceeded" };

type KeyUsage = {
  tokens: number;
  refilledAt: number;
  periodStart: number;
  used: number;
};

/** Start (UTC, ms) of the quota period containing `t`. Weeks start on Monday. */
export function periodStart(t: number, period: QuotaPeriod): number {
  const d = new Date(t);
  const y = d.getUTCFullYear();
  const m = d.getUTCMonth();
  if (period === "MONTH") return Date.UTC(y, m, 1);
  const day = Date.UTC(y, m, d.getUTCDate());
  if (period === "DAY") return day;
  const sinceMonday = (d.getUTCDay() + 6) % 7;
  return day - sinceMonday * 86_400_000;
}

export class UsagePlan {
  private readonly usage = new Map<string, KeyUsage>();

  constructor(private readonly limits: UsagePlanLimits, private readonly now: () => number = Date.now) {}

  consume(keyId: string): UsageDecision {
    const t = this.now();
    const start = periodStart(t, this.limits.quotaPeriod);
    let u = this.usage.get(keyId);
    if (!u) {
      u = { tokens: this.limits.burstLimit, refilledAt: t, periodStart: start, used: 0 };
      this.usage.set(keyId, u);
    }

    if (u.periodStart !== start) {
      u.periodStart = start;
      u.used = 0;
    }
    if (u.used >= this.limits.quotaLimit) {
      return { allowed: false, reason: "quota_exceeded" };
    }

    const elapsedSec = Math.max(0, t - u.refilledAt) / 1000;
    u.tokens = Math.min(this.limits.burstLimit, u.tokens + elapsedSec * this.limits.rateLimit);
    u.refilledAt = t;
    if (u.tokens < 1) {
      return { allowed: false, reason: "throttled" };
    }

    u.tokens -= 1;
    u.used += 1;
    return { allowed: true, remainingQuota: this.limits.quotaLimit - u.used };
  }
}
