// lib/server/deadline.ts
// Shared time budget for the outbound calls of one request.

export class Deadline {
  private readonly expiresAt: number;

  constructor(budgetMs: number, private readonly now: () => number = Date.now) {
    this.expiresAt = now() + budgetMs;
  }

  remaining(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  expired(): boolean {
    return this.remaining() === 0;
  }

  /** Timeout for the next call: the remaining budget, capped at `capMs`. */
  timeoutFor(capMs = Number.POSITIVE_INFINITY): number {
    return Math.min(capMs, this.remaining());
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

/** Rejects with TimeoutError after `ms`; the underlying work is not cancelled. */
export function withTimeout<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  if (ms <= 0) return Promise.reject(new TimeoutError(`${label}: request budget exhausted`));
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}
