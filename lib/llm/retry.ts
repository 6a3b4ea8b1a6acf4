// lib/llm/retry.ts
// Bounded retry with exponential backoff and jitter for transient upstream
// failures (throttling, 5xx, dropped connections).
import { UpstreamHttpError } from "@/lib/errors";

export type RetryOptions = {
  retries: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export function isRetryableUpstream(err: unknown): boolean {
  return err instanceof UpstreamHttpError && err.retryable;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, random: () => number): number {
  const exp = Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
  return Math.round(exp * (0.5 + random() * 0.5));
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const {
    retries,
    baseDelayMs = 250,
    maxDelayMs = 4000,
    isRetryable = isRetryableUpstream,
    onRetry,
    sleep = defaultSleep,
    random = Math.random,
  } = opts;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= retries || !isRetryable(err)) throw err;
      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs, random);
      onRetry?.(err, attempt + 1, delayMs);
      await sleep(delayMs);
    }
  }
}
