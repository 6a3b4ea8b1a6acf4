// lib/gateway/api-keys.ts
// Web Crypto only: this runs inside middleware as well as in Node scripts.

const encoder = new TextEncoder();

/** Compares in time independent of where the strings first differ. */
export function constantTimeEqual(a: string, b: string): boolean {
  const x = encoder.encode(a);
  const y = encoder.encode(b);
  let diff = x.length ^ y.length;
  const n = Math.max(x.length, y.length);
  for (let i = 0; i < n; i++) diff |= (x[i] ?? 0) ^ (y[i] ?? 0);
  return diff === 0;
}

/** The configured key equal to `presented`, or null. */
export function matchApiKey(presented: string | null, keys: readonly string[]): string | null {
  if (!presented) return null;
  let found: string | null = null;
  for (const key of keys) {
    if (constantTimeEqual(presented, key)) found = key;
  }
  return found;
}

/** Short SHA-256 fingerprint, safe to log in place of the key itself. */
export async function keyFingerprint(key: string): Promise<string> {
  const digest = await crypto.subtle.digest("SHA-256", encoder.encode(key));
  return Array.from(new Uint8Array(digest))
    .slice(0, 6)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}
