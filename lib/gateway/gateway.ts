// lib/gateway/gateway.ts
// Key check and usage plan in front of the query routes. Rejections happen
// here, before any handler code runs, with the body `{"message":"Forbidden"}`.
import { keyFingerprint, matchApiKey } from "@/lib/gateway/api-keys";
import type { UsagePlan } from "@/lib/gateway/usage-plan";
import type { Logger } from "@/lib/logging/logger";
import { CORS_HEADERS, preflightResponse } from "@/lib/server/http";

export const API_KEY_HEADER = "x-api-key";
/** Set by the gateway on forwarded requests: fingerprint of the key used. */
export const API_KEY_ID_HEADER = "x-api-key-id";

export type GatewayOptions = {
  apiKeys: readonly string[];
  plan: UsagePlan;
  logger: Logger;
};

export type GatewayResult =
  | { kind: "respond"; response: Response }
  | { kind: "allow"; keyId: string };

export function forbidden(): Response {
  return new Response(JSON.stringify({ message: "Forbidden" }), {
    status: 403,
    headers: { "content-type": "application/json", ...CORS_HEADERS },
  });
}

export async function checkRequest(req: Request, opts: GatewayOptions): Promise<GatewayResult> {
  if (req.method === "OPTIONS") {
    return { kind: "respond", response: preflightResponse() };
  }

  const path = new URL(req.url).pathname;
  const key = matchApiKey(req.headers.get(API_KEY_HEADER), opts.apiKeys);
  if (!key) {
    opts.logger.warn("gateway.rejected", { path, reason: req.headers.has(API_KEY_HEADER) ? "invalid_key" : "missing_key" });
    return { kind: "respond", response: forbidden() };
  }

  const keyId = await keyFingerprint(key);
  const decision = opts.plan.consume(keyId);
  if (!decision.allowed) {
    opts.logger.warn("gateway.rejected", { path, keyId, reason: decision.reason });
    return { kind: "respond", response: forbidden() };
  }
  return { kind: "allow", keyId };
}
