// lib/server/http.ts
// JSON responses for the route handlers; every reply, error or not, is JSON.

export const CORS_HEADERS: Record<string, string> = {
  "access-control-allow-origin": "*",
  "access-control-allow-headers": "Content-Type,X-Api-Key",
  "access-control-allow-methods": "POST, OPTIONS",
};

export function jsonResponse(
  status: number,
  body: unknown,
  meta: { requestId?: string; startedAt?: number; headers?: Record<string, string> } = {}
): Response {
  const headers: Record<string, string> = {
    "content-type": "application/json",
    "cache-control": "no-store",
    ...CORS_HEADERS,
    ...meta.headers,
  };
  if (meta.requestId) headers["x-request-id"] = meta.requestId;
  if (meta.startedAt !== undefined) headers["x-runtime-ms"] = String(Date.now() - meta.startedAt);
  return new Response(JSON.stringify(body), { status, headers });
}

export function preflightResponse(): Response {
  return new Response(null, { status: 204, headers: { ...CORS_HEADERS, "access-control-max-age": "600" } });
}
