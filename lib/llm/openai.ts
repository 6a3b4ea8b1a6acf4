// lib/llm/openai.ts
// Thin fetch wrapper for the OpenAI REST API shared by the embedder and the
// generator. Maps transport and HTTP failures to UpstreamHttpError.
import { UpstreamHttpError } from "@/lib/errors";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type OpenAIRequest = {
  baseUrl: string;
  apiKey: string;
  path: string;
  body: unknown;
  timeoutMs: number;
  fetchImpl?: FetchLike;
};

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

async function safeText(r: Response) {
  try {
    return await r.text();
  } catch {
    return "<no body>";
  }
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

export async function postOpenAI(req: OpenAIRequest): Promise<unknown> {
  if (!req.apiKey) {
    throw new UpstreamHttpError("Missing OPENAI_API_KEY", null, false);
  }
  if (req.timeoutMs <= 0) {
    throw new UpstreamHttpError(`Request budget exhausted before ${req.path}`, null, false, true);
  }

  const doFetch = req.fetchImpl ?? fetch;
  let resp: Response;
  try {
    resp = await doFetch(`${req.baseUrl}${req.path}`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${req.apiKey}`,
      },
      body: JSON.stringify(req.body),
      signal: AbortSignal.timeout(req.timeoutMs),
    });
  } catch (err) {
    if (isTimeout(err)) {
      throw new UpstreamHttpError(`${req.path} timed out after ${req.timeoutMs}ms`, null, false, true);
    }
    const msg = err instanceof Error ? err.message : String(err);
    throw new UpstreamHttpError(`${req.path} network error: ${msg}`, null, true);
  }

  if (!resp.ok) {
    const text = await safeText(resp);
    // 429 is also how an exhausted account quota is reported; that one does not heal
    const quotaExhausted = resp.status === 429 && text.includes("insufficient_quota");
    throw new UpstreamHttpError(
      `${req.path} failed: ${resp.status} ${resp.statusText}: ${text.slice(0, 500)}`,
      resp.status,
      RETRYABLE_STATUS.has(resp.status) && !quotaExhausted
    );
  }

  try {
    return await resp.json();
  } catch (err) {
    if (isTimeout(err)) {
      throw new UpstreamHttpError(`${req.path} timed out after ${req.timeoutMs}ms`, resp.status, false, true);
    }
    throw new UpstreamHttpError(`${req.path} returned a non-JSON body`, resp.status, false);
  }
}
