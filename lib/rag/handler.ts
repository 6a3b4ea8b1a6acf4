// lib/rag/handler.ts
// HTTP edge of the query pipeline. Route files stay one-liners; everything that
// can fail here ends in a JSON body with a status matching the failure class.
import { API_KEY_ID_HEADER } from "@/lib/gateway/gateway";
import { InputValidationError, RagError, errorMessage } from "@/lib/errors";
import { logger as rootLogger, type Logger } from "@/lib/logging/logger";
import type { QueryLog } from "@/lib/logging/query-log-pg";
import { answerQuestion, validateQuestion, type RagDeps } from "@/lib/rag/answer";
import { searchIndex, summarizeDistances, toSearchHits } from "@/lib/rag/search";
import { Deadline } from "@/lib/server/deadline";
import { jsonResponse } from "@/lib/server/http";
import { genRequestId } from "@/lib/server/reqid";

export type HandlerDeps = RagDeps & {
  logger: Logger;
  queryLog?: QueryLog;
  genRequestId?: () => string;
};

export type DepsResolver = () => HandlerDeps;

const MAX_SEARCH_TOP_K = 20;

async function readJsonBody(req: Request): Promise<unknown> {
  const raw = await req.text();
  try {
    return JSON.parse(raw);
  } catch {
    throw new InputValidationError("Invalid JSON in request body");
  }
}

function errorResponse(err: unknown, requestId: string, startedAt: number, logger: Logger): Response {
  const meta = { requestId, startedAt };
  if (err instanceof InputValidationError) {
    logger.warn("rag.rejected", { reqId: requestId, reason: err.message });
    const body: Record<string, string> = { error: err.publicMessage, request_id: requestId };
    if (err.usage) body.usage = err.usage;
    return jsonResponse(err.status, body, meta);
  }
  if (err instanceof RagError) {
    logger.error("rag.upstream_failed", { reqId: requestId, kind: err.name, status: err.status, error: err.message });
    return jsonResponse(err.status, { error: err.publicMessage, request_id: requestId }, meta);
  }
  logger.error("rag.unhandled", { reqId: requestId, error: errorMessage(err) });
  return jsonResponse(
    500,
    {
      error: "Internal server error occurred",
      support: "Please contact support if this persists",
      request_id: requestId,
    },
    meta
  );
}

function resolve(resolver: DepsResolver): { deps: HandlerDeps } | { error: unknown } {
  try {
    return { deps: resolver() };
  } catch (error) {
    return { error };
  }
}

export async function handleQuery(req: Request, resolver: DepsResolver): Promise<Response> {
  const startedAt = Date.now();
  const resolved = resolve(resolver);
  if ("error" in resolved) {
    return errorResponse(resolved.error, genRequestId(), startedAt, rootLogger);
  }
  const { deps } = resolved;
  const requestId = (deps.genRequestId ?? genRequestId)();
  const log = deps.logger.child({ reqId: requestId });

  try {
    const question = validateQuestion(await readJsonBody(req));
    const { response, prompt } = await answerQuestion(question, deps, requestId);
    const ms = Date.now() - startedAt;

    log.info("rag.query", {
      questionLength: question.length,
      sourcesFound: response.metadata.sources_found,
      documentsUsed: prompt.documentsUsed,
      promptTruncated: prompt.truncated,
      ms,
    });

    if (deps.queryLog) {
      await deps.queryLog.record({
        requestId,
        timestamp: response.metadata.timestamp,
        question,
        answer: response.answer,
        sources: response.sources,
        responseTimeMs: ms,
        model: deps.generator.model,
        apiKeyId: req.headers.get(API_KEY_ID_HEADER),
      });
    }

    return jsonResponse(200, response, { requestId, startedAt });
  } catch (err) {
    return errorResponse(err, requestId, startedAt, log);
  }
}

function parseTopK(body: unknown, fallback: number): number {
  if (typeof body !== "object" || body === null || !("topK" in body) || body.topK === undefined) {
    return fallback;
  }
  const { topK } = body;
  if (typeof topK !== "number" || !Number.isInteger(topK) || topK < 1 || topK > MAX_SEARCH_TOP_K) {
    throw new InputValidationError(`topK must be an integer between 1 and ${MAX_SEARCH_TOP_K}`);
  }
  return topK;
}

export async function handleSearch(req: Request, resolver: DepsResolver): Promise<Response> {
  const startedAt = Date.now();
  const resolved = resolve(resolver);
  if ("error" in resolved) {
    return errorResponse(resolved.error, genRequestId(), startedAt, rootLogger);
  }
  const { deps } = resolved;
  const requestId = (deps.genRequestId ?? genRequestId)();
  const log = deps.logger.child({ reqId: requestId });

  try {
    const body = await readJsonBody(req);
    const question = validateQuestion(body);
    const topK = parseTopK(body, deps.config.retrieval.topK);
    const deadline = new Deadline(deps.config.requestTimeoutMs);
    const matches = await searchIndex(question, deps, topK, { deadline });

    log.info("rag.search", { questionLength: question.length, topK, found: matches.length });

    return jsonResponse(
      200,
      {
        matches: toSearchHits(matches),
        metadata: {
          top_k: topK,
          matches_found: matches.length,
          distance_stats: summarizeDistances(matches),
          request_id: requestId,
        },
      },
      { requestId, startedAt }
    );
  } catch (err) {
    return errorResponse(err, requestId, startedAt, log);
  }
}
