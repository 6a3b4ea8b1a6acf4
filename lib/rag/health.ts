// lib/rag/health.ts
import type { RagConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import type { VectorIndex } from "@/lib/rag/vector-index";
import { withTimeout } from "@/lib/server/deadline";

export type HealthReport = {
  ok: boolean;
  status: "healthy" | "degraded";
  timestamp: string;
  config: {
    embedModel: string;
    embedDimensions: number;
    chatModel: string;
    index: string;
    topK: number;
    hasOpenAIKey: boolean;
    apiKeysConfigured: number;
    queryLogEnabled: boolean;
  };
  index: { count: number | null; error: string | null };
  issues: string[];
};

const COUNT_TIMEOUT_MS = 3_000;

/** Configuration summary plus a vector count when the index is reachable. No secrets. */
export async function checkHealth(config: RagConfig, index: VectorIndex, now: () => Date = () => new Date()): Promise<HealthReport> {
  const issues: string[] = [];
  if (!config.openai.apiKey) issues.push("OPENAI_API_KEY is not set");
  if (config.gateway.apiKeys.length === 0) issues.push("RAG_API_KEYS is empty; every request will be rejected");

  let count: number | null = null;
  let indexError: string | null = null;
  try {
    count = await withTimeout(index.count(), COUNT_TIMEOUT_MS, "index count");
    if (count === 0) issues.push("Vector index is empty; run the index builder");
  } catch (err) {
    indexError = errorMessage(err);
    issues.push("Vector index is unreachable");
  }

  return {
    ok: true,
    status: issues.length === 0 ? "healthy" : "degraded",
    timestamp: now().toISOString(),
    config: {
      embedModel: config.openai.embedModel,
      embedDimensions: config.openai.embedDimensions,
      chatModel: config.openai.chatModel,
      index: index.name,
      topK: config.retrieval.topK,
      hasOpenAIKey: Boolean(config.openai.apiKey),
      apiKeysConfigured: config.gateway.apiKeys.length,
      queryLogEnabled: config.queryLogEnabled,
    },
    index: { count, error: indexError },
    issues,
  };
}
