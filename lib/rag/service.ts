// lib/rag/service.ts
// Wires the managed collaborators from one RagConfig. Created lazily, once per
// process, and shared read-only across requests.
import { getConfig, type RagConfig } from "@/lib/config";
import { getSqlClient } from "@/lib/db/client";
import { createOpenAIEmbedder } from "@/lib/llm/embed";
import { createOpenAIGenerator } from "@/lib/llm/generate";
import { logger as rootLogger, type Logger } from "@/lib/logging/logger";
import { createPgQueryLog } from "@/lib/logging/query-log-pg";
import type { HandlerDeps } from "@/lib/rag/handler";
import { PgVectorIndex } from "@/lib/rag/vector-index";

export type RagService = HandlerDeps & { config: RagConfig };

export function createVectorIndex(config: RagConfig): PgVectorIndex {
  return new PgVectorIndex(getSqlClient(config.vectorStore.connectionString), {
    bucket: config.vectorStore.bucket,
    index: config.vectorStore.index,
    dimensions: config.openai.embedDimensions,
  });
}

export function createRagService(config: RagConfig, logger: Logger = rootLogger): RagService {
  return {
    config,
    logger,
    embedder: createOpenAIEmbedder(config, { logger }),
    generator: createOpenAIGenerator(config, { logger }),
    index: createVectorIndex(config),
    queryLog: config.queryLogEnabled
      ? createPgQueryLog(getSqlClient(config.vectorStore.connectionString), logger)
      : undefined,
  };
}

let memo: RagService | null = null;

export function getRagService(): RagService {
  if (!memo) memo = createRagService(getConfig());
  return memo;
}
