// lib/logging/query-log-pg.ts
// Postgres-backed query log. A failed insert is reported and never fails the request.
import type { SqlQueryable } from "@/lib/db/client";
import { errorMessage } from "@/lib/errors";
import type { Logger } from "@/lib/logging/logger";
import type { Source } from "@/lib/rag/schema";

export type QueryLogEntry = {
  requestId: string;
  timestamp: string;
  question: string;
  answer: string;
  sources: Source[];
  responseTimeMs: number;
  model: string;
  apiKeyId: string | null;
};

export interface QueryLog {
  record(entry: QueryLogEntry): Promise<void>;
}

export function createPgQueryLog(db: SqlQueryable, logger: Logger): QueryLog {
  return {
    async record(entry) {
      try {
        await db.query(
          `INSERT INTO query_log (
            request_id, timestamp, question, answer, sources, sources_found,
            response_time_ms, model, api_key_id
          ) VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7, $8, $9)`,
          [
            entry.requestId,
            entry.timestamp,
            entry.question,
            entry.answer,
            JSON.stringify(entry.sources),
            entry.sources.length,
            entry.responseTimeMs,
            entry.model,
            entry.apiKeyId,
          ]
        );
      } catch (err) {
        logger.error("query_log.insert_failed", { requestId: entry.requestId, error: errorMessage(err) });
      }
    },
  };
}
