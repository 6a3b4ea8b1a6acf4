// lib/llm/embed.ts
// Query/chunk embeddings from the OpenAI embeddings API. Builder and query
// handler both go through here so one model and one dimensionality are used.
import { z } from "zod";
import type { RagConfig } from "@/lib/config";
import { EmbeddingError, UpstreamHttpError, errorMessage } from "@/lib/errors";
import { postOpenAI, type FetchLike } from "@/lib/llm/openai";
import { withRetry } from "@/lib/llm/retry";
import type { Logger } from "@/lib/logging/logger";
import type { Deadline } from "@/lib/server/deadline";

export type EmbedOptions = {
  deadline?: Deadline;
};

export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  embed(text: string, opts?: EmbedOptions): Promise<number[]>;
}

export type OpenAIEmbedderDeps = {
  fetchImpl?: FetchLike;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

const CALL_TIMEOUT_MS = 10_000;

const embeddingResponse = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

export function createOpenAIEmbedder(config: RagConfig, deps: OpenAIEmbedderDeps = {}): Embedder {
  const { embedModel: model, embedDimensions: dimensions, embedMaxInputChars } = config.openai;

  async function embed(text: string, opts: EmbedOptions = {}): Promise<number[]> {
    if (text.trim().length === 0) {
      throw new EmbeddingError("Cannot embed empty text");
    }
    if (text.length > embedMaxInputChars) {
      throw new EmbeddingError(
        `Input of ${text.length} chars exceeds the embedding limit of ${embedMaxInputChars}`
      );
    }

    let json: unknown;
    try {
      json = await withRetry(
        () =>
          postOpenAI({
            baseUrl: config.openai.baseUrl,
            apiKey: config.openai.apiKey,
            path: "/embeddings",
            body: { model, input: text, dimensions },
            timeoutMs: opts.deadline?.timeoutFor(CALL_TIMEOUT_MS) ?? CALL_TIMEOUT_MS,
            fetchImpl: deps.fetchImpl,
          }),
        {
          retries: config.upstreamRetries,
          sleep: deps.sleep,
          onRetry: (err, attempt, delayMs) =>
            deps.logger?.warn("embedding.retry", { attempt, delayMs, error: errorMessage(err) }),
        }
      );
    } catch (err) {
      const timedOut = err instanceof UpstreamHttpError && err.timedOut;
      throw new EmbeddingError(`Embedding failed: ${errorMessage(err)}`, timedOut, { cause: err });
    }

    const parsed = embeddingResponse.safeParse(json);
    if (!parsed.success) {
      throw new EmbeddingError("Invalid embedding response shape");
    }
    const vec = parsed.data.data[0].embedding;
    if (vec.length !== dimensions) {
      throw new EmbeddingError(`Embedding dim mismatch. expected=${dimensions}, got=${vec.length}`);
    }
    return vec;
  }

  return { model, dimensions, embed };
}
