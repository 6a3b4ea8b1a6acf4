// lib/rag/indexer.ts
// Offline index build: chunk → embed (bounded pool) → upsert into the index.
import { IndexBuildError, errorMessage, type ChunkFailure } from "@/lib/errors";
import type { Embedder } from "@/lib/llm/embed";
import type { Logger } from "@/lib/logging/logger";
import { chunkDocument, type ChunkOptions } from "@/lib/rag/chunk";
import type { DocumentChunk, SourceDocument, VectorIndexEntry } from "@/lib/rag/schema";
import type { VectorIndex } from "@/lib/rag/vector-index";
import { mapWithConcurrency } from "@/lib/util/concurrency";

export type BuildIndexOptions = ChunkOptions & {
  documents: SourceDocument[];
  embedder: Embedder;
  index: VectorIndex;
  /** Concurrent embedding calls; keep it under the provider's rate limit. */
  concurrency?: number;
  /** Swap out every entry of each document's title, atomically. */
  replace?: boolean;
  logger?: Logger;
  onProgress?: (done: number, total: number) => void;
};

export type BuildIndexResult = {
  documents: number;
  chunks: number;
  written: number;
  deleted: number;
};

export async function buildIndex(opts: BuildIndexOptions): Promise<BuildIndexResult> {
  const { documents, embedder, index, logger } = opts;
  const concurrency = opts.concurrency ?? 4;

  const perDocument = await Promise.all(
    documents.map((doc) => chunkDocument(doc, { chunkSize: opts.chunkSize, chunkOverlap: opts.chunkOverlap }))
  );
  const chunks: DocumentChunk[] = perDocument.flat();
  if (chunks.length === 0) {
    throw new Error("Source documents produced no chunks");
  }
  logger?.info("index.chunked", { documents: documents.length, chunks: chunks.length });

  let done = 0;
  const settled = await mapWithConcurrency(chunks, concurrency, async (chunk) => {
    const vector = await embedder.embed(chunk.text);
    opts.onProgress?.(++done, chunks.length);
    return vector;
  });

  const entries: VectorIndexEntry[] = [];
  const failures: ChunkFailure[] = [];
  settled.forEach((res, i) => {
    const chunk = chunks[i];
    if (res.status === "fulfilled") {
      entries.push({ key: chunk.key, vector: res.value, metadata: { title: chunk.title, text: chunk.text } });
    } else {
      failures.push({
        key: chunk.key,
        title: chunk.title,
        chunkIndex: chunk.chunkIndex,
        reason: errorMessage(res.reason),
      });
    }
  });
  if (failures.length > 0) {
    logger?.error("index.embedding_failed", { failed: failures.length, total: chunks.length });
    throw new IndexBuildError(failures);
  }

  let deleted = 0;
  let written: number;
  if (opts.replace) {
    const titles = [...new Set(documents.map((d) => d.title))];
    ({ deleted, written } = await index.replaceVectors(titles, entries));
  } else {
    written = await index.putVectors(entries);
  }
  logger?.info("index.written", { index: index.name, written, deleted });

  return { documents: documents.length, chunks: chunks.length, written, deleted };
}
