// lib/rag/search.ts
// Retrieval without generation: backs POST /search and the query-index CLI.
import type { Embedder } from "@/lib/llm/embed";
import type { RetrievalMatch } from "@/lib/rag/schema";
import type { VectorIndex } from "@/lib/rag/vector-index";
import type { Deadline } from "@/lib/server/deadline";

export type SearchHit = {
  key: string;
  title: string;
  distance: number;
  preview: string;
};

export type DistanceStats = { best: number; worst: number; average: number };

const PREVIEW_CHARS = 200;

export function preview(text: string, max = PREVIEW_CHARS): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function toSearchHits(matches: RetrievalMatch[]): SearchHit[] {
  return matches.map((m) => ({
    key: m.key,
    title: m.metadata.title,
    distance: m.distance,
    preview: preview(m.metadata.text),
  }));
}

export function summarizeDistances(matches: RetrievalMatch[]): DistanceStats | null {
  if (matches.length === 0) return null;
  const ds = matches.map((m) => m.distance);
  return {
    best: Math.min(...ds),
    worst: Math.max(...ds),
    average: ds.reduce((a, b) => a + b, 0) / ds.length,
  };
}

export async function searchIndex(
  question: string,
  deps: { embedder: Embedder; index: VectorIndex },
  topK: number,
  opts: { title?: string; deadline?: Deadline } = {}
): Promise<RetrievalMatch[]> {
  const vector = await deps.embedder.embed(question, { deadline: opts.deadline });
  return deps.index.queryVectors(vector, topK, { title: opts.title, deadline: opts.deadline });
}
