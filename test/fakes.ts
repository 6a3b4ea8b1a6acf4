import { loadConfig, type RagConfig } from "@/lib/config";
import type { Embedder } from "@/lib/llm/embed";
import type { TextGenerator } from "@/lib/llm/generate";
import { createLogger, type Logger } from "@/lib/logging/logger";
import type { Prompt } from "@/lib/rag/prompt";
import type { RetrievalMatch, VectorIndexEntry } from "@/lib/rag/schema";
import type { QueryOptions, VectorIndex } from "@/lib/rag/vector-index";

export function testConfig(env: Record<string, string> = {}): RagConfig {
  return loadConfig({ OPENAI_API_KEY: "test-key", EMBED_DIMENSIONS: "4", ...env });
}

export type CapturedLog = { level: string; record: Record<string, unknown> };

export function captureLogger(): { logger: Logger; lines: CapturedLog[] } {
  const lines: CapturedLog[] = [];
  const logger = createLogger({}, (level, line) => {
    lines.push({ level, record: JSON.parse(line) });
  });
  return { logger, lines };
}

export class FakeEmbedder implements Embedder {
  readonly model = "fake-embed";
  calls: string[] = [];

  constructor(readonly dimensions = 4, private readonly failOn?: (text: string) => boolean) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failOn?.(text)) throw new Error(`cannot embed: ${text.slice(0, 10)}`);
    return Array.from({ length: this.dimensions }, (_, i) => (text.length + i) / 100);
  }
}

export class FakeIndex implements VectorIndex {
  readonly name = "public.fake_index";
  queries: { vector: number[]; topK: number; opts?: QueryOptions }[] = [];
  written: VectorIndexEntry[] = [];
  deletedTitles: string[] = [];

  constructor(private readonly matches: RetrievalMatch[] = [], private readonly error?: Error) {}

  async queryVectors(vector: number[], topK: number, opts?: QueryOptions): Promise<RetrievalMatch[]> {
    this.queries.push({ vector, topK, opts });
    if (this.error) throw this.error;
    return this.matches.slice(0, topK);
  }

  async putVectors(entries: VectorIndexEntry[]): Promise<number> {
    this.written.push(...entries);
    return entries.length;
  }

  async replaceVectors(titles: string[], entries: VectorIndexEntry[]): Promise<{ deleted: number; written: number }> {
    this.deletedTitles.push(...titles);
    this.written.push(...entries);
    return { deleted: 2 * titles.length, written: entries.length };
  }

  async count(): Promise<number> {
    return this.written.length;
  }

  async ensure(): Promise<void> {}
}

export class FakeGenerator implements TextGenerator {
  readonly model = "fake-chat";
  prompts: Prompt[] = [];

  constructor(private readonly answer: string | Error = "An answer.") {}

  async generate(prompt: Prompt): Promise<string> {
    this.prompts.push(prompt);
    if (this.answer instanceof Error) throw this.answer;
    return this.answer;
  }
}

export function match(key: string, distance: number, title = "Hamlet", text = `text of ${key}`): RetrievalMatch {
  return { key, distance, metadata: { title, text } };
}
