import { describe, it, expect } from "vitest";
import { IndexBuildError } from "@/lib/errors";
import { chunkKey } from "@/lib/rag/chunk";
import { buildIndex } from "@/lib/rag/indexer";
import { FakeEmbedder, FakeIndex, captureLogger } from "./fakes";

const documents = [
  { title: "Hamlet", text: "short text one" },
  { title: "Macbeth", text: "short text two" },
];

describe("buildIndex", () => {
  it("embeds every chunk and upserts it under its deterministic key", async () => {
    const index = new FakeIndex();
    const progress: [number, number][] = [];
    const result = await buildIndex({
      documents,
      embedder: new FakeEmbedder(),
      index,
      onProgress: (done, total) => progress.push([done, total]),
    });

    expect(result).toEqual({ documents: 2, chunks: 2, written: 2, deleted: 0 });
    expect(index.written.map((e) => e.key)).toEqual([
      chunkKey("Hamlet", 0, "short text one"),
      chunkKey("Macbeth", 0, "short text two"),
    ]);
    expect(index.written[1].metadata).toEqual({ title: "Macbeth", text: "short text two" });
    expect(index.written[0].vector).toEqual([0.14, 0.15, 0.16, 0.17]);
    expect(progress.at(-1)).toEqual([2, 2]);
    expect(index.deletedTitles).toEqual([]);
  });

  it("clears existing entries per title when replacing", async () => {
    const index = new FakeIndex();
    const result = await buildIndex({
      documents: [...documents, { title: "Hamlet", text: "more about the prince" }],
      embedder: new FakeEmbedder(),
      index,
      replace: true,
    });

    expect(index.deletedTitles).toEqual(["Hamlet", "Macbeth"]);
    expect(result.deleted).toBe(4);
    expect(result.written).toBe(3);
  });

  it("writes nothing when any chunk fails to embed", async () => {
    const index = new FakeIndex();
    const { logger, lines } = captureLogger();
    const build = buildIndex({
      documents,
      embedder: new FakeEmbedder(4, (text) => text.endsWith("two")),
      index,
      logger,
    });

    await expect(build).rejects.toBeInstanceOf(IndexBuildError);
    await expect(build).rejects.toThrow("Embedding failed for 1 chunk(s): Macbeth#0 (cannot embed: short text)");
    expect(index.written).toEqual([]);
    expect(lines.at(-1)?.record).toMatchObject({ event: "index.embedding_failed", failed: 1, total: 2 });
  });

  it("refuses to build from documents without text", async () => {
    await expect(
      buildIndex({ documents: [{ title: "Empty", text: "  " }], embedder: new FakeEmbedder(), index: new FakeIndex() })
    ).rejects.toThrow("Source documents produced no chunks");
  });
});
