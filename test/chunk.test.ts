import { describe, it, expect } from "vitest";
import { validate, version } from "uuid";
import { chunkDocument, chunkKey, chunkMarkdown } from "@/lib/rag/chunk";

describe("chunkMarkdown", () => {
  it("returns nothing for blank input", async () => {
    expect(await chunkMarkdown("  \n\n ")).toEqual([]);
  });

  it("keeps short text as a single trimmed chunk", async () => {
    expect(await chunkMarkdown("  Hello world.  ")).toEqual(["Hello world."]);
  });

  it("splits at headings and keeps the heading with its section", async () => {
    const text = "# A\n\nalpha\n## B\n\nbeta";
    expect(await chunkMarkdown(text, { chunkSize: 12, chunkOverlap: 0 })).toEqual(["# A\n\nalpha", "## B\n\nbeta"]);
  });

  it("bounds chunk size and overlaps neighbouring chunks", async () => {
    const words = Array.from({ length: 300 }, (_, i) => `word${i}`);
    const chunks = await chunkMarkdown(words.join(" "), { chunkSize: 100, chunkOverlap: 20 });

    expect(chunks.length).toBeGreaterThan(1);
    for (const c of chunks) expect(c.length).toBeLessThanOrEqual(100);
    for (let i = 1; i < chunks.length; i++) {
      const first = chunks[i].split(" ")[0];
      expect(chunks[i - 1].split(" ")).toContain(first);
    }
    const seen = new Set(chunks.flatMap((c) => c.split(" ")));
    expect(words.every((w) => seen.has(w))).toBe(true);
  });

  it("rejects an overlap that is not smaller than the size", async () => {
    await expect(chunkMarkdown("text", { chunkSize: 100, chunkOverlap: 100 })).rejects.toThrow(
      "chunkOverlap (100) must be smaller than chunkSize (100)"
    );
  });
});

describe("chunkKey", () => {
  it("is a stable v5 UUID that depends on title, position and text", () => {
    const key = chunkKey("Hamlet", 0, "To be");
    expect(validate(key)).toBe(true);
    expect(version(key)).toBe(5);
    expect(chunkKey("Hamlet", 0, "To be")).toBe(key);
    expect(chunkKey("Hamlet", 1, "To be")).not.toBe(key);
    expect(chunkKey("Macbeth", 0, "To be")).not.toBe(key);
    expect(chunkKey("Hamlet", 0, "Not to be")).not.toBe(key);
  });
});

describe("chunkDocument", () => {
  it("numbers chunks and carries the title", async () => {
    const chunks = await chunkDocument(
      { title: "Hamlet", text: "# A\n\nalpha\n## B\n\nbeta" },
      { chunkSize: 12, chunkOverlap: 0 }
    );
    expect(chunks.map((c) => [c.title, c.chunkIndex, c.text])).toEqual([
      ["Hamlet", 0, "# A\n\nalpha"],
      ["Hamlet", 1, "## B\n\nbeta"],
    ]);
    expect(chunks[1].key).toBe(chunkKey("Hamlet", 1, "## B\n\nbeta"));
  });
});
