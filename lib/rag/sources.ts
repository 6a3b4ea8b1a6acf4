// lib/rag/sources.ts
// Loads source texts for the index builder from files or directories.
import { promises as fs } from "fs";
import path from "path";
import type { SourceDocument } from "@/lib/rag/schema";

const SUPPORTED = new Set([".md", ".markdown", ".txt"]);

/** First level-1 markdown heading, else the file name without extension. */
export function deriveTitle(text: string, filePath: string): string {
  const heading = /^#\s+(.+?)\s*#*\s*$/m.exec(text);
  if (heading) return heading[1].trim();
  return path.basename(filePath, path.extname(filePath));
}

async function listFiles(target: string): Promise<string[]> {
  const stat = await fs.stat(target);
  if (stat.isFile()) return [target];
  const entries = await fs.readdir(target, { withFileTypes: true });
  const nested = await Promise.all(
    entries
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((e) => {
        const p = path.join(target, e.name);
        if (e.isDirectory()) return listFiles(p);
        return Promise.resolve(SUPPORTED.has(path.extname(e.name).toLowerCase()) ? [p] : []);
      })
  );
  return nested.flat();
}

export async function loadSourceDocuments(targets: string[], titleOverride?: string): Promise<SourceDocument[]> {
  const files = (await Promise.all(targets.map(listFiles))).flat();
  if (titleOverride && files.length > 1) {
    throw new Error("--title can only be used with a single source file");
  }
  const docs: SourceDocument[] = [];
  for (const file of files) {
    const text = await fs.readFile(file, "utf-8");
    if (!text.trim()) {
      throw new Error(`Source file is empty: ${file}`);
    }
    docs.push({ title: titleOverride ?? deriveTitle(text, file), text });
  }
  return docs;
}
