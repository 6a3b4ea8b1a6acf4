// lib/rag/chunk.ts
// Markdown-aware chunking for the index builder: headings first, then
// paragraphs, lines, words and finally single characters.
import { MarkdownTextSplitter } from "@langchain/textsplitters";
import { v5 as uuidv5 } from "uuid";
import type { DocumentChunk, SourceDocument } from "@/lib/rag/schema";

export type ChunkOptions = {
  chunkSize?: number;
  chunkOverlap?: number;
};

/** Namespace for chunk keys; changing it re-keys every stored entry. */
export const CHUNK_KEY_NAMESPACE = "3f1c2a8e-6b4d-4c7a-9e21-5d8b7f0a4c13";

export async function chunkMarkdown(text: string, opts: ChunkOptions = {}): Promise<string[]> {
  const chunkSize = opts.chunkSize ?? 1000;
  const chunkOverlap = opts.chunkOverlap ?? 200;
  if (chunkOverlap >= chunkSize) {
    throw new Error(`chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`);
  }
  const normalized = text.replace(/\r\n/g, "\n");
  if (!normalized.trim()) return [];

  const splitter = new MarkdownTextSplitter({ chunkSize, chunkOverlap });
  const chunks = await splitter.splitText(normalized);
  return chunks.map((c) => c.trim()).filter((c) => c.length > 0);
}

/** UUID v5 of title, position and text, so rebuilding the same text upserts instead of duplicating. */
export function chunkKey(title: string, chunkIndex: number, text: string): string {
  return uuidv5(`${title}\u0000${chunkIndex}\u0000${text}`, CHUNK_KEY_NAMESPACE);
}

export async function chunkDocument(doc: SourceDocument, opts: ChunkOptions = {}): Promise<DocumentChunk[]> {
  const texts = await chunkMarkdown(doc.text, opts);
  return texts.map((text, chunkIndex) => ({
    key: chunkKey(doc.title, chunkIndex, text),
    title: doc.title,
    text,
    chunkIndex,
  }));
}
