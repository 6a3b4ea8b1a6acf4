// lib/rag/prompt.ts
// Assembles the generation prompt from the question and the retrieved chunks.
import type { RetrievalMatch } from "@/lib/rag/schema";

export type Prompt = {
  system: string;
  user: string;
  /** How many retrieved chunks made it into the prompt, counted from the top. */
  documentsUsed: number;
  truncated: boolean;
};

export const SYSTEM_PROMPT =
  "You are a chatbot that answers questions about Shakespeare's plays. " +
  "Generate responses based on the content in the reference documents provided. " +
  "If the documents don't contain relevant information, say so politely. " +
  "Provide detailed, thoughtful responses based on the Shakespearean content.";

const NO_CONTEXT = "(no reference documents matched this question)";

function renderDocuments(matches: RetrievalMatch[]): string {
  if (matches.length === 0) return NO_CONTEXT;
  return matches
    .map((m, i) => `Document ${i + 1} (${m.metadata.title}):\n${m.metadata.text}`)
    .join("\n\n");
}

function renderUser(question: string, matches: RetrievalMatch[]): string {
  return `Reference Documents:\n${renderDocuments(matches)}\n\nQuestion: ${question}`;
}

/**
 * Keeps the prompt within `maxChars` (system + user). Lowest-ranked chunks are
 * dropped first; if the best chunk alone is still too long its text is cut.
 */
export function buildPrompt(question: string, matches: RetrievalMatch[], maxChars: number): Prompt {
  const fits = (user: string) => SYSTEM_PROMPT.length + user.length <= maxChars;

  for (let n = matches.length; n > 0; n--) {
    const kept = matches.slice(0, n);
    const user = renderUser(question, kept);
    if (fits(user)) {
      return { system: SYSTEM_PROMPT, user, documentsUsed: n, truncated: n < matches.length };
    }
  }

  if (matches.length > 0) {
    const top = matches[0];
    const overhead = SYSTEM_PROMPT.length + renderUser(question, [{ ...top, metadata: { ...top.metadata, text: "" } }]).length;
    const room = maxChars - overhead;
    if (room > 0) {
      const cut: RetrievalMatch = { ...top, metadata: { ...top.metadata, text: top.metadata.text.slice(0, room) } };
      return { system: SYSTEM_PROMPT, user: renderUser(question, [cut]), documentsUsed: 1, truncated: true };
    }
  }

  return {
    system: SYSTEM_PROMPT,
    user: renderUser(question, []),
    documentsUsed: 0,
    truncated: matches.length > 0,
  };
}
