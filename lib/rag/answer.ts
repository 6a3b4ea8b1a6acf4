// lib/rag/answer.ts
// The query pipeline: validate → embed → retrieve → prompt → generate → shape.
import type { RagConfig } from "@/lib/config";
import { InputValidationError } from "@/lib/errors";
import type { Embedder } from "@/lib/llm/embed";
import type { TextGenerator } from "@/lib/llm/generate";
import { buildPrompt, type Prompt } from "@/lib/rag/prompt";
import type { AnswerResponse, RetrievalMatch, Source } from "@/lib/rag/schema";
import type { VectorIndex } from "@/lib/rag/vector-index";
import { Deadline } from "@/lib/server/deadline";

export const QUESTION_MIN_CHARS = 3;
export const QUESTION_MAX_CHARS = 500;

const USAGE = "Send POST request with JSON body containing 'question' field";

export type RagDeps = {
  embedder: Embedder;
  index: VectorIndex;
  generator: TextGenerator;
  config: Pick<RagConfig, "retrieval" | "requestTimeoutMs">;
  now?: () => Date;
};

export type AnswerResult = {
  response: AnswerResponse;
  matches: RetrievalMatch[];
  prompt: Prompt;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Pulls a usable question out of a parsed request body, or throws a 400. */
export function validateQuestion(body: unknown): string {
  if (!isRecord(body)) {
    throw new InputValidationError("Request body must be a JSON object", USAGE);
  }
  const { question } = body;
  if (question === undefined || question === null || question === "") {
    throw new InputValidationError("Question parameter is required", USAGE);
  }
  if (typeof question !== "string") {
    throw new InputValidationError("Question must be a string", USAGE);
  }
  const trimmed = question.trim();
  if (trimmed.length < QUESTION_MIN_CHARS) {
    throw new InputValidationError(`Question must be at least ${QUESTION_MIN_CHARS} characters long`);
  }
  if (trimmed.length > QUESTION_MAX_CHARS) {
    throw new InputValidationError(`Question must be at most ${QUESTION_MAX_CHARS} characters long`);
  }
  return trimmed;
}

/** 1 at distance 0, falling towards 0 as distance grows; three decimals. */
export function relevanceScore(distance: number): number {
  return Math.round((1 / (1 + Math.max(0, distance))) * 1000) / 1000;
}

export function toSources(matches: RetrievalMatch[]): Source[] {
  return matches.map((m) => ({
    title: m.metadata.title,
    distance: m.distance,
    relevance_score: relevanceScore(m.distance),
  }));
}

export async function answerQuestion(question: string, deps: RagDeps, requestId: string): Promise<AnswerResult> {
  const deadline = new Deadline(deps.config.requestTimeoutMs);

  const vector = await deps.embedder.embed(question, { deadline });
  const matches = await deps.index.queryVectors(vector, deps.config.retrieval.topK, { deadline });
  const prompt = buildPrompt(question, matches, deps.config.retrieval.maxPromptChars);
  const answer = await deps.generator.generate(prompt, { deadline });

  const now = deps.now ?? (() => new Date());
  return {
    response: {
      answer,
      sources: toSources(matches),
      metadata: {
        question_length: question.length,
        sources_found: matches.length,
        processing_successful: true,
        timestamp: now().toISOString(),
        request_id: requestId,
      },
    },
    matches,
    prompt,
  };
}
