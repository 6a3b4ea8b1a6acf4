// lib/llm/generate.ts
// Answer generation through OpenAI chat completions.
import { z } from "zod";
import type { RagConfig } from "@/lib/config";
import { GenerationError, UpstreamHttpError, errorMessage } from "@/lib/errors";
import { postOpenAI, type FetchLike } from "@/lib/llm/openai";
import { withRetry } from "@/lib/llm/retry";
import type { Logger } from "@/lib/logging/logger";
import type { Deadline } from "@/lib/server/deadline";
import type { Prompt } from "@/lib/rag/prompt";

export interface TextGenerator {
  readonly model: string;
  generate(prompt: Prompt, opts?: { deadline?: Deadline }): Promise<string>;
}

export type OpenAIGeneratorDeps = {
  fetchImpl?: FetchLike;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

const CALL_TIMEOUT_MS = 20_000;

const chatResponse = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

export function createOpenAIGenerator(config: RagConfig, deps: OpenAIGeneratorDeps = {}): TextGenerator {
  const { chatModel: model, temperature, maxTokens } = config.openai;

  async function generate(prompt: Prompt, opts: { deadline?: Deadline } = {}): Promise<string> {
    let json: unknown;
    try {
      json = await withRetry(
        () =>
          postOpenAI({
            baseUrl: config.openai.baseUrl,
            apiKey: config.openai.apiKey,
            path: "/chat/completions",
            body: {
              model,
              messages: [
                { role: "system", content: prompt.system },
                { role: "user", content: prompt.user },
              ],
              temperature,
              top_p: 0.9,
              max_tokens: maxTokens,
            },
            timeoutMs: opts.deadline?.timeoutFor(CALL_TIMEOUT_MS) ?? CALL_TIMEOUT_MS,
            fetchImpl: deps.fetchImpl,
          }),
        {
          retries: config.upstreamRetries,
          sleep: deps.sleep,
          onRetry: (err, attempt, delayMs) =>
            deps.logger?.warn("generation.retry", { attempt, delayMs, error: errorMessage(err) }),
        }
      );
    } catch (err) {
      const timedOut = err instanceof UpstreamHttpError && err.timedOut;
      throw new GenerationError(`Generation failed: ${errorMessage(err)}`, timedOut, { cause: err });
    }

    const parsed = chatResponse.safeParse(json);
    if (!parsed.success) {
      throw new GenerationError("Invalid chat completion response shape");
    }
    const answer = (parsed.data.choices[0].message.content ?? "").trim();
    if (!answer) {
      throw new GenerationError("Model returned an empty completion");
    }
    return answer;
  }

  return { model, generate };
}
