// lib/config.ts
// Process-wide settings, parsed once from the environment and passed explicitly
// into every component (embedder, generator, vector index, gateway).
import { z } from "zod";

const identifier = z
  .string()
  .regex(/^[a-z_][a-z0-9_]{0,62}$/, "must be a lowercase SQL identifier");

const flag = z
  .enum(["true", "false", "1", "0", ""])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const keyList = z
  .string()
  .default("")
  .transform((raw) =>
    raw
      .split(",")
      .map((k) => k.trim())
      .filter((k) => k.length > 0)
  );

/**
 * Floor for MAX_PROMPT_CHARS: the system prompt, the no-context frame and a
 * question of the longest accepted length must fit.
 */
export const MIN_PROMPT_CHARS = 1000;

const envSchema = z.object({
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_EMBED_MODEL: z.string().min(1).default("text-embedding-3-small"),
  EMBED_DIMENSIONS: z.coerce.number().int().positive().max(2000).default(1024),
  // text-embedding-3-* accept 8191 tokens; ~3 chars/token keeps a safe margin
  EMBED_MAX_INPUT_CHARS: z.coerce.number().int().positive().default(20000),
  OPENAI_CHAT_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  GENERATION_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  POSTGRES_URL: z.string().default(""),
  VECTOR_BUCKET_NAME: identifier.default("public"),
  VECTOR_INDEX_NAME: identifier.default("hamlet_shakespeare_index"),
  RAG_TOP_K: z.coerce.number().int().min(1).max(20).default(3),
  MAX_PROMPT_CHARS: z.coerce.number().int().min(MIN_PROMPT_CHARS).default(12000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().max(29000).default(25000),
  UPSTREAM_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  RAG_API_KEYS: keyList,
  USAGE_RATE_LIMIT: z.coerce.number().positive().default(100),
  USAGE_BURST_LIMIT: z.coerce.number().int().positive().default(200),
  USAGE_QUOTA_LIMIT: z.coerce.number().int().positive().default(10000),
  USAGE_QUOTA_PERIOD: z.enum(["DAY", "WEEK", "MONTH"]).default("MONTH"),
  QUERY_LOG_ENABLED: flag,
});

export type QuotaPeriod = "DAY" | "WEEK" | "MONTH";

export type RagConfig = {
  openai: {
    apiKey: string;
    baseUrl: string;
    embedModel: string;
    embedDimensions: number;
    embedMaxInputChars: number;
    chatModel: string;
    maxTokens: number;
    temperature: number;
  };
  vectorStore: {
    connectionString: string;
    bucket: string;
    index: string;
  };
  retrieval: {
    topK: number;
    maxPromptChars: number;
  };
  requestTimeoutMs: number;
  upstreamRetries: number;
  gateway: {
    apiKeys: string[];
    rateLimit: number;
    burstLimit: number;
    quotaLimit: number;
    quotaPeriod: QuotaPeriod;
  };
  queryLogEnabled: boolean;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): RagConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  const e = parsed.data;
  return Object.freeze({
    openai: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL.replace(/\/+$/, ""),
      embedModel: e.OPENAI_EMBED_MODEL,
      embedDimensions: e.EMBED_DIMENSIONS,
      embedMaxInputChars: e.EMBED_MAX_INPUT_CHARS,
      chatModel: e.OPENAI_CHAT_MODEL,
      maxTokens: e.GENERATION_MAX_TOKENS,
      temperature: e.GENERATION_TEMPERATURE,
    },
    vectorStore: {
      connectionString: e.POSTGRES_URL,
      bucket: e.VECTOR_BUCKET_NAME,
      index: e.VECTOR_INDEX_NAME,
    },
    retrieval: {
      topK: e.RAG_TOP_K,
      maxPromptChars: e.MAX_PROMPT_CHARS,
    },
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    upstreamRetries: e.UPSTREAM_RETRIES,
    gateway: {
      apiKeys: e.RAG_API_KEYS,
      rateLimit: e.USAGE_RATE_LIMIT,
      burstLimit: e.USAGE_BURST_LIMIT,
      quotaLimit: e.USAGE_QUOTA_LIMIT,
      quotaPeriod: e.USAGE_QUOTA_PERIOD,
    },
    queryLogEnabled: e.QUERY_LOG_ENABLED,
  });
}

let memo: RagConfig | null = null;

/** Config for the running process, parsed on first use. */
export function getConfig(): RagConfig {
  if (!memo) memo = loadConfig();
  return memo;
}
