#!/usr/bin/env tsx
/**
 * Nearest-neighbour lookup against the vector index, without generation.
 *
 *   tsx scripts/query-index.ts -q "Why does Hamlet feign madness?" -k 5
 *   tsx scripts/query-index.ts --test-embeddings
 */
import { Command } from "commander";
import { getConfig } from "@/lib/config";
import { createOpenAIEmbedder } from "@/lib/llm/embed";
import { logger as rootLogger } from "@/lib/logging/logger";
import { preview, searchIndex, summarizeDistances } from "@/lib/rag/search";
import { createVectorIndex } from "@/lib/rag/service";
import { loadEnvFiles, parsePositiveInt, runMain } from "./cli-utils";

type QueryOptions = {
  question?: string;
  topK?: number;
  title?: string;
  testEmbeddings: boolean;
  json: boolean;
};

const TEST_SENTENCE = "This is a test sentence for embedding generation.";

const logger = rootLogger.child({ component: "query-index" });

const program = new Command()
  .name("query-index")
  .description("Query the vector index for chunks similar to a question")
  .option("-q, --question <text>", "question to search for")
  .option("-k, --top-k <n>", "number of results (default: RAG_TOP_K)", parsePositiveInt)
  .option("-t, --title <title>", "only match chunks of this document title")
  .option("--test-embeddings", "embed a fixed sentence and print its dimension", false)
  .option("--json", "print raw JSON", false);

const out = (line = "") => process.stdout.write(`${line}\n`);

async function main() {
  loadEnvFiles();
  program.parse();
  const opts = program.opts<QueryOptions>();
  const config = getConfig();
  const embedder = createOpenAIEmbedder(config, { logger });

  if (opts.testEmbeddings) {
    const vec = await embedder.embed(TEST_SENTENCE);
    out(`Embedding model: ${embedder.model}`);
    out(`Embedding dimension: ${vec.length}`);
    out(`Sample values: ${vec.slice(0, 5).join(", ")}`);
    return;
  }

  const question = opts.question;
  if (!question) {
    program.error("error: --question is required (or use --test-embeddings)");
    return;
  }

  const index = createVectorIndex(config);
  const topK = opts.topK ?? config.retrieval.topK;
  const matches = await searchIndex(question, { embedder, index }, topK, { title: opts.title });

  if (opts.json) {
    out(JSON.stringify({ matches, stats: summarizeDistances(matches) }, null, 2));
    return;
  }

  out(`Index: ${index.name}  Found: ${matches.length}`);
  out("-".repeat(50));
  matches.forEach((m, i) => {
    out(`Result ${i + 1}`);
    out(`  Title: ${m.metadata.title}`);
    out(`  Distance: ${m.distance.toFixed(4)}`);
    out(`  Key: ${m.key}`);
    out(`  Text: ${preview(m.metadata.text)}`);
    out("-".repeat(50));
  });

  const stats = summarizeDistances(matches);
  if (stats) {
    out(`Best match: ${stats.best.toFixed(4)}`);
    out(`Worst match: ${stats.worst.toFixed(4)}`);
    out(`Average: ${stats.average.toFixed(4)}`);
  }
}

runMain(main, logger);
