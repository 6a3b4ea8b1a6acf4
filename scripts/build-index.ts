#!/usr/bin/env tsx
/**
 * Builds the vector index from markdown/text sources.
 *
 * Usage:
 *   tsx scripts/build-index.ts                      # data/sources/*
 *   tsx scripts/build-index.ts plays/macbeth.md --title Macbeth --replace
 */
import path from "path";
import { Command } from "commander";
import { getConfig } from "@/lib/config";
import { createOpenAIEmbedder } from "@/lib/llm/embed";
import { logger as rootLogger } from "@/lib/logging/logger";
import { buildIndex } from "@/lib/rag/indexer";
import { createVectorIndex } from "@/lib/rag/service";
import { loadSourceDocuments } from "@/lib/rag/sources";
import { loadEnvFiles, parseNonNegativeInt, parsePositiveInt, runMain } from "./cli-utils";

type BuildOptions = {
  title?: string;
  concurrency: number;
  chunkSize: number;
  chunkOverlap: number;
  replace: boolean;
};

const logger = rootLogger.child({ component: "build-index" });

const program = new Command()
  .name("build-index")
  .description("Chunk, embed and upsert source texts into the vector index")
  .argument("[paths...]", "files or directories (.md, .txt); default: data/sources")
  .option("-t, --title <title>", "document title (single file only; default: first # heading)")
  .option("-c, --concurrency <n>", "concurrent embedding calls", parsePositiveInt, 4)
  .option("--chunk-size <n>", "max characters per chunk", parsePositiveInt, 1000)
  .option("--chunk-overlap <n>", "characters shared by consecutive chunks", parseNonNegativeInt, 200)
  .option("--replace", "delete existing entries with the same title first", false);

async function main() {
  loadEnvFiles();
  program.parse();
  const targets = program.args.length > 0 ? program.args : [path.join("data", "sources")];
  const opts = program.opts<BuildOptions>();
  const config = getConfig();

  const documents = await loadSourceDocuments(targets, opts.title);
  const index = createVectorIndex(config);
  await index.ensure();

  const result = await buildIndex({
    documents,
    embedder: createOpenAIEmbedder(config, { logger }),
    index,
    concurrency: opts.concurrency,
    chunkSize: opts.chunkSize,
    chunkOverlap: opts.chunkOverlap,
    replace: opts.replace,
    logger,
    onProgress: (done, total) => process.stderr.write(`\r● Embedded ${done}/${total} chunks`),
  });
  process.stderr.write("\n");
  logger.info("index.build_done", { ...result });
}

runMain(main, logger);
