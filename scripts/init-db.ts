#!/usr/bin/env tsx
// Creates the query log table and the vector index (extension, table, HNSW index).
import { getConfig } from "@/lib/config";
import { getSqlClient } from "@/lib/db/client";
import { initDatabase } from "@/lib/db/init";
import { logger as rootLogger } from "@/lib/logging/logger";
import { createVectorIndex } from "@/lib/rag/service";
import { loadEnvFiles, runMain } from "./cli-utils";

const logger = rootLogger.child({ component: "init-db" });

async function main() {
  loadEnvFiles();
  const config = getConfig();
  await initDatabase(getSqlClient(config.vectorStore.connectionString), createVectorIndex(config), logger);
}

runMain(main, logger);
