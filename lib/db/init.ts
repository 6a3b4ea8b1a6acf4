// lib/db/init.ts
// Database initialization: query log table and the vector index.
import { promises as fs } from "fs";
import path from "path";
import type { SqlQueryable } from "@/lib/db/client";
import type { Logger } from "@/lib/logging/logger";
import type { VectorIndex } from "@/lib/rag/vector-index";

export const SCHEMA_PATH = path.join(process.cwd(), "lib", "db", "schema.sql");

/** Splits a schema file into statements; the schema has no `;` inside literals. */
export function splitStatements(sql: string): string[] {
  return sql
    .split("\n")
    .filter((line) => !line.trim().startsWith("--"))
    .join("\n")
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export async function initDatabase(db: SqlQueryable, index: VectorIndex, logger: Logger): Promise<void> {
  logger.info("db.init.start", { index: index.name });
  const schema = await fs.readFile(SCHEMA_PATH, "utf-8");
  for (const statement of splitStatements(schema)) {
    await db.query(statement);
  }
  await index.ensure();
  logger.info("db.init.done", { index: index.name });
}
