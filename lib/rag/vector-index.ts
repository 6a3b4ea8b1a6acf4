// lib/rag/vector-index.ts
// Managed vector index on Postgres + pgvector. Similarity search happens in
// the database (`<=>` is cosine distance: 0 = same direction, 2 = opposite).
import type { SqlClient, SqlQueryable } from "@/lib/db/client";
import { RetrievalError, errorMessage } from "@/lib/errors";
import type { RetrievalMatch, VectorIndexEntry } from "@/lib/rag/schema";
import { TimeoutError, withTimeout, type Deadline } from "@/lib/server/deadline";

export type QueryOptions = {
  /** Restrict neighbours to one document title (the filterable field). */
  title?: string;
  deadline?: Deadline;
};

export interface VectorIndex {
  readonly name: string;
  queryVectors(vector: number[], topK: number, opts?: QueryOptions): Promise<RetrievalMatch[]>;
  /** Upsert by key; returns the number of entries written. */
  putVectors(entries: VectorIndexEntry[]): Promise<number>;
  /**
   * Drops every entry of `titles` and writes `entries` as one unit: on failure
   * the previous entries are left in place.
   */
  replaceVectors(titles: string[], entries: VectorIndexEntry[]): Promise<{ deleted: number; written: number }>;
  count(): Promise<number>;
  ensure(): Promise<void>;
}

export type PgVectorIndexOptions = {
  bucket: string;
  index: string;
  dimensions: number;
  batchSize?: number;
};

const QUERY_TIMEOUT_MS = 5_000;

export function toPgVector(vector: number[]): string {
  return `[${vector.join(",")}]`;
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function toMatch(row: Record<string, unknown>): RetrievalMatch {
  const { key, title, text } = row;
  const distance = typeof row.distance === "string" ? Number(row.distance) : row.distance;
  if (
    typeof key !== "string" ||
    typeof title !== "string" ||
    typeof text !== "string" ||
    typeof distance !== "number" ||
    Number.isNaN(distance)
  ) {
    throw new RetrievalError(`Malformed index row: ${JSON.stringify(Object.keys(row))}`);
  }
  return { key, distance, metadata: { title, text } };
}

export class PgVectorIndex implements VectorIndex {
  readonly name: string;
  private readonly table: string;
  private readonly batchSize: number;

  constructor(private readonly db: SqlClient, private readonly opts: PgVectorIndexOptions) {
    this.name = `${opts.bucket}.${opts.index}`;
    this.table = `${quoteIdent(opts.bucket)}.${quoteIdent(opts.index)}`;
    this.batchSize = opts.batchSize ?? 100;
  }

  async ensure(): Promise<void> {
    const { bucket, index, dimensions } = this.opts;
    await this.db.query("CREATE EXTENSION IF NOT EXISTS vector");
    await this.db.query(`CREATE SCHEMA IF NOT EXISTS ${quoteIdent(bucket)}`);
    await this.db.query(
      `CREATE TABLE IF NOT EXISTS ${this.table} (
        key uuid PRIMARY KEY,
        title text NOT NULL,
        text text NOT NULL,
        embedding vector(${dimensions}) NOT NULL,
        created_at timestamptz NOT NULL DEFAULT now()
      )`
    );
    await this.db.query(`CREATE INDEX IF NOT EXISTS ${quoteIdent(`${index}_title_idx`)} ON ${this.table} (title)`);
    await this.db.query(
      `CREATE INDEX IF NOT EXISTS ${quoteIdent(`${index}_embedding_idx`)} ON ${this.table} USING hnsw (embedding vector_cosine_ops)`
    );

    // An existing table built with another model would make distances meaningless
    const { rows } = await this.db.query(
      `SELECT atttypmod AS dims FROM pg_attribute WHERE attrelid = to_regclass($1) AND attname = 'embedding'`,
      [`${bucket}.${index}`]
    );
    const existing = rows[0]?.dims;
    if (typeof existing === "number" && existing > 0 && existing !== dimensions) {
      throw new Error(`Index ${this.name} stores ${existing}-dim vectors but the embedder produces ${dimensions}`);
    }
  }

  async queryVectors(vector: number[], topK: number, opts: QueryOptions = {}): Promise<RetrievalMatch[]> {
    if (vector.length !== this.opts.dimensions) {
      throw new RetrievalError(`Query vector has ${vector.length} dims, index expects ${this.opts.dimensions}`);
    }
    const values: unknown[] = [toPgVector(vector), topK];
    let where = "";
    if (opts.title) {
      values.push(opts.title);
      where = "WHERE title = $3";
    }
    const text =
      `SELECT key::text AS key, title, text, embedding <=> $1::vector AS distance ` +
      `FROM ${this.table} ${where} ORDER BY embedding <=> $1::vector LIMIT $2`;

    const timeoutMs = opts.deadline?.timeoutFor(QUERY_TIMEOUT_MS) ?? QUERY_TIMEOUT_MS;
    let rows: Record<string, unknown>[];
    try {
      ({ rows } = await withTimeout(this.db.query(text, values), timeoutMs, "vector query"));
    } catch (err) {
      throw new RetrievalError(`Vector query failed: ${errorMessage(err)}`, err instanceof TimeoutError, {
        cause: err,
      });
    }
    return rows.map(toMatch);
  }

  async putVectors(entries: VectorIndexEntry[]): Promise<number> {
    this.checkDimensions(entries);
    return this.writeBatches(this.db, entries);
  }

  async replaceVectors(titles: string[], entries: VectorIndexEntry[]): Promise<{ deleted: number; written: number }> {
    this.checkDimensions(entries);
    return this.db.transaction(async (tx) => {
      let deleted = 0;
      for (const title of titles) {
        const result = await tx.query(`DELETE FROM ${this.table} WHERE title = $1`, [title]);
        deleted += result.rowCount ?? 0;
      }
      const written = await this.writeBatches(tx, entries);
      return { deleted, written };
    });
  }

  private checkDimensions(entries: VectorIndexEntry[]) {
    for (const e of entries) {
      if (e.vector.length !== this.opts.dimensions) {
        throw new Error(`Entry ${e.key} has ${e.vector.length} dims, index expects ${this.opts.dimensions}`);
      }
    }
  }

  private async writeBatches(db: SqlQueryable, entries: VectorIndexEntry[]): Promise<number> {
    let written = 0;
    for (let i = 0; i < entries.length; i += this.batchSize) {
      const batch = entries.slice(i, i + this.batchSize);
      const values: unknown[] = [];
      const tuples = batch.map((e, j) => {
        values.push(e.key, e.metadata.title, e.metadata.text, toPgVector(e.vector));
        const p = j * 4;
        return `($${p + 1}::uuid, $${p + 2}, $${p + 3}, $${p + 4}::vector)`;
      });
      await db.query(
        `INSERT INTO ${this.table} (key, title, text, embedding) VALUES ${tuples.join(", ")} ` +
          `ON CONFLICT (key) DO UPDATE SET title = EXCLUDED.title, text = EXCLUDED.text, embedding = EXCLUDED.embedding`,
        values
      );
      written += batch.length;
    }
    return written;
  }

  async count(): Promise<number> {
    const { rows } = await this.db.query(`SELECT count(*)::int AS n FROM ${this.table}`);
    const n = rows[0]?.n;
    return typeof n === "number" ? n : 0;
  }
}
