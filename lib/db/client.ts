// lib/db/client.ts
import { createPool } from "@vercel/postgres";

export type SqlResult = { rows: Record<string, unknown>[]; rowCount?: number | null };

/** Anything that runs a parameterised statement: the pool or one transaction. */
export type SqlQueryable = {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
};

/** The part of a pg pool the vector index and the query log use. */
export type SqlClient = SqlQueryable & {
  /** Runs `work` on one connection inside BEGIN/COMMIT; any throw rolls back. */
  transaction<T>(work: (tx: SqlQueryable) => Promise<T>): Promise<T>;
};

const pools = new Map<string, SqlClient>();

/** One pool per connection string per process. Empty string → POSTGRES_URL. */
export function getSqlClient(connectionString: string): SqlClient {
  let pool = pools.get(connectionString);
  if (!pool) {
    const vercelPool = createPool(connectionString ? { connectionString } : undefined);
    pool = {
      async query(text, values) {
        const result = await vercelPool.query(text, values);
        return { rows: result.rows, rowCount: result.rowCount };
      },
      async transaction(work) {
        const conn = await vercelPool.connect();
        const tx: SqlQueryable = {
          async query(text, values) {
            const result = await conn.query(text, values);
            return { rows: result.rows, rowCount: result.rowCount };
          },
        };
        try {
          await conn.query("BEGIN");
          const out = await work(tx);
          await conn.query("COMMIT");
          return out;
        } catch (err) {
          await conn.query("ROLLBACK");
          throw err;
        } finally {
          conn.release();
        }
      },
    };
    pools.set(connectionString, pool);
  }
  return pool;
}
