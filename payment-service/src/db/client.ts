import { Pool } from "pg";
import type { QueryResult, QueryResultRow } from "pg";
import { config } from "../config";
import { errorMessage, logger } from "../logger";

export const pool = new Pool({ connectionString: config.databaseUrl });

export type Query = <R extends QueryResultRow = QueryResultRow>(
  text: string,
  values?: unknown[]
) => Promise<QueryResult<R>>;

export function poolQuery(db: Pool): Query {
  return (text, values) => db.query(text, values);
}

/** Runs `work` on one pooled client inside BEGIN/COMMIT, rolling back on any error. */
export async function withTransaction<T>(db: Pool, work: (query: Query) => Promise<T>): Promise<T> {
  const client = await db.connect();
  const query: Query = (text, values) => client.query(text, values);
  try {
    await client.query("BEGIN");
    const result = await work(query);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      logger.error("Rollback failed", { error: errorMessage(rollbackErr) });
    }
    throw err;
  } finally {
    client.release();
  }
}
