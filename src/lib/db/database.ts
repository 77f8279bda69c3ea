import { Pool } from "pg";
import { ConnectionError, QueryError, errorMessage } from "../errors";
import type { DbCredentials } from "./credentials";

export interface DbConfig extends DbCredentials {
  host: string;
  port: number;
  database: string;
  ssl: boolean;
}

export interface QueryResultSet {
  /** Column names in select-list order, present even when no rows come back. */
  columns: string[];
  rows: Record<string, unknown>[];
}

/** What the export job needs from a database. */
export interface QueryRunner {
  query(text: string, values: unknown[]): Promise<QueryResultSet>;
}

/**
 * One short-lived pool per run. A single connection is enough: the export
 * issues exactly one statement.
 */
export function createPool(config: DbConfig): Pool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: 1,
    idleTimeoutMillis: 10_000,
    connectionTimeoutMillis: 15_000,
    statement_timeout: 60_000,
    // Hosted poolers present certificates the runner cannot verify
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  });

  pool.on("error", (err) => {
    console.error("[db] Unexpected pool error:", err);
  });

  console.log(`[db] PostgreSQL pool created for ${config.host}:${config.port}/${config.database}`);
  return pool;
}

/**
 * Adapt a pg pool to QueryRunner. Failure to obtain a connection is a
 * ConnectionError; anything the server rejects afterwards is a QueryError.
 */
export function createQueryRunner(pool: Pool): QueryRunner {
  return {
    async query(text, values) {
      const client = await pool.connect().catch((err: unknown) => {
        throw new ConnectionError(`Could not connect to the database: ${errorMessage(err)}`, { cause: err });
      });

      try {
        const result = await client.query(text, values);
        return {
          columns: result.fields.map((f) => f.name),
          rows: result.rows,
        };
      } catch (err) {
        throw new QueryError(`Export query failed: ${errorMessage(err)}`, { cause: err });
      } finally {
        client.release();
      }
    },
  };
}

/**
 * Gracefully close the connection pool.
 */
export async function closePool(pool: Pool): Promise<void> {
  console.log("[db] Closing PostgreSQL pool...");
  await pool.end();
  console.log("[db] PostgreSQL pool closed");
}
