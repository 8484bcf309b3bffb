/**
 * db.ts — PostgreSQL connection layer
 *
 * ULS Callbook — FCC amateur license registry importer
 *
 * Services never touch pg directly; they take a `Database`, which keeps them
 * testable with in-process fakes. `createPgDatabase(pool)` is the real adapter.
 *
 * Pattern:
 *   const pool = createPool(config.databaseUrl);
 *   const db = createPgDatabase(pool);
 *   const lock = await db.tryAdvisoryLock("uls-import:uls_import");
 *   try { ... } finally { await lock?.release(); await pool.end(); }
 */

import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import pg from "pg";
import copyStreams from "pg-copy-streams";
import { log } from "./logger.js";

const { Pool } = pg;
const { from: copyFrom } = copyStreams;
type Pool = pg.Pool;
type PoolClient = pg.PoolClient;
type QueryResultRow = pg.QueryResultRow;

export type { Pool, PoolClient, QueryResultRow };

/** Merges over a multi-million-row snapshot run for minutes, not seconds. */
const STATEMENT_TIMEOUT_MS = 30 * 60_000;

// ─── Database Interface ─────────────────────────────────────────

export interface QueryRows<R> {
  rows: R[];
  rowCount: number | null;
}

/** A held session-level advisory lock. `release()` is idempotent. */
export interface AdvisoryLock {
  readonly name: string;
  release(): Promise<void>;
}

export interface Database {
  query<R extends QueryResultRow = QueryResultRow>(
    sql: string,
    params?: readonly unknown[],
  ): Promise<QueryRows<R>>;
  /**
   * Stream COPY-format text into `COPY ... FROM STDIN`.
   * Resolves to the number of rows the server accepted.
   */
  copyFrom(sql: string, chunks: AsyncIterable<string>): Promise<number>;
  /**
   * Non-blocking attempt at a session advisory lock keyed by `hashtext(name)`.
   * Resolves to null when another session holds it.
   */
  tryAdvisoryLock(name: string): Promise<AdvisoryLock | null>;
}

// ─── Pool ───────────────────────────────────────────────────────

/**
 * Create a connection pool. The importer is a single sequential worker, so a
 * small pool covers the lock session plus one working connection.
 */
export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 3,
    connectionTimeoutMillis: 10_000,
    idleTimeoutMillis: 30_000,
    statement_timeout: STATEMENT_TIMEOUT_MS,
  });

  // Must handle pool error events — unhandled idle-client errors crash the process
  pool.on("error", (err) => {
    log.db.error({ err: err.message }, "idle client error");
  });

  return pool;
}

/** Release a client, destroying it when it failed mid-protocol. */
function releaseClient(client: PoolClient, err?: unknown): void {
  if (err === undefined) {
    client.release();
    return;
  }
  client.release(err instanceof Error ? err : true);
}

// ─── pg Adapter ─────────────────────────────────────────────────

export function createPgDatabase(pool: Pool): Database {
  return {
    async query<R extends QueryResultRow = QueryResultRow>(
      sql: string,
      params?: readonly unknown[],
    ): Promise<QueryRows<R>> {
      const result = await pool.query<R>(sql, params ? [...params] : undefined);
      return { rows: result.rows, rowCount: result.rowCount };
    },

    async copyFrom(sql: string, chunks: AsyncIterable<string>): Promise<number> {
      const client = await pool.connect();
      try {
        const stream = client.query(copyFrom(sql));
        await pipeline(Readable.from(chunks), stream);
        releaseClient(client);
        return stream.rowCount;
      } catch (err) {
        releaseClient(client, err);
        throw err;
      }
    },

    async tryAdvisoryLock(name: string): Promise<AdvisoryLock | null> {
      const client = await pool.connect();
      let acquired: boolean;
      try {
        const result = await client.query<{ acquired: boolean }>(
          "SELECT pg_try_advisory_lock(hashtext($1)) AS acquired",
          [name],
        );
        acquired = result.rows[0]?.acquired === true;
      } catch (err) {
        releaseClient(client, err);
        throw err;
      }

      if (!acquired) {
        releaseClient(client);
        return null;
      }

      // The lock lives on this session; the client stays checked out until release.
      let released = false;
      return {
        name,
        async release(): Promise<void> {
          if (released) return;
          released = true;
          try {
            await client.query("SELECT pg_advisory_unlock(hashtext($1))", [name]);
            releaseClient(client);
          } catch (err) {
            // Destroying the session drops the lock server-side.
            releaseClient(client, err);
            throw err;
          }
        },
      };
    },
  };
}
