import { readFile } from "node:fs/promises";
import pg from "pg";
import { logger } from "../logger.ts";

// The slice of pg's PoolClient/Pool this module relies on
export interface QueryClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  // A truthy argument tells the pool to discard the client
  release(err?: Error | boolean): void;
}

export interface PoolLike {
  connect(): Promise<QueryClient>;
  end(): Promise<void>;
}

export class DB {
  private pool: PoolLike;

  constructor(source: string | PoolLike, poolSize = 10) {
    this.pool = typeof source === "string"
      ? new pg.Pool({ connectionString: source, max: poolSize })
      : source;
  }

  async init(schemaPath: string) {
    const schema = await readFile(schemaPath, "utf8");
    await this.query(async (client) => {
      await client.query(schema);
    });
  }

  async close() {
    await this.pool.end();
  }

  async query<T>(fn: (client: QueryClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  /**
   * Run `fn` between BEGIN and COMMIT on one client. On failure the
   * transaction is rolled back and the original error rethrown; if the
   * rollback fails too, the client is discarded instead of reused.
   */
  async transaction<T>(
    fn: (client: QueryClient) => Promise<T>,
    options: { readOnly?: boolean } = {},
  ): Promise<T> {
    const client = await this.pool.connect();
    let broken: Error | undefined;
    try {
      await client.query(options.readOnly ? "BEGIN READ ONLY" : "BEGIN");
      try {
        const result = await fn(client);
        await client.query("COMMIT");
        return result;
      } catch (err) {
        try {
          await client.query("ROLLBACK");
        } catch (rollbackErr) {
          logger.error("Rollback failed; discarding connection", {}, rollbackErr);
          broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
        }
        throw err;
      }
    } finally {
      client.release(broken);
    }
  }

  /**
   * Health check - verify database connectivity
   */
  async healthCheck(): Promise<void> {
    await this.query(async (client) => {
      await client.query("SELECT 1");
    });
  }
}
