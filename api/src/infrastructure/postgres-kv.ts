/**
 * PostgreSQL driver for the key-value store
 *
 * Buckets are rows in `kv_buckets`, values rows in `kv_entries`
 * (see schema.pg.sql). Each view/update is one database transaction.
 */

import type { DB, QueryClient } from "./db.ts";
import type { KvStore, ReadBucket, ReadTx, WriteBucket, WriteTx } from "./kv.ts";

function toBytes(row: unknown): Uint8Array | null {
  if (typeof row !== "object" || row === null || !("value" in row)) {
    return null;
  }
  const { value } = row;
  return value instanceof Uint8Array ? new Uint8Array(value) : null;
}

async function bucketExists(client: QueryClient, name: string): Promise<boolean> {
  const result = await client.query(
    "SELECT 1 FROM kv_buckets WHERE name = $1",
    [name],
  );
  return result.rows.length > 0;
}

function readBucket(client: QueryClient, name: string): ReadBucket {
  return {
    get: async (key) => {
      const result = await client.query(
        "SELECT value FROM kv_entries WHERE bucket = $1 AND key = $2",
        [name, key],
      );
      return toBytes(result.rows[0]);
    },
  };
}

function writeBucket(client: QueryClient, name: string): WriteBucket {
  return {
    ...readBucket(client, name),
    put: async (key, value) => {
      await client.query(
        `INSERT INTO kv_entries (bucket, key, value)
         VALUES ($1, $2, $3)
         ON CONFLICT (bucket, key) DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()`,
        [name, key, Buffer.from(value)],
      );
    },
  };
}

export class PostgresKvStore implements KvStore {
  constructor(private readonly db: DB) {}

  /** Creates the kv tables if they are missing */
  async init(schemaPath: string): Promise<void> {
    await this.db.init(schemaPath);
  }

  async createBucketIfAbsent(name: string): Promise<void> {
    await this.db.query(async (client) => {
      await client.query(
        "INSERT INTO kv_buckets (name) VALUES ($1) ON CONFLICT (name) DO NOTHING",
        [name],
      );
    });
  }

  view<T>(fn: (tx: ReadTx) => Promise<T>): Promise<T> {
    return this.db.transaction(
      (client) =>
        fn({
          bucket: async (name) =>
            (await bucketExists(client, name)) ? readBucket(client, name) : null,
        }),
      { readOnly: true },
    );
  }

  update<T>(fn: (tx: WriteTx) => Promise<T>): Promise<T> {
    return this.db.transaction((client) =>
      fn({
        bucket: async (name) =>
          (await bucketExists(client, name)) ? writeBucket(client, name) : null,
      })
    );
  }

  healthCheck(): Promise<void> {
    return this.db.healthCheck();
  }

  close(): Promise<void> {
    return this.db.close();
  }
}
