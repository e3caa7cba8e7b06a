/**
 * Startup helpers for main.ts
 */

import { fileURLToPath } from "node:url";
import type { AppConfig } from "./config.ts";
import { DB } from "./infrastructure/db.ts";
import { MemoryKvStore, type KvStore } from "./infrastructure/kv.ts";
import { PostgresKvStore } from "./infrastructure/postgres-kv.ts";
import { logger } from "./logger.ts";

const SCHEMA_PATH = fileURLToPath(new URL("../schema.pg.sql", import.meta.url));

/**
 * Log unhandled rejections. In production the process exits so the restart
 * policy brings up a clean one; elsewhere it keeps running.
 */
export function createRejectionHandler(
  env: string,
  exit: (code: number) => void = (code) => process.exit(code),
): (reason: unknown) => void {
  return (reason) => {
    logger.error("Unhandled rejection", { env }, reason);
    if (env === "production") {
      exit(1);
    }
  };
}

/**
 * Open the configured key-value driver. A postgres store whose schema cannot
 * be applied is closed before the error is rethrown.
 */
export async function openKvStore(
  config: AppConfig,
  createDb: (url: string, poolSize: number) => DB = (url, poolSize) => new DB(url, poolSize),
): Promise<KvStore> {
  if (config.store.driver === "memory") {
    logger.warn("Using in-memory store; registered feeds are lost on restart");
    return new MemoryKvStore();
  }

  const kv = new PostgresKvStore(createDb(config.store.databaseUrl, config.store.poolSize));
  try {
    await kv.init(SCHEMA_PATH);
  } catch (err) {
    await kv.close().catch((closeErr: unknown) => {
      logger.warn("Could not close store after failed init", {
        error: closeErr instanceof Error ? closeErr.message : String(closeErr),
      });
    });
    throw err;
  }
  return kv;
}
