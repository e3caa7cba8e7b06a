import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./app.ts";
import { createRejectionHandler, openKvStore } from "./bootstrap.ts";
import { loadConfig, type AppConfig } from "./config.ts";
import { FeedListStore } from "./domains/feeds/index.ts";
import type { KvStore } from "./infrastructure/kv.ts";
import { logger, setLogLevel } from "./logger.ts";

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logger.error("FATAL: could not load configuration", {}, err);
  process.exit(1);
}
setLogLevel(config.logLevel);

process.on("unhandledRejection", createRejectionHandler(config.env));

let kv: KvStore;
try {
  kv = await openKvStore(config);
} catch (err) {
  logger.error("FATAL: could not open store", { driver: config.store.driver }, err);
  process.exit(1);
}

const store = new FeedListStore(kv);
try {
  await store.init();
} catch (err) {
  logger.error("FATAL: feed store unusable", { driver: config.store.driver }, err);
  await kv.close();
  process.exit(1);
}

const app = createApp({ store, kv });
const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(`Feed catalog running on http://localhost:${info.port}`, { env: config.env });
});

// Graceful shutdown handling
let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, shutting down...`);
  server.close();
  await kv.close();
  logger.info("Shutdown complete");
  process.exit(0);
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err) => {
      logger.error("Shutdown failed", { signal }, err);
      process.exit(1);
    });
  });
}
