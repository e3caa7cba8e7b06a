/**
 * HTTP application
 *
 * Security headers, error mapping, health check and the /api routes.
 * Kept apart from main.ts so tests can drive it through `app.fetch`.
 */

import { Hono } from "hono";
import { createApiRoutes } from "./api-routes.ts";
import { FeedStoreError, errorStatus, type FeedListStore } from "./domains/feeds/index.ts";
import type { KvStore } from "./infrastructure/kv.ts";
import { logger } from "./logger.ts";

export interface AppDeps {
  store: FeedListStore;
  kv: KvStore;
}

export function createApp({ store, kv }: AppDeps): Hono {
  const app = new Hono();

  app.use("*", async (c, next) => {
    await next();
    c.header("X-Content-Type-Options", "nosniff");
    c.header("X-Frame-Options", "DENY");
    c.header("Referrer-Policy", "strict-origin-when-cross-origin");
  });

  app.onError((err, c) => {
    if (err instanceof FeedStoreError) {
      return c.json({ error: err.message }, errorStatus(err));
    }
    const errorId = logger.error("Request error", { path: c.req.path, method: c.req.method }, err);
    return c.json({ error: "Internal server error", errorId }, 500);
  });

  app.route("/api", createApiRoutes(store));

  app.get("/health", async (c) => {
    const checks: Record<string, "ok" | "error"> = {};
    let allOk = true;

    try {
      await kv.healthCheck();
      checks.store = "ok";
    } catch (err) {
      logger.error("Store health check failed", {}, err);
      checks.store = "error";
      allOk = false;
    }

    const status = allOk ? 200 : 503;
    return c.json({ ok: allOk, checks, timestamp: new Date().toISOString() }, status);
  });

  return app;
}
