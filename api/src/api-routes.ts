/**
 * Aggregated API Routes
 *
 * Mounts the domain routes behind the JSON middleware.
 */

import { Hono } from "hono";
import { createFeedRoutes, type FeedListStore, type FeedsEnv } from "./domains/feeds/index.ts";
import { jsonOnly } from "./middleware/json.ts";

export function createApiRoutes(store: FeedListStore): Hono<FeedsEnv> {
  const api = new Hono<FeedsEnv>();

  api.use("/*", jsonOnly);

  api.use("/*", async (c, next) => {
    c.set("store", store);
    await next();
  });

  // Feeds: /feeds, /feeds/:id
  api.route("/", createFeedRoutes());

  // Anything not matched above
  api.all("/*", (c) => c.json({ error: "Endpoint not found" }, 404));

  return api;
}
