/**
 * Feeds Routes
 *
 * HTTP endpoints for the feed catalog.
 */

import { Hono } from "hono";
import { toWireFeed, parseFeedInput } from "./codec.ts";
import type { FeedListStore } from "./repository.ts";

export interface FeedsEnv {
  Variables: {
    store: FeedListStore;
  };
}

export function createFeedRoutes(): Hono<FeedsEnv> {
  const routes = new Hono<FeedsEnv>();

  // GET /feeds - Built-in and registered feeds
  routes.get("/feeds", async (c) => {
    const feeds = await c.get("store").listAll();
    return c.json(feeds.map(toWireFeed));
  });

  // GET /feeds/:id - One feed by id
  routes.get("/feeds/:id", async (c) => {
    const feed = await c.get("store").getById(c.req.param("id"));
    return c.json(toWireFeed(feed));
  });

  // POST /feeds - Register a feed (idempotent by URL)
  routes.post("/feeds", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Request body is not valid JSON" }, 400);
    }

    const parsed = parseFeedInput(body);
    if (!parsed.ok) {
      return c.json({ error: parsed.error }, 400);
    }

    const id = await c.get("store").add(parsed.input);
    return c.json({ ID: id });
  });

  return routes;
}
