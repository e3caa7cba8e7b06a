/**
 * Test setup - in-memory stores and request helpers
 *
 * Nothing here touches a real database; the memory driver stands in for
 * PostgreSQL and `app.fetch` stands in for the HTTP server.
 */

import assert from "node:assert/strict";
import { createApp } from "../app.ts";
import {
  FeedListStore,
  freezeCatalog,
  type Feed,
  type FeedInput,
  type FeedListStoreOptions,
} from "../domains/feeds/index.ts";
import { MemoryKvStore } from "../infrastructure/kv.ts";
import { setLogLevel } from "../logger.ts";

// Only failures are worth seeing in test output
setLogLevel("error");

export const TEST_DEFAULTS: readonly Feed[] = freezeCatalog([
  {
    id: "default-1",
    title: "Default One",
    description: "First built-in feed",
    url: "http://defaults.test/one.xml",
    image_url: "http://defaults.test/one.png",
    category: null,
  },
  {
    id: "default-2",
    title: "Default Two",
    description: "Second built-in feed",
    url: "http://defaults.test/two.xml",
    image_url: null,
    category: "Testing",
  },
]);

/**
 * Deterministic id generator: id-1, id-2, ...
 */
export function sequentialIds(prefix = "id"): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export async function createTestStore(
  options: FeedListStoreOptions & { init?: boolean } = {},
): Promise<{ kv: MemoryKvStore; store: FeedListStore }> {
  const kv = new MemoryKvStore();
  const store = new FeedListStore(kv, {
    defaults: options.defaults ?? TEST_DEFAULTS,
    generateId: options.generateId ?? sequentialIds(),
  });
  if (options.init !== false) {
    await store.init();
  }
  return { kv, store };
}

export async function createTestApi(options: FeedListStoreOptions = {}) {
  const { kv, store } = await createTestStore(options);
  return { kv, store, app: createApp({ store, kv }) };
}

export function feedInput(overrides: Partial<FeedInput> = {}): FeedInput {
  return {
    title: "Example",
    description: "An example feed",
    url: "http://example.com/rss",
    image_url: null,
    category: null,
    ...overrides,
  };
}

// ============ Test Request Helper ============

export async function testRequest(
  app: ReturnType<typeof createApp>,
  method: string,
  path: string,
  options: {
    body?: unknown;
    rawBody?: string;
    headers?: Record<string, string>;
  } = {},
): Promise<Response> {
  const url = `http://test.local${path}`;
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...options.headers,
    },
  };

  if (options.rawBody !== undefined) {
    init.body = options.rawBody;
  } else if (options.body !== undefined) {
    init.body = JSON.stringify(options.body);
  }

  return await app.fetch(new Request(url, init));
}

export async function jsonArray(res: Response): Promise<unknown[]> {
  const data: unknown = await res.json();
  assert.ok(Array.isArray(data), "expected a JSON array");
  return data;
}

export async function jsonObject(res: Response): Promise<Record<string, unknown>> {
  const data: unknown = await res.json();
  assert.ok(typeof data === "object" && data !== null && !Array.isArray(data), "expected a JSON object");
  return Object.fromEntries(Object.entries(data));
}
