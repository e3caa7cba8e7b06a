/**
 * Feeds Domain
 *
 * Exports for the feed catalog.
 */

export { createFeedRoutes } from "./routes.ts";
export type { FeedsEnv } from "./routes.ts";
export { FeedListStore, FEED_LIST_BUCKET, ALL_FEEDS_KEY } from "./repository.ts";
export type { FeedListStoreOptions } from "./repository.ts";
export { DEFAULT_FEEDS, freezeCatalog } from "./defaults.ts";
export { toWireFeed, encodeFeedList, decodeFeedList, parseFeedInput } from "./codec.ts";
export * from "./errors.ts";
export type { Feed, FeedInput, WireFeed } from "./types.ts";
