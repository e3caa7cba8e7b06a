/**
 * Feeds Repository
 *
 * The feed list store: a built-in catalog merged with the feeds users have
 * registered. Registered feeds live as one JSON array under a single key of
 * the `feedlist` bucket, rewritten whole on every add.
 */

import { randomUUID } from "node:crypto";
import pLimit from "p-limit";
import type { KvStore } from "../../infrastructure/kv.ts";
import { logger } from "../../logger.ts";
import { decodeFeedList, encodeFeedList } from "./codec.ts";
import { DEFAULT_FEEDS } from "./defaults.ts";
import {
  FeedNotFoundError,
  FeedStoreError,
  InitializationError,
  UnconfiguredBucketError,
} from "./errors.ts";
import type { Feed, FeedInput } from "./types.ts";

export const FEED_LIST_BUCKET = "feedlist";
export const ALL_FEEDS_KEY = "all";

export interface FeedListStoreOptions {
  defaults?: readonly Feed[];
  generateId?: () => string;
}

export class FeedListStore {
  private readonly defaults: readonly Feed[];
  private readonly generateId: () => string;
  // Adds run one at a time so two registrations of a new URL cannot both miss each other
  private readonly addQueue = pLimit(1);

  constructor(private readonly kv: KvStore, options: FeedListStoreOptions = {}) {
    this.defaults = options.defaults ?? DEFAULT_FEEDS;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Create the bucket if needed. Must succeed before any other call.
   * @throws InitializationError
   */
  async init(): Promise<void> {
    try {
      await this.kv.createBucketIfAbsent(FEED_LIST_BUCKET);
    } catch (err) {
      logger.error("Error creating bucket", { bucket: FEED_LIST_BUCKET }, err);
      throw new InitializationError(err);
    }
  }

  /** Feeds users have registered, in the order they were added */
  async listStored(): Promise<Feed[]> {
    let raw: Uint8Array | null;
    try {
      raw = await this.kv.view(async (tx) => {
        const bucket = await tx.bucket(FEED_LIST_BUCKET);
        if (!bucket) {
          logger.error(`Bucket \`${FEED_LIST_BUCKET}\` is unconfigured`);
          throw new UnconfiguredBucketError(FEED_LIST_BUCKET);
        }
        return bucket.get(ALL_FEEDS_KEY);
      });
    } catch (err) {
      if (err instanceof FeedStoreError) throw err;
      logger.error("Failed to read feed list", {}, err);
      throw new FeedStoreError("Failed to read feed list", { cause: err });
    }

    if (!raw) {
      return [];
    }

    try {
      return decodeFeedList(raw);
    } catch (err) {
      logger.error("Can't decode stored feed list", { bytes: raw.length }, err);
      throw err;
    }
  }

  /** Built-in catalog first, then registered feeds */
  async listAll(): Promise<Feed[]> {
    const stored = await this.listStored();
    return [...this.defaults, ...stored];
  }

  async getById(id: string): Promise<Feed> {
    const feeds = await this.listAll();
    const feed = feeds.find((f) => f.id === id);
    if (!feed) {
      throw new FeedNotFoundError(id);
    }
    return feed;
  }

  /**
   * Register a feed, returning its id. A URL already in the catalog returns
   * the existing id and writes nothing. Any id on the candidate is replaced.
   */
  add(candidate: FeedInput): Promise<string> {
    return this.addQueue(() => this.addUnqueued(candidate));
  }

  private async addUnqueued(candidate: FeedInput): Promise<string> {
    const feed: Feed = {
      title: candidate.title,
      description: candidate.description,
      url: candidate.url,
      image_url: candidate.image_url,
      category: candidate.category,
      id: this.generateId(),
    };

    const stored = await this.listStored();
    const existing = stored.find((f) => f.url === feed.url)
      ?? this.defaults.find((f) => f.url === feed.url);
    if (existing) {
      return existing.id;
    }

    let raw: Uint8Array;
    try {
      raw = encodeFeedList([...stored, feed]);
    } catch (err) {
      logger.error("Failed to encode feed list", { url: feed.url }, err);
      throw new FeedStoreError("Failed to encode feed list", { cause: err });
    }

    try {
      await this.kv.update(async (tx) => {
        const bucket = await tx.bucket(FEED_LIST_BUCKET);
        if (!bucket) {
          logger.error(`Bucket \`${FEED_LIST_BUCKET}\` is unconfigured`);
          throw new UnconfiguredBucketError(FEED_LIST_BUCKET);
        }
        await bucket.put(ALL_FEEDS_KEY, raw);
      });
    } catch (err) {
      if (err instanceof FeedStoreError) throw err;
      logger.error("Failed to write feed list", { url: feed.url }, err);
      throw new FeedStoreError("Failed to write feed list", { cause: err });
    }

    logger.info("Feed registered", { id: feed.id, url: feed.url });
    return feed.id;
  }
}
