/**
 * Feed JSON codec
 *
 * Converts between Feed records and their wire/persisted JSON form
 * (`ID`, `Title`, `Description`, `URL`, `ImageURL`, `Category`).
 */

import { z } from "zod";
import { CorruptedStoreError } from "./errors.ts";
import type { Feed, FeedInput, WireFeed } from "./types.ts";

const text = z.string().nullish().transform((v) => v ?? "");
const optionalText = z.string().nullish().transform((v) => (v ? v : null));

const storedFeedSchema = z
  .object({
    ID: z.string().min(1),
    Title: text,
    Description: text,
    URL: z.string().min(1),
    ImageURL: optionalText,
    Category: optionalText,
  })
  .transform((w): Feed => ({
    id: w.ID,
    title: w.Title,
    description: w.Description,
    url: w.URL,
    image_url: w.ImageURL,
    category: w.Category,
  }));

const storedListSchema = z.array(storedFeedSchema);

export const feedInputSchema = z
  .object({
    ID: z.unknown().optional(),
    Title: text,
    Description: text,
    URL: z.string().min(1, "must not be empty"),
    ImageURL: optionalText,
    Category: optionalText,
  })
  .transform((w): FeedInput => ({
    title: w.Title,
    description: w.Description,
    url: w.URL,
    image_url: w.ImageURL,
    category: w.Category,
  }));

export function toWireFeed(feed: Feed): WireFeed {
  return {
    ID: feed.id,
    Title: feed.title,
    Description: feed.description,
    URL: feed.url,
    ImageURL: feed.image_url ?? "",
    Category: feed.category ?? "",
  };
}

export function encodeFeedList(feeds: readonly Feed[]): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(feeds.map(toWireFeed)));
}

/**
 * Decode the persisted list. An empty value means nothing has been stored yet.
 * @throws CorruptedStoreError when the bytes are not a list of feed records
 */
export function decodeFeedList(raw: Uint8Array): Feed[] {
  if (raw.length === 0) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder("utf-8", { fatal: true }).decode(raw));
  } catch (err) {
    throw new CorruptedStoreError(err);
  }

  const result = storedListSchema.safeParse(parsed);
  if (!result.success) {
    throw new CorruptedStoreError(result.error);
  }
  return result.data;
}

export type FeedInputResult =
  | { ok: true; input: FeedInput }
  | { ok: false; error: string };

export function parseFeedInput(body: unknown): FeedInputResult {
  const result = feedInputSchema.safeParse(body);
  if (result.success) {
    return { ok: true, input: result.data };
  }
  const issue = result.error.issues[0];
  const message = issue.path.length > 0
    ? `${issue.path.join(".")}: ${issue.message}`
    : issue.message;
  return { ok: false, error: message };
}
