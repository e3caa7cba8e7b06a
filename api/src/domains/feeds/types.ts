/**
 * Feeds Domain Types
 */

export interface Feed {
  id: string;
  title: string;
  description: string;
  url: string;
  image_url: string | null;
  category: string | null;
}

/** What a caller submits to register a feed; any id it carries is ignored */
export type FeedInput = Omit<Feed, "id"> & { id?: string };

/**
 * JSON shape of a feed on the wire and in the persisted list.
 * Absent optional values are written as empty strings.
 */
export interface WireFeed {
  ID: string;
  Title: string;
  Description: string;
  URL: string;
  ImageURL: string;
  Category: string;
}
