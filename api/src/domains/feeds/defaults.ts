/**
 * Built-in catalog shown before anyone has registered a feed.
 * Ids are fixed so links to these feeds stay stable across deployments.
 */

import type { Feed } from "./types.ts";

const BBC_LOGO = "https://news.bbcimg.co.uk/nol/shared/img/bbc_news_120x60.gif";
const SKY_LOGO = "http://feeds.skynews.com/images/web/logo/skynews_rss.png";

export function freezeCatalog(feeds: Feed[]): readonly Feed[] {
  return Object.freeze(feeds.map((feed) => Object.freeze({ ...feed })));
}

export const DEFAULT_FEEDS: readonly Feed[] = freezeCatalog([
  {
    id: "b1031651-411c-40bb-b269-d247794dfd59",
    title: "BBC News - UK",
    description: "BBC News - UK",
    url: "http://feeds.bbci.co.uk/news/uk/rss.xml",
    image_url: BBC_LOGO,
    category: null,
  },
  {
    id: "c2970c84-37c8-4ec1-8861-4b5a91ebff0d",
    title: "BBC News - Technology",
    description: "BBC News - Technology",
    url: "http://feeds.bbci.co.uk/news/technology/rss.xml",
    image_url: BBC_LOGO,
    category: null,
  },
  {
    id: "28059396-5113-46ed-b76b-6d482a3bbcf3",
    title: "UK News - The latest headlines from the UK | Sky News",
    description:
      "Expert comment and analysis on the latest UK news, with headlines from England, Scotland, Northern Ireland and Wales.",
    url: "http://feeds.skynews.com/feeds/rss/uk.xml",
    image_url: SKY_LOGO,
    category: "Sky News",
  },
  {
    id: "a2370e4f-0e7f-4844-83cb-b54c02b0bf1f",
    title: "Tech News - Latest Technology and Gadget News | Sky News",
    description:
      "Sky News technology provides you with all the latest tech and gadget news, game reviews, Internet and web news across the globe. Visit us today.",
    url: "http://feeds.skynews.com/feeds/rss/technology.xml",
    image_url: SKY_LOGO,
    category: "Sky News",
  },
]);
