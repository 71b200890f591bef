import Parser from "rss-parser";
import type { NewsItem } from "./types";

type RssItemFields = {
  description?: unknown;
};

// xml2js keeps state after an error, so every document gets its own parser.
const makeParser = () =>
  new Parser<Record<string, unknown>, RssItemFields>({
    customFields: { item: ["description"] },
  });

function text(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Parse an RSS document into news items. Rejects on malformed markup;
 * missing item fields become empty strings.
 */
export async function parseFeedItems(
  raw: Buffer | string,
  source: string
): Promise<Iterable<NewsItem>> {
  const xml = typeof raw === "string" ? raw : raw.toString("utf8");
  const feed = await makeParser().parseString(xml);
  const items = feed.items ?? [];

  function* toNewsItems(): Generator<NewsItem> {
    for (const item of items) {
      yield {
        source,
        title: text(item.title),
        link: text(item.link),
        description: text(item.description),
        published: text(item.pubDate),
      };
    }
  }

  return toNewsItems();
}
