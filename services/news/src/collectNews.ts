/**
 * collectNews — one fetch run for a market.
 *
 *   1. Fetch every feed (concurrently, merged in declared order)
 *   2. Parse each document into items
 *   3. Keep items matching the market keywords
 *   4. Drop repeated stories (first seen wins)
 *   5. Build the snapshot and persist it, unless this is a dry run
 */

import type { FetchFn } from "../../shared/src/http";
import { errorMessage } from "../../shared/src/http";
import { buildSnapshot, type SnapshotStore } from "../../storage/src/snapshot";
import { dedupeItems } from "./dedupe";
import { fetchAllFeeds } from "./feed.fetcher";
import { filterRelevantItems, normalizeKeywords } from "./relevance";
import { parseFeedItems } from "./rss.parser";
import type { FeedSources, NewsItem, NewsSnapshot, SourceReport } from "./types";

export type CollectOptions = {
  feeds: FeedSources;
  keywords: string[];
  timeoutMs: number;
  persist?: boolean;
  now?: () => Date;
};

export type CollectDeps = {
  store: SnapshotStore;
  fetchImpl?: FetchFn;
};

export type CollectResult = {
  snapshot: NewsSnapshot;
  locator: string | null;
  sources: SourceReport[];
};

export async function collectNews(
  options: CollectOptions,
  deps: CollectDeps
): Promise<CollectResult> {
  const keywords = normalizeKeywords(options.keywords);
  const fetched = await fetchAllFeeds(options.feeds, {
    timeoutMs: options.timeoutMs,
    fetchImpl: deps.fetchImpl,
  });

  const relevant: NewsItem[] = [];
  const sources: SourceReport[] = [];

  for (const feed of fetched) {
    if (!feed.ok) {
      sources.push({
        source: feed.source,
        status: "fetch_error",
        itemCount: 0,
        relevantCount: 0,
        error: feed.error,
      });
      continue;
    }

    let items: NewsItem[];
    try {
      items = Array.from(await parseFeedItems(feed.body, feed.source));
    } catch (err) {
      const error = errorMessage(err);
      console.warn(`[news] parse failed source=${feed.source}: ${error}`);
      sources.push({
        source: feed.source,
        status: "parse_error",
        itemCount: 0,
        relevantCount: 0,
        error,
      });
      continue;
    }

    const kept = filterRelevantItems(items, keywords);
    relevant.push(...kept);
    sources.push({
      source: feed.source,
      status: "ok",
      itemCount: items.length,
      relevantCount: kept.length,
    });
  }

  const unique = dedupeItems(relevant);
  const now = options.now?.() ?? new Date();
  const snapshot = buildSnapshot(unique, now);

  console.log(
    `[news] collected ${snapshot.count} relevant items ` +
      `(${relevant.length - unique.length} duplicates dropped) from ${fetched.length} sources`
  );

  if (options.persist === false) {
    return { snapshot, locator: null, sources };
  }

  const locator = await deps.store.write(snapshot, now);
  console.log(`[snapshot] wrote ${locator}`);
  return { snapshot, locator, sources };
}
