import { errorMessage, type FetchFn } from "../../shared/src/http";
import type { FeedSources, FetchedFeed } from "./types";

export type FeedFetchOptions = {
  timeoutMs: number;
  fetchImpl?: FetchFn;
};

const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) " +
  "AppleWebKit/605.1.15 (KHTML, like Gecko) " +
  "Version/17.0 Safari/605.1.15";

/**
 * Percent-encode path and query so feeds with raw non-ASCII characters
 * (ø, å, spaces) can be requested. Existing %XX escapes are kept as-is.
 */
export function encodeFeedUrl(raw: string): string {
  const url = new URL(raw.trim());
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error(`unsupported feed protocol ${url.protocol}`);
  }
  return url.href;
}

export async function fetchFeed(
  url: string,
  options: FeedFetchOptions
): Promise<Buffer> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const res = await fetchImpl(encodeFeedUrl(url), {
    headers: { "User-Agent": USER_AGENT },
    signal: AbortSignal.timeout(options.timeoutMs),
  });

  if (!res.ok) {
    throw new Error(`HTTP ${res.status}`);
  }

  return Buffer.from(await res.arrayBuffer());
}

/**
 * Fetch every source concurrently. A failing source never rejects the batch;
 * results come back in the declared source order.
 */
export async function fetchAllFeeds(
  feeds: FeedSources,
  options: FeedFetchOptions
): Promise<FetchedFeed[]> {
  const entries = Object.entries(feeds);

  const settled = await Promise.allSettled(
    entries.map(([, url]) => fetchFeed(url, options))
  );

  return settled.map((outcome, i): FetchedFeed => {
    const source = entries[i][0];
    if (outcome.status === "fulfilled") {
      return { source, ok: true, body: outcome.value };
    }
    const error = errorMessage(outcome.reason);
    console.warn(`[news] fetch failed source=${source}: ${error}`);
    return { source, ok: false, error };
  });
}
