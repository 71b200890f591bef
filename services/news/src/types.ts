export type NewsItem = {
  readonly source: string;
  readonly title: string;
  readonly link: string;
  readonly description: string;
  readonly published: string; // raw, as the feed wrote it
};

/** Persisted form of one collection run. Field names are the stored ones. */
export type NewsSnapshot = {
  readonly fetched_at: number; // epoch seconds
  readonly count: number;
  readonly items: readonly NewsItem[];
};

/** Source name → feed URL, iterated in declaration order. */
export type FeedSources = Readonly<Record<string, string>>;

export type MarketProfile = {
  id: string;
  label: string;
  timeZone: string;
  feeds: FeedSources;
  keywords: string[];
};

export type FetchedFeed =
  | { source: string; ok: true; body: Buffer }
  | { source: string; ok: false; error: string };

export type SourceStatus = "ok" | "fetch_error" | "parse_error";

export type SourceReport = {
  source: string;
  status: SourceStatus;
  itemCount: number;
  relevantCount: number;
  error?: string;
};
