import type { NewsItem } from "./types";

/** Story identity: the link when present, else the exact title. */
export function itemKey(item: Pick<NewsItem, "link" | "title">): string {
  return item.link || item.title;
}

export function dedupeItems(items: readonly NewsItem[]): NewsItem[] {
  const seen = new Set<string>();
  const out: NewsItem[] = [];
  for (const item of items) {
    const key = itemKey(item);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(item);
  }
  return out;
}
