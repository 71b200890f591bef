/**
 * Keyword relevance gate for market news.
 *
 * An item passes if ANY keyword occurs as a case-insensitive substring of
 * "<title> <description>". Substring, not whole-word: "børs" matches
 * "børsfall" and "oslobørs".
 */

import type { NewsItem } from "./types";

export function normalizeKeywords(keywords: readonly string[]): string[] {
  return keywords
    .map((k) => k.trim().toLowerCase())
    .filter((k) => k.length > 0);
}

export function isRelevantItem(
  item: Pick<NewsItem, "title" | "description">,
  keywords: readonly string[]
): boolean {
  const text = `${item.title} ${item.description}`.toLowerCase();
  return keywords.some((k) => {
    const term = k.toLowerCase();
    return term.length > 0 && text.includes(term);
  });
}

export function filterRelevantItems(
  items: Iterable<NewsItem>,
  keywords: readonly string[]
): NewsItem[] {
  const terms = normalizeKeywords(keywords);
  const out: NewsItem[] = [];
  for (const item of items) {
    if (isRelevantItem(item, terms)) out.push(item);
  }
  return out;
}
