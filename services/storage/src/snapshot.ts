import type { NewsItem, NewsSnapshot } from "../../news/src/types";
import { dedupeItems } from "../../news/src/dedupe";

export type SnapshotRead =
  | { ok: true; locator: string; snapshot: NewsSnapshot }
  | { ok: false; kind: "not_found" };

export interface SnapshotStore {
  /** Persist a new snapshot. Never overwrites an existing one. */
  write(snapshot: NewsSnapshot, now?: Date): Promise<string>;
  /** The snapshot whose locator sorts last, if any. */
  readLatest(): Promise<SnapshotRead>;
}

export class SnapshotFormatError extends Error {
  constructor(locator: string, detail: string) {
    super(`snapshot ${locator} is malformed: ${detail}`);
    this.name = "SnapshotFormatError";
  }
}

export function buildSnapshot(
  items: readonly NewsItem[],
  now: Date = new Date()
): NewsSnapshot {
  const frozen = Object.freeze(items.map((item) => Object.freeze({ ...item })));
  return Object.freeze({
    fetched_at: Math.floor(now.getTime() / 1000),
    count: frozen.length,
    items: frozen,
  });
}

/**
 * e.g. "oslo_news_2026-01-15_123005.json" for 11:30:05Z in Europe/Oslo.
 * Zero-padded, most significant first, so string order is time order.
 */
export function formatSnapshotLocator(
  prefix: string,
  now: Date,
  timeZone: string
): string {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  }).formatToParts(now);

  const get = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? "00";

  return `${prefix}_${get("year")}-${get("month")}-${get("day")}_${get("hour")}${get("minute")}${get("second")}.json`;
}

export function snapshotPrefix(market: string): string {
  return `${market}_news`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNewsItem(value: unknown, index: number, locator: string): NewsItem {
  if (!isRecord(value)) {
    throw new SnapshotFormatError(locator, `item ${index} is not an object`);
  }
  const record = value;
  const field = (name: keyof NewsItem): string => {
    const v = record[name];
    if (v === undefined || v === null) return "";
    if (typeof v !== "string") {
      throw new SnapshotFormatError(locator, `item ${index} field ${name} is not a string`);
    }
    return v;
  };
  return {
    source: field("source"),
    title: field("title"),
    link: field("link"),
    description: field("description"),
    published: field("published"),
  };
}

/**
 * Validate a stored record. Repeated identity keys are dropped (first wins)
 * and `count` is re-derived from the remaining items.
 */
export function parseSnapshot(raw: unknown, locator: string): NewsSnapshot {
  if (!isRecord(raw)) {
    throw new SnapshotFormatError(locator, "not an object");
  }
  const fetchedAt = raw.fetched_at;
  if (typeof fetchedAt !== "number" || !Number.isInteger(fetchedAt)) {
    throw new SnapshotFormatError(locator, "fetched_at is not an integer");
  }
  if (!Array.isArray(raw.items)) {
    throw new SnapshotFormatError(locator, "items is not an array");
  }
  const parsed = raw.items.map((it: unknown, i: number) => toNewsItem(it, i, locator));
  const items = dedupeItems(parsed);
  if (items.length !== parsed.length) {
    console.warn(
      `[snapshot] ${locator} has ${parsed.length - items.length} duplicate items, keeping first occurrences`
    );
  }
  if (typeof raw.count === "number" && raw.count !== items.length) {
    console.warn(
      `[snapshot] ${locator} count=${raw.count} but ${items.length} items, using item count`
    );
  }
  return buildSnapshot(items, new Date(fetchedAt * 1000));
}
