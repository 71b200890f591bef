/**
 * Snapshots as rows of `news_snapshots`:
 *   locator text primary key, market text, fetched_at bigint,
 *   count int, items jsonb
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import type { NewsSnapshot } from "../../news/src/types";
import { dbInsert } from "./db";
import {
  formatSnapshotLocator,
  parseSnapshot,
  SnapshotFormatError,
  type SnapshotRead,
  type SnapshotStore,
} from "./snapshot";

const TABLE = "news_snapshots";

export type SupabaseSnapshotStoreOptions = {
  market: string;
  prefix: string;
  timeZone: string;
};

export class SupabaseSnapshotStore implements SnapshotStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly options: SupabaseSnapshotStoreOptions
  ) {}

  async write(snapshot: NewsSnapshot, now: Date = new Date()): Promise<string> {
    const { market, prefix, timeZone } = this.options;
    const locator = formatSnapshotLocator(prefix, now, timeZone);
    await dbInsert(this.client, TABLE, {
      locator,
      market,
      fetched_at: snapshot.fetched_at,
      count: snapshot.count,
      items: snapshot.items,
    });
    return locator;
  }

  async readLatest(): Promise<SnapshotRead> {
    const { data, error } = await this.client
      .from(TABLE)
      .select("locator, fetched_at, count, items")
      .eq("market", this.options.market)
      .order("locator", { ascending: false })
      .limit(1);

    if (error) throw new Error(`${TABLE} read failed: ${error.message}`);

    const row: unknown = Array.isArray(data) ? data[0] : undefined;
    if (row === undefined) return { ok: false, kind: "not_found" };

    const locator =
      typeof row === "object" && row !== null && "locator" in row ? row.locator : undefined;
    if (typeof locator !== "string") {
      throw new SnapshotFormatError(TABLE, "row without locator");
    }
    return { ok: true, locator, snapshot: parseSnapshot(row, locator) };
  }
}
