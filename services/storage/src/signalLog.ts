import type { SupabaseClient } from "@supabase/supabase-js";
import { dbInsert } from "./db";

export type SignalLogEntry = {
  market: string;
  overall_score: number;
  signal: string;
  article_count: number;
  snapshot_locator: string | null;
  created_at: string;
};

export interface SignalLog {
  record(entry: SignalLogEntry): Promise<void>;
}

export class SupabaseSignalLog implements SignalLog {
  constructor(private readonly client: SupabaseClient) {}

  async record(entry: SignalLogEntry): Promise<void> {
    await dbInsert(this.client, "sentiment_signals", entry);
  }
}
