import type { PipelineConfig } from "./config";
import { createDbClient } from "../../storage/src/db";
import { FileSnapshotStore } from "../../storage/src/file.snapshotStore";
import { MemorySnapshotStore } from "../../storage/src/memory.snapshotStore";
import { SupabaseSignalLog, type SignalLog } from "../../storage/src/signalLog";
import { snapshotPrefix, type SnapshotStore } from "../../storage/src/snapshot";
import { SupabaseSnapshotStore } from "../../storage/src/supabase.snapshotStore";

export function createSnapshotStore(
  config: PipelineConfig,
  fetchImpl?: typeof fetch
): SnapshotStore {
  const { market } = config;
  const prefix = snapshotPrefix(market.id);

  if (config.snapshotStore === "supabase") {
    return new SupabaseSnapshotStore(createDbClient(config.supabase, fetchImpl), {
      market: market.id,
      prefix,
      timeZone: market.timeZone,
    });
  }
  return new FileSnapshotStore({ dataDir: config.dataDir, prefix, timeZone: market.timeZone });
}

/** Keeps a dry run's snapshot in process so `run --dry-run` can score it without writing. */
export function createDryRunSnapshotStore(config: PipelineConfig): SnapshotStore {
  return new MemorySnapshotStore(snapshotPrefix(config.market.id), config.market.timeZone);
}

export function createSignalLog(
  config: PipelineConfig,
  fetchImpl?: typeof fetch
): SignalLog | undefined {
  if (!config.signalLogEnabled) return undefined;
  return new SupabaseSignalLog(createDbClient(config.supabase, fetchImpl));
}
