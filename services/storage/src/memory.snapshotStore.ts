import type { NewsSnapshot } from "../../news/src/types";
import {
  formatSnapshotLocator,
  type SnapshotRead,
  type SnapshotStore,
} from "./snapshot";

/** Process-local store: same locator rules as the file store, nothing on disk. */
export class MemorySnapshotStore implements SnapshotStore {
  private readonly snapshots = new Map<string, NewsSnapshot>();

  constructor(
    private readonly prefix: string,
    private readonly timeZone: string
  ) {}

  async write(snapshot: NewsSnapshot, now: Date = new Date()): Promise<string> {
    const locator = formatSnapshotLocator(this.prefix, now, this.timeZone);
    if (this.snapshots.has(locator)) {
      throw new Error(`snapshot ${locator} already exists`);
    }
    this.snapshots.set(locator, snapshot);
    return locator;
  }

  async readLatest(): Promise<SnapshotRead> {
    const locator = [...this.snapshots.keys()].sort().pop();
    const snapshot = locator === undefined ? undefined : this.snapshots.get(locator);
    if (locator === undefined || snapshot === undefined) {
      return { ok: false, kind: "not_found" };
    }
    return { ok: true, locator, snapshot };
  }

  get size(): number {
    return this.snapshots.size;
  }
}
