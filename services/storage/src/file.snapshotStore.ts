import * as fs from "fs/promises";
import * as path from "path";
import type { NewsSnapshot } from "../../news/src/types";
import {
  formatSnapshotLocator,
  parseSnapshot,
  SnapshotFormatError,
  type SnapshotRead,
  type SnapshotStore,
} from "./snapshot";

export type FileSnapshotStoreOptions = {
  dataDir: string;
  prefix: string;
  timeZone: string;
};

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/** One pretty-printed JSON file per snapshot; append-only. */
export class FileSnapshotStore implements SnapshotStore {
  constructor(private readonly options: FileSnapshotStoreOptions) {}

  async write(snapshot: NewsSnapshot, now: Date = new Date()): Promise<string> {
    const { dataDir, prefix, timeZone } = this.options;
    const locator = formatSnapshotLocator(prefix, now, timeZone);
    await fs.mkdir(dataDir, { recursive: true });
    // "wx": an existing snapshot is never replaced
    await fs.writeFile(
      path.join(dataDir, locator),
      JSON.stringify(snapshot, null, 2),
      { encoding: "utf8", flag: "wx" }
    );
    return locator;
  }

  async readLatest(): Promise<SnapshotRead> {
    const { dataDir, prefix } = this.options;

    let names: string[];
    try {
      names = await fs.readdir(dataDir);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return { ok: false, kind: "not_found" };
      }
      throw err;
    }

    const candidates = names
      .filter((n) => n.startsWith(`${prefix}_`) && n.endsWith(".json"))
      .sort();
    const locator = candidates[candidates.length - 1];
    if (locator === undefined) return { ok: false, kind: "not_found" };

    const text = await fs.readFile(path.join(dataDir, locator), "utf8");
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new SnapshotFormatError(locator, err instanceof Error ? err.message : String(err));
    }
    return { ok: true, locator, snapshot: parseSnapshot(raw, locator) };
  }
}
