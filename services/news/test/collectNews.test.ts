import * as assert from "node:assert/strict";
import type { FetchFn } from "../../shared/src/http";
import { MemorySnapshotStore } from "../../storage/src/memory.snapshotStore";
import { collectNews } from "../src/collectNews";

function rss(items: { title: string; link: string; description: string }[]): string {
  const body = items
    .map(
      (i) =>
        `<item><title>${i.title}</title><link>${i.link}</link>` +
        `<description>${i.description}</description></item>`
    )
    .join("");
  return `<?xml version="1.0" encoding="UTF-8"?><rss version="2.0"><channel><title>t</title>${body}</channel></rss>`;
}

const DOCUMENTS: Record<string, string> = {
  "https://e24.example/rss": rss([
    { title: "Oslo Børs faller", description: "", link: "a" },
    { title: "Unrelated sports news", description: "", link: "b" },
  ]),
  "https://dn.example/rss": rss([
    { title: "Oslo Børs faller", description: "duplicate", link: "a" },
  ]),
  "https://broken.example/rss": "<rss version=\"2.0\"><channel><item>",
};

const fakeFetch: FetchFn = async (url) => {
  const doc = DOCUMENTS[url];
  if (doc === undefined) throw new Error(`getaddrinfo ENOTFOUND ${new URL(url).host}`);
  return new Response(doc, { headers: { "Content-Type": "application/rss+xml; charset=utf-8" } });
};

const FEEDS = {
  e24: "https://e24.example/rss",
  broken: "https://broken.example/rss",
  down: "https://down.example/rss",
  dn: "https://dn.example/rss",
};

const NOW = new Date("2026-10-12T06:00:00.000Z");

async function main() {
  {
    const store = new MemorySnapshotStore("oslo_news", "Europe/Oslo");
    const { snapshot, locator, sources } = await collectNews(
      { feeds: FEEDS, keywords: ["Oslo Børs", "oljepris"], timeoutMs: 1000, now: () => NOW },
      { store, fetchImpl: fakeFetch }
    );

    // Sports item filtered out, the DN reprint deduplicated
    assert.equal(snapshot.count, 1);
    assert.equal(snapshot.items.length, snapshot.count);
    assert.deepEqual(snapshot.items[0], {
      source: "e24",
      title: "Oslo Børs faller",
      link: "a",
      description: "",
      published: "",
    });
    assert.equal(snapshot.fetched_at, NOW.getTime() / 1000);

    assert.equal(locator, "oslo_news_2026-10-12_080000.json");
    assert.equal(store.size, 1);

    assert.deepEqual(
      sources.map((s) => [s.source, s.status, s.itemCount, s.relevantCount]),
      [
        ["e24", "ok", 2, 1],
        ["broken", "parse_error", 0, 0],
        ["down", "fetch_error", 0, 0],
        ["dn", "ok", 1, 1],
      ]
    );
    assert.equal(sources[2].error, "getaddrinfo ENOTFOUND down.example");

    const latest = await store.readLatest();
    if (!latest.ok) assert.fail("snapshot should be stored");
    assert.equal(latest.snapshot, snapshot);
  }

  {
    // Dry run: nothing persisted
    const store = new MemorySnapshotStore("oslo_news", "Europe/Oslo");
    const { snapshot, locator } = await collectNews(
      { feeds: FEEDS, keywords: ["børs"], timeoutMs: 1000, persist: false, now: () => NOW },
      { store, fetchImpl: fakeFetch }
    );
    assert.equal(locator, null);
    assert.equal(snapshot.count, 1);
    assert.equal(store.size, 0);
  }

  {
    // Every source down still yields an (empty) snapshot
    const store = new MemorySnapshotStore("oslo_news", "Europe/Oslo");
    const { snapshot, sources } = await collectNews(
      { feeds: { down: "https://down.example/rss" }, keywords: ["børs"], timeoutMs: 1000, now: () => NOW },
      { store, fetchImpl: fakeFetch }
    );
    assert.equal(snapshot.count, 0);
    assert.deepEqual(snapshot.items, []);
    assert.equal(sources[0].status, "fetch_error");
  }

  console.log("collectNews.test.ts: ok");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
