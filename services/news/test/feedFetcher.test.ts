import * as assert from "node:assert/strict";
import type { FetchFn } from "../../shared/src/http";
import { encodeFeedUrl, fetchAllFeeds, fetchFeed } from "../src/feed.fetcher";

// ── encodeFeedUrl ────────────────────────────────────────────────────

assert.equal(
  encodeFeedUrl("https://example.com/nyheter/børs?q=olje pris"),
  "https://example.com/nyheter/b%C3%B8rs?q=olje%20pris"
);

// Already-encoded URLs pass through unchanged
assert.equal(
  encodeFeedUrl("https://services.dn.no/api/feed/rss/?categories=b%C3%B8rs&topics="),
  "https://services.dn.no/api/feed/rss/?categories=b%C3%B8rs&topics="
);

assert.throws(() => encodeFeedUrl("not a url"));
assert.throws(() => encodeFeedUrl("ftp://example.com/feed"), /unsupported feed protocol/);

// ── fetchFeed / fetchAllFeeds ────────────────────────────────────────

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function main() {
  const requested: string[] = [];
  const userAgents: string[] = [];

  const fakeFetch: FetchFn = async (url, init) => {
    requested.push(url);
    userAgents.push(init.headers?.["User-Agent"] ?? "");
    if (url.includes("slow")) {
      await sleep(20);
      return new Response("<slow/>");
    }
    if (url.includes("down")) throw new Error("ECONNREFUSED");
    if (url.includes("missing")) return new Response("nope", { status: 404 });
    return new Response("<fast/>");
  };

  {
    const body = await fetchFeed("https://fast.example/børs", {
      timeoutMs: 1000,
      fetchImpl: fakeFetch,
    });
    assert.equal(body.toString("utf8"), "<fast/>");
    assert.equal(requested[0], "https://fast.example/b%C3%B8rs");
    assert.ok(userAgents[0].startsWith("Mozilla/5.0"));
  }

  {
    await assert.rejects(
      fetchFeed("https://missing.example/rss", { timeoutMs: 1000, fetchImpl: fakeFetch }),
      /HTTP 404/
    );
  }

  {
    // Failures stay per source; order follows the declaration, not completion
    const results = await fetchAllFeeds(
      {
        slow: "https://slow.example/rss",
        down: "https://down.example/rss",
        bad: "::not a url::",
        missing: "https://missing.example/rss",
        fast: "https://fast.example/rss",
      },
      { timeoutMs: 1000, fetchImpl: fakeFetch }
    );

    assert.deepEqual(
      results.map((r) => r.source),
      ["slow", "down", "bad", "missing", "fast"]
    );
    assert.deepEqual(
      results.map((r) => r.ok),
      [true, false, false, false, true]
    );

    const slow = results[0];
    if (!slow.ok) assert.fail("slow source should succeed");
    assert.equal(slow.body.toString("utf8"), "<slow/>");

    const down = results[1];
    if (down.ok) assert.fail("down source should fail");
    assert.equal(down.error, "ECONNREFUSED");

    const missing = results[3];
    if (missing.ok) assert.fail("missing source should fail");
    assert.equal(missing.error, "HTTP 404");
  }

  {
    // A source that never answers is cut off by its own timeout
    const hangingFetch: FetchFn = (url, init) => {
      if (!url.includes("hang")) return Promise.resolve(new Response("<ok/>"));
      return new Promise((_resolve, reject) => {
        init.signal?.addEventListener("abort", () => reject(init.signal?.reason));
      });
    };

    const started = Date.now();
    const results = await fetchAllFeeds(
      {
        first: "https://first.example/rss",
        hang: "https://hang.example/rss",
        last: "https://last.example/rss",
      },
      { timeoutMs: 50, fetchImpl: hangingFetch }
    );

    assert.ok(Date.now() - started < 1000);
    assert.deepEqual(
      results.map((r) => [r.source, r.ok]),
      [
        ["first", true],
        ["hang", false],
        ["last", true],
      ]
    );
    const hang = results[1];
    if (hang.ok) assert.fail("hanging source should time out");
    assert.match(hang.error, /timeout|aborted/i);

    const last = results[2];
    if (!last.ok) assert.fail("last source should succeed");
    assert.equal(last.body.toString("utf8"), "<ok/>");
  }

  {
    assert.deepEqual(await fetchAllFeeds({}, { timeoutMs: 1000, fetchImpl: fakeFetch }), []);
  }

  console.log("feedFetcher.test.ts: ok");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
