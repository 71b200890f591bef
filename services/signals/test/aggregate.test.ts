import * as assert from "node:assert/strict";
import type { NewsItem } from "../../news/src/types";
import {
  aggregateArticles,
  aggregateScores,
  classifySignal,
  DEFAULT_THRESHOLDS,
  rankTopArticles,
} from "../src/aggregate";
import type { ScoredArticle } from "../src/types";

function scored(title: string, score: number): ScoredArticle {
  const item: NewsItem = { source: "e24", title, link: title, description: "", published: "" };
  return { item, score };
}

// ── aggregateScores ──────────────────────────────────────────────────

assert.equal(aggregateScores([]), 0);
assert.equal(aggregateScores([0.2]), 0.2);
assert.equal(aggregateScores([0.5, -0.5]), 0);
assert.ok(Math.abs(aggregateScores([0.5, 0.3, -0.1]) - 0.7 / 3) < 1e-12);

// ── classifySignal ───────────────────────────────────────────────────

assert.deepEqual(DEFAULT_THRESHOLDS, { bull: 0.2, bear: -0.2 });
assert.equal(classifySignal(0), "FLAT");
assert.equal(classifySignal(aggregateScores([])), "FLAT");

// Inclusive boundaries
assert.equal(classifySignal(0.2), "BULL");
assert.equal(classifySignal(-0.2), "BEAR");
assert.equal(classifySignal(0.1999), "FLAT");
assert.equal(classifySignal(-0.1999), "FLAT");
assert.equal(classifySignal(0.9), "BULL");
assert.equal(classifySignal(-1), "BEAR");

// Overridable thresholds
assert.equal(classifySignal(0.2, { bull: 0.3, bear: -0.3 }), "FLAT");
assert.equal(classifySignal(-0.3, { bull: 0.3, bear: -0.3 }), "BEAR");

// ── rankTopArticles ──────────────────────────────────────────────────

{
  const ranked = rankTopArticles([
    scored("small", 0.1),
    scored("neg", -0.6),
    scored("pos", 0.4),
    scored("tiny", -0.05),
  ]);
  assert.deepEqual(
    ranked.map((a) => a.item.title),
    ["neg", "pos", "small"]
  );
}

{
  // Equal magnitudes keep input order
  const ranked = rankTopArticles([
    scored("first", 0.4),
    scored("low", 0.1),
    scored("second", -0.4),
    scored("third", 0.4),
  ]);
  assert.deepEqual(
    ranked.map((a) => a.item.title),
    ["first", "second", "third"]
  );
}

{
  assert.deepEqual(rankTopArticles([scored("only", 0.3)]).length, 1);
  assert.deepEqual(rankTopArticles([]), []);
  assert.deepEqual(rankTopArticles([scored("a", 0.3), scored("b", 0.5)], 1).map((a) => a.item.title), ["b"]);
}

// ── aggregateArticles ────────────────────────────────────────────────

{
  const input = [scored("a", 0.5), scored("b", 0.3), scored("c", -0.1)];
  const result = aggregateArticles(input);
  assert.ok(Math.abs(result.overallScore - 0.2333333333333) < 1e-9);
  assert.equal(result.signal, "BULL");
  assert.equal(result.articleCount, 3);
  assert.deepEqual(
    result.topArticles.map((a) => a.score),
    [0.5, 0.3, -0.1]
  );
  // input untouched
  assert.deepEqual(
    input.map((a) => a.item.title),
    ["a", "b", "c"]
  );
}

{
  const result = aggregateArticles([]);
  assert.deepEqual(result, { overallScore: 0, signal: "FLAT", articleCount: 0, topArticles: [] });
}

{
  const result = aggregateArticles([scored("a", -0.25), scored("b", -0.2)], {
    thresholds: { bull: 0.5, bear: -0.5 },
    topN: 5,
  });
  assert.equal(result.signal, "FLAT");
  assert.equal(result.topArticles.length, 2);
}

console.log("aggregate.test.ts: ok");
