import type {
  AggregateResult,
  ScoredArticle,
  Signal,
  SignalThresholds,
} from "./types";

export const DEFAULT_THRESHOLDS: SignalThresholds = { bull: 0.2, bear: -0.2 };
export const DEFAULT_TOP_N = 3;

/** Mean article score; 0 when there is nothing to score. */
export function aggregateScores(scores: readonly number[]): number {
  if (scores.length === 0) return 0;
  return scores.reduce((sum, s) => sum + s, 0) / scores.length;
}

// Boundaries are inclusive: exactly +0.2 is BULL, exactly -0.2 is BEAR.
export function classifySignal(
  score: number,
  thresholds: SignalThresholds = DEFAULT_THRESHOLDS
): Signal {
  if (score >= thresholds.bull) return "BULL";
  if (score <= thresholds.bear) return "BEAR";
  return "FLAT";
}

/** Most extreme articles first; equal magnitudes keep input order. */
export function rankTopArticles(
  scored: readonly ScoredArticle[],
  n: number = DEFAULT_TOP_N
): ScoredArticle[] {
  return scored
    .map((article, index) => ({ article, index }))
    .sort(
      (a, b) =>
        Math.abs(b.article.score) - Math.abs(a.article.score) || a.index - b.index
    )
    .slice(0, Math.max(0, n))
    .map(({ article }) => article);
}

export function aggregateArticles(
  scored: readonly ScoredArticle[],
  options: { thresholds?: SignalThresholds; topN?: number } = {}
): AggregateResult {
  const overallScore = aggregateScores(scored.map((a) => a.score));
  return {
    overallScore,
    signal: classifySignal(overallScore, options.thresholds),
    articleCount: scored.length,
    topArticles: rankTopArticles(scored, options.topN),
  };
}
