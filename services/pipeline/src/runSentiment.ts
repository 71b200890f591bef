/**
 * runSentimentSignal — score the latest snapshot and notify once.
 *
 * No snapshot, or a snapshot with zero items, is a defined outcome: a FLAT
 * notice is sent. A scorer that cannot be built is not: it throws.
 */

import type { NewsItem } from "../../news/src/types";
import type { Notifier, NotifyStatus } from "../../notify/src/types";
import { scoreArticle } from "../../sentiment/src/articleScorer";
import {
  ScorerUnavailableError,
  type ArticleWeights,
  type TextScorer,
} from "../../sentiment/src/types";
import { aggregateArticles } from "../../signals/src/aggregate";
import {
  formatNoDataReport,
  formatSignalReport,
  type NoDataReason,
} from "../../signals/src/report";
import type {
  AggregateResult,
  ScoredArticle,
  SignalThresholds,
} from "../../signals/src/types";
import { errorMessage } from "../../shared/src/http";
import type { SignalLog } from "../../storage/src/signalLog";
import type { SnapshotStore } from "../../storage/src/snapshot";

export type RunOptions = {
  market: string;
  label: string;
  weights: ArticleWeights;
  thresholds: SignalThresholds;
  topN: number;
  debug?: boolean;
};

export type RunDeps = {
  store: SnapshotStore;
  notifier: Notifier;
  createScorer: () => TextScorer;
  signalLog?: SignalLog;
  now?: () => Date;
};

export type RunOutcome =
  | {
      kind: "signal";
      locator: string;
      result: AggregateResult;
      failedArticles: number;
      message: string;
      notify: NotifyStatus;
    }
  | {
      kind: "no_data";
      reason: NoDataReason;
      locator: string | null;
      message: string;
      notify: NotifyStatus;
    };

async function deliver(notifier: Notifier, message: string): Promise<NotifyStatus> {
  const status = await notifier.notify(message);
  if (!status.delivered) {
    console.warn(`[notify] not delivered: ${status.reason}`);
  }
  return status;
}

async function record(
  deps: RunDeps,
  options: RunOptions,
  locator: string | null,
  overallScore: number,
  signal: string,
  articleCount: number
): Promise<void> {
  if (!deps.signalLog) return;
  try {
    await deps.signalLog.record({
      market: options.market,
      overall_score: overallScore,
      signal,
      article_count: articleCount,
      snapshot_locator: locator,
      created_at: (deps.now?.() ?? new Date()).toISOString(),
    });
  } catch (err) {
    console.warn(`[signal] log write failed: ${errorMessage(err)}`);
  }
}

async function scoreItems(
  items: readonly NewsItem[],
  scorer: TextScorer,
  weights: ArticleWeights,
  debug: boolean
): Promise<{ scored: ScoredArticle[]; failed: number }> {
  const scored: ScoredArticle[] = [];
  let failed = 0;

  for (const item of items) {
    try {
      const score = await scoreArticle(item, scorer, weights);
      scored.push({ item, score });
      if (debug) {
        console.log(`[sentiment] ${score.toFixed(3)} (${item.source}) ${item.title}`);
      }
    } catch (err) {
      if (err instanceof ScorerUnavailableError) throw err;
      failed++;
      console.warn(`[sentiment] skipped "${item.title}": ${errorMessage(err)}`);
    }
  }

  return { scored, failed };
}

export async function runSentimentSignal(
  options: RunOptions,
  deps: RunDeps
): Promise<RunOutcome> {
  const latest = await deps.store.readLatest();

  const noData = async (
    reason: NoDataReason,
    locator: string | null
  ): Promise<RunOutcome> => {
    console.log(`[signal] no data (${reason}), sending FLAT`);
    const message = formatNoDataReport(options.label, reason);
    const notify = await deliver(deps.notifier, message);
    await record(deps, options, locator, 0, "FLAT", 0);
    return { kind: "no_data", reason, locator, message, notify };
  };

  if (!latest.ok) return noData("no_snapshot", null);

  const { locator, snapshot } = latest;
  console.log(`[snapshot] using ${locator} (${snapshot.count} items)`);
  if (snapshot.items.length === 0) return noData("no_items", locator);

  const scorer = deps.createScorer();
  const { scored, failed } = await scoreItems(
    snapshot.items,
    scorer,
    options.weights,
    options.debug ?? false
  );
  if (scored.length === 0) {
    throw new Error(`all ${failed} articles in ${locator} failed to score`);
  }

  const result = aggregateArticles(scored, {
    thresholds: options.thresholds,
    topN: options.topN,
  });
  console.log(
    `[signal] overall=${result.overallScore.toFixed(3)} signal=${result.signal} ` +
      `articles=${result.articleCount} failed=${failed}`
  );

  const message = formatSignalReport(result, options.label);
  const notify = await deliver(deps.notifier, message);
  await record(deps, options, locator, result.overallScore, result.signal, result.articleCount);

  return { kind: "signal", locator, result, failedArticles: failed, message, notify };
}
