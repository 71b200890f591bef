import "dotenv/config";
import { collectNews } from "../../news/src/collectNews";
import { TelegramNotifier } from "../../notify/src/telegram.notifier";
import { createOpenAiTextScorer } from "../../sentiment/src/openai.scorer";
import { errorMessage } from "../../shared/src/http";
import type { SignalLog } from "../../storage/src/signalLog";
import type { SnapshotStore } from "../../storage/src/snapshot";
import { loadConfig, type PipelineConfig } from "./config";
import { runSentimentSignal } from "./runSentiment";
import { createDryRunSnapshotStore, createSignalLog, createSnapshotStore } from "./stores";

const USAGE = "usage: index.ts [fetch [--dry-run] | score | run [--dry-run]]";

async function fetchNews(config: PipelineConfig, store: SnapshotStore, persist: boolean) {
  const { snapshot, sources } = await collectNews(
    {
      feeds: config.market.feeds,
      keywords: config.market.keywords,
      timeoutMs: config.fetchTimeoutMs,
      persist,
    },
    { store }
  );

  for (const s of sources) {
    console.log(
      `[news] ${s.source}: ${s.status} items=${s.itemCount} relevant=${s.relevantCount}` +
        (s.error ? ` error=${s.error}` : "")
    );
  }
  if (!persist) console.log(JSON.stringify(snapshot, null, 2));
}

async function scoreNews(config: PipelineConfig, store: SnapshotStore, signalLog?: SignalLog) {
  const outcome = await runSentimentSignal(
    {
      market: config.market.id,
      label: config.market.label,
      weights: config.weights,
      thresholds: config.thresholds,
      topN: config.topN,
      debug: config.debug,
    },
    {
      store,
      notifier: new TelegramNotifier(config.telegram),
      createScorer: () => createOpenAiTextScorer(config.openai),
      signalLog,
    }
  );
  console.log(outcome.message);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args.find((a) => !a.startsWith("--")) ?? "run";
  const dryRun = args.includes("--dry-run");
  const config = loadConfig();

  switch (command) {
    case "fetch":
      await fetchNews(config, createSnapshotStore(config), !dryRun);
      break;
    case "score":
      if (dryRun) throw new Error(`--dry-run only applies to fetch and run\n${USAGE}`);
      await scoreNews(config, createSnapshotStore(config), createSignalLog(config));
      break;
    case "run":
      if (dryRun) {
        // Score the fresh snapshot from memory; nothing is written or logged
        const store = createDryRunSnapshotStore(config);
        await fetchNews(config, store, true);
        await scoreNews(config, store);
      } else {
        const store = createSnapshotStore(config);
        await fetchNews(config, store, true);
        await scoreNews(config, store, createSignalLog(config));
      }
      break;
    default:
      throw new Error(`unknown command "${command}"\n${USAGE}`);
  }
}

main().catch((err) => {
  console.error("[pipeline] fatal:", errorMessage(err));
  process.exit(1);
});
