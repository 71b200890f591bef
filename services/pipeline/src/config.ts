import markets from "../../news/data/markets.json";
import type { FeedSources, MarketProfile } from "../../news/src/types";
import type { ArticleWeights } from "../../sentiment/src/types";
import type { OpenAiScorerSettings } from "../../sentiment/src/openai.scorer";
import type { SignalThresholds } from "../../signals/src/types";
import type { TelegramSettings } from "../../notify/src/telegram.notifier";
import type { SupabaseSettings } from "../../storage/src/db";

export type SnapshotStoreKind = "file" | "supabase";

export type PipelineConfig = {
  market: MarketProfile;
  weights: ArticleWeights;
  thresholds: SignalThresholds;
  fetchTimeoutMs: number;
  topN: number;
  dataDir: string;
  snapshotStore: SnapshotStoreKind;
  openai: OpenAiScorerSettings;
  telegram: TelegramSettings;
  supabase: SupabaseSettings;
  signalLogEnabled: boolean;
  debug: boolean;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const MARKETS: Record<string, MarketProfile> = Object.fromEntries(
  Object.entries(markets).map(([id, p]): [string, MarketProfile] => [
    id,
    { id, label: p.label, timeZone: p.timeZone, feeds: p.feeds, keywords: p.keywords },
  ])
);

type Env = Record<string, string | undefined>;

function str(env: Env, key: string, fallback: string): string {
  const v = env[key]?.trim();
  return v ? v : fallback;
}

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    console.warn(`[config] ${key}=${raw} is not a number, using ${fallback}`);
    return fallback;
  }
  return n;
}

function flag(env: Env, key: string): boolean {
  const v = env[key]?.trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes";
}

/** "e24=https://…,dn=https://…" → { e24: "https://…", dn: "https://…" } */
export function parseFeedList(raw: string): FeedSources {
  const feeds: Record<string, string> = {};
  for (const entry of raw.split(/,(?=\s*[\w-]+=)/)) {
    const eq = entry.indexOf("=");
    const name = entry.slice(0, eq).trim();
    const url = entry.slice(eq + 1).trim();
    if (eq <= 0 || !name || !url) {
      throw new ConfigError(`invalid NEWS_FEEDS entry "${entry.trim()}", expected name=url`);
    }
    feeds[name] = url;
  }
  return feeds;
}

export function parseKeywordList(raw: string): string[] {
  return raw
    .split(",")
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
}

export function loadConfig(env: Env = process.env): PipelineConfig {
  const marketId = str(env, "MARKET", "oslo").toLowerCase();
  const profile = MARKETS[marketId];
  if (!profile) {
    throw new ConfigError(
      `unknown MARKET "${marketId}" (known: ${Object.keys(MARKETS).join(", ")})`
    );
  }

  const feedsRaw = env.NEWS_FEEDS?.trim();
  const keywordsRaw = env.NEWS_KEYWORDS?.trim();
  const market: MarketProfile = {
    ...profile,
    feeds: feedsRaw ? parseFeedList(feedsRaw) : profile.feeds,
    keywords: keywordsRaw ? parseKeywordList(keywordsRaw) : profile.keywords,
  };

  const weights: ArticleWeights = {
    title: num(env, "TITLE_WEIGHT", 2.0),
    description: num(env, "DESC_WEIGHT", 1.0),
  };
  if (weights.title < 0 || weights.description < 0) {
    throw new ConfigError("TITLE_WEIGHT and DESC_WEIGHT must not be negative");
  }

  const thresholds: SignalThresholds = {
    bull: num(env, "BULL_THRESHOLD", 0.2),
    bear: num(env, "BEAR_THRESHOLD", -0.2),
  };
  if (thresholds.bear > thresholds.bull) {
    throw new ConfigError(
      `BEAR_THRESHOLD (${thresholds.bear}) must not exceed BULL_THRESHOLD (${thresholds.bull})`
    );
  }

  const storeKind = str(env, "SNAPSHOT_STORE", "file");
  if (storeKind !== "file" && storeKind !== "supabase") {
    throw new ConfigError(`unknown SNAPSHOT_STORE "${storeKind}" (file | supabase)`);
  }

  return {
    market,
    weights,
    thresholds,
    fetchTimeoutMs: num(env, "FETCH_TIMEOUT_MS", 10_000),
    topN: Math.max(0, Math.floor(num(env, "TOP_ARTICLES", 3))),
    dataDir: str(env, "DATA_DIR", "data"),
    snapshotStore: storeKind,
    openai: {
      apiKey: str(env, "OPENAI_API_KEY", ""),
      model: str(env, "SENTIMENT_MODEL", "gpt-4o-mini"),
      timeoutMs: num(env, "SENTIMENT_TIMEOUT_MS", 8000),
    },
    telegram: {
      token: str(env, "TELEGRAM_TOKEN", ""),
      chatId: str(env, "TELEGRAM_CHAT_ID", ""),
    },
    supabase: {
      url: str(env, "SUPABASE_URL", ""),
      serviceRoleKey: str(env, "SUPABASE_SERVICE_ROLE_KEY", ""),
    },
    signalLogEnabled: flag(env, "SIGNAL_LOG_ENABLED"),
    debug: flag(env, "LOG_DEBUG"),
  };
}
