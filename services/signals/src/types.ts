import type { NewsItem } from "../../news/src/types";

export type Signal = "BULL" | "BEAR" | "FLAT";

export type SignalThresholds = {
  bull: number; // overall >= bull → BULL
  bear: number; // overall <= bear → BEAR
};

export type ScoredArticle = {
  item: NewsItem;
  score: number; // -1..1
};

export type AggregateResult = {
  overallScore: number;
  signal: Signal;
  articleCount: number;
  topArticles: ScoredArticle[];
};
