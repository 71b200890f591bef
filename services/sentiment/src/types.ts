/** What a sentiment model says about one text. */
export type RawSentiment = {
  label: string;
  confidence: number; // 0..1
};

export interface TextScorer {
  score(text: string): Promise<RawSentiment>;
}

export type Sentiment =
  | { kind: "positive"; confidence: number }
  | { kind: "negative"; confidence: number }
  | { kind: "other" };

export type ArticleWeights = {
  title: number;
  description: number;
};

export class ScorerUnavailableError extends Error {
  constructor(reason: string) {
    super(`sentiment scorer unavailable: ${reason}`);
    this.name = "ScorerUnavailableError";
  }
}
