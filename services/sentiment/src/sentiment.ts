import type { RawSentiment, Sentiment } from "./types";

function clamp01(x: number) {
  return Number.isFinite(x) ? Math.max(0, Math.min(1, x)) : 0;
}

/**
 * Decide the sentiment kind once, at the scorer boundary.
 * Handles both POSITIVE/NEGATIVE and LABEL_1/LABEL_0 naming.
 */
export function interpretSentiment(raw: RawSentiment): Sentiment {
  const label = raw.label.trim().toUpperCase();
  const confidence = clamp01(raw.confidence);

  if (label.includes("NEG") || label === "LABEL_0") {
    return { kind: "negative", confidence };
  }
  if (label.includes("POS") || label === "LABEL_1") {
    return { kind: "positive", confidence };
  }
  return { kind: "other" };
}

export function sentimentValue(sentiment: Sentiment): number {
  switch (sentiment.kind) {
    case "positive":
      return sentiment.confidence;
    case "negative":
      return -sentiment.confidence;
    case "other":
      return 0;
  }
}
