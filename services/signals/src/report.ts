import type { AggregateResult } from "./types";

export type NoDataReason = "no_snapshot" | "no_items";

// Telegram legacy Markdown: _ * ` [ must be escaped outside entities
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`\[])/g, "\\$1");
}

export function formatSignedScore(score: number): string {
  return `${score >= 0 ? "+" : ""}${score.toFixed(3)}`;
}

export function formatSignalReport(result: AggregateResult, label: string): string {
  const lines = [
    `📰 *${escapeMarkdown(label)} sentiment*`,
    `• Overall sentiment score: \`${result.overallScore.toFixed(3)}\``,
    `• Trade signal: *\`${result.signal}\`*`,
    `• Articles scored: ${result.articleCount}`,
    "",
    "_Top headlines:_",
  ];

  for (const { item, score } of result.topArticles) {
    lines.push(
      `- (${escapeMarkdown(item.source)}) \`${formatSignedScore(score)}\` – ${escapeMarkdown(item.title)}`
    );
  }

  return lines.join("\n");
}

export function formatNoDataReport(label: string, reason: NoDataReason): string {
  const detail =
    reason === "no_snapshot"
      ? "No news snapshot available."
      : "No relevant news items found.";
  return `📉 *${escapeMarkdown(label)}*: ${detail} Signal: \`FLAT\` (no trade).`;
}
