import type { NewsItem } from "../../news/src/types";
import { interpretSentiment, sentimentValue } from "./sentiment";
import type { ArticleWeights, TextScorer } from "./types";

export const DEFAULT_WEIGHTS: ArticleWeights = { title: 2.0, description: 1.0 };

async function scoreField(scorer: TextScorer, text: string): Promise<number> {
  return sentimentValue(interpretSentiment(await scorer.score(text)));
}

/**
 * Weighted sentiment of one article in [-1, 1]. Empty fields are not sent to
 * the scorer and weigh nothing; an article with neither scores exactly 0.
 */
export async function scoreArticle(
  item: Pick<NewsItem, "title" | "description">,
  scorer: TextScorer,
  weights: ArticleWeights = DEFAULT_WEIGHTS
): Promise<number> {
  const title = item.title.trim();
  const description = item.description.trim();

  const wTitle = title ? weights.title : 0;
  const wDesc = description ? weights.description : 0;
  const total = wTitle + wDesc;
  if (total === 0) return 0;

  const sTitle = wTitle > 0 ? await scoreField(scorer, title) : 0;
  const sDesc = wDesc > 0 ? await scoreField(scorer, description) : 0;

  return (sTitle * wTitle + sDesc * wDesc) / total;
}
