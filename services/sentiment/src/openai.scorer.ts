import OpenAI from "openai";
import { ScorerUnavailableError, type RawSentiment, type TextScorer } from "./types";

export type OpenAiScorerSettings = {
  apiKey: string;
  model: string;
  timeoutMs: number;
};

const SYSTEM_PROMPT = `You classify the sentiment of financial news text (often Norwegian) for stock market direction.
Reply with JSON only: {"label": "POSITIVE" | "NEGATIVE" | "NEUTRAL", "confidence": number between 0 and 1}.
POSITIVE means the text suggests rising prices, NEGATIVE falling prices, NEUTRAL neither.`;

/** Validate the model's JSON reply. */
export function parseSentimentReply(content: string): RawSentiment {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new Error(`sentiment reply is not JSON: ${content.slice(0, 80)}`);
  }
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error("sentiment reply is not an object");
  }
  const label = "label" in parsed ? parsed.label : undefined;
  const confidence = "confidence" in parsed ? Number(parsed.confidence) : NaN;
  if (typeof label !== "string" || !Number.isFinite(confidence)) {
    throw new Error(`sentiment reply missing label/confidence: ${content.slice(0, 80)}`);
  }
  return { label, confidence };
}

class OpenAiTextScorer implements TextScorer {
  constructor(
    private readonly client: OpenAI,
    private readonly settings: OpenAiScorerSettings
  ) {}

  async score(text: string): Promise<RawSentiment> {
    let timer: NodeJS.Timeout | undefined;
    try {
      const response = await Promise.race([
        this.client.chat.completions.create({
          model: this.settings.model,
          temperature: 0,
          max_tokens: 40,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: text },
          ],
        }),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error("sentiment timeout")),
            this.settings.timeoutMs
          );
        }),
      ]);

      const content = response.choices?.[0]?.message?.content?.trim();
      if (!content) throw new Error("empty sentiment response");
      return parseSentimentReply(content);
    } catch (err) {
      // a rejected key fails every call; the run cannot continue
      if (err instanceof OpenAI.AuthenticationError) {
        throw new ScorerUnavailableError(err.message);
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Build the scorer once per run; every article shares it.
 * Throws ScorerUnavailableError when it cannot be constructed.
 */
export function createOpenAiTextScorer(settings: OpenAiScorerSettings): TextScorer {
  if (!settings.apiKey) {
    throw new ScorerUnavailableError("OPENAI_API_KEY is not set");
  }
  if (!settings.model) {
    throw new ScorerUnavailableError("no sentiment model configured");
  }
  let client: OpenAI;
  try {
    client = new OpenAI({ apiKey: settings.apiKey });
  } catch (err) {
    throw new ScorerUnavailableError(err instanceof Error ? err.message : String(err));
  }
  return new OpenAiTextScorer(client, settings);
}
