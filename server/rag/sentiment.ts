/**
 * Sentiment classification for Tier A bullets.
 *
 * Callers depend on SentimentClassifier only, so a model-backed classifier can
 * replace the keyword one without touching the parser.
 */

import { SENTIMENT_KEYWORDS } from "../config/constants";
import type { Sentiment } from "./types";

export interface SentimentClassifier {
  classify(text: string): Sentiment;
}

/**
 * Case-insensitive substring match; positive keywords are checked first, so a
 * line with both "beat" and "miss" is positive.
 */
export class KeywordSentimentClassifier implements SentimentClassifier {
  constructor(
    private readonly positive: readonly string[] = SENTIMENT_KEYWORDS.POSITIVE,
    private readonly negative: readonly string[] = SENTIMENT_KEYWORDS.NEGATIVE,
  ) {}

  classify(text: string): Sentiment {
    const lower = text.toLowerCase();
    if (this.positive.some(word => lower.includes(word))) return "positive";
    if (this.negative.some(word => lower.includes(word))) return "negative";
    return "neutral";
  }
}
