/**
 * Tier response parsers.
 *
 * Layer: RAG (post-processing, no LLM calls)
 */

import { TIER_A_DEFAULT_CONFIDENCE } from "../config/constants";
import type { SentimentClassifier } from "./sentiment";
import type { BulletFact, ExpertBlock } from "./types";

const BULLET_PREFIXES = ["•", "-", "*", "1.", "2.", "3.", "4."] as const;
const LEADING_MARKER = /^(?:[•\-*]|\d+\.)\s*/;

export function isBulletLine(line: string): boolean {
  return BULLET_PREFIXES.some(prefix => line.startsWith(prefix));
}

export function stripBulletMarker(line: string): string {
  return line.replace(LEADING_MARKER, "");
}

/**
 * Keeps bullet and numbered lines only. Confidence is the fixed default; it
 * is not read from the text.
 */
export function parseTierAResponse(
  response: string,
  classifier: SentimentClassifier,
  confidence: number = TIER_A_DEFAULT_CONFIDENCE,
): BulletFact[] {
  const bullets: BulletFact[] = [];

  for (const rawLine of response.split("\n")) {
    const line = rawLine.trim();
    if (!line || !isBulletLine(line)) continue;

    const text = stripBulletMarker(line);
    bullets.push({
      text,
      sentiment: classifier.classify(text),
      confidence,
    });
  }

  return bullets;
}

export const TIER_C_NOT_IMPLEMENTED_NOTE =
  "Structured expert extraction is not implemented; see rawResponses.tierC for the full analysis.";

// TODO: extract metrics, insights and risks once Tier C returns JSON.
export function parseTierCResponse(_response: string): ExpertBlock {
  return {
    status: "not_implemented",
    metrics: {},
    insights: [],
    risks: [],
    note: TIER_C_NOT_IMPLEMENTED_NOTE,
  };
}
