/**
 * RAG Type Definitions
 *
 * Purpose:
 * Shared types for transcript chunks, tier outputs and the analysis result.
 *
 * Layer: RAG (type definitions)
 */

import type { PromptUsageRecord } from "../utils/promptVersionTracker";

export type Chunk = {
  text: string;
  startToken: number;
  endToken: number; // exclusive
  tokenCount: number;
};

/**
 * Selects the chunk filter used when assembling a prompt context.
 * detailed_analysis has no filter of its own and reads like general.
 */
export type ContextFocus = "financial_metrics" | "general" | "detailed_analysis";

/**
 * Opaque market data mapping, as returned by a MarketDataAggregator.
 */
export type MarketData = Record<string, unknown>;

export type Sentiment = "positive" | "negative" | "neutral";

export type BulletFact = {
  text: string;
  sentiment: Sentiment;
  confidence: number; // 0-100
};

/**
 * Tier C structured extraction is not implemented. The block says so
 * explicitly instead of carrying invented metrics; the model's full answer is
 * in rawResponses.tierC.
 */
export type ExpertBlock = {
  status: "not_implemented";
  metrics: Record<string, string>;
  insights: string[];
  risks: string[];
  note: string;
};

export type TierName = "tierA" | "tierB" | "tierC";

export type TierOutcome = {
  tier: TierName;
  status: "ok" | "fallback";
  errorType?: string;
  error?: string;
};

export type AnalysisStatus = "completed" | "partial" | "failed";

export type AnalysisResult = {
  tierABullets: BulletFact[];
  tierBSummary: string;
  tierCExpert: ExpertBlock;
  rawResponses: Record<TierName, string>;
  tierOutcomes: TierOutcome[];
  status: AnalysisStatus;
  promptVersions: PromptUsageRecord;
};
