/**
 * RAG composition layer: the three-tier earnings call analysis.
 *
 * Purpose:
 * Turns transcript chunks (plus optional market data) into the Tier A/B/C
 * analysis by issuing one language-model call per tier and parsing the
 * answers.
 *
 * What this file IS:
 * - An orchestration layer over retrieved content
 * - Responsible for per-tier failure isolation: a tier whose call fails is
 *   answered by the offline client and reported as a fallback
 *
 * What this file is NOT:
 * - NOT responsible for chunking or retrieval
 * - NOT allowed to fetch market data or persist results
 *
 * Layer: RAG – Composition (LLM-only)
 */

import {
  EARNINGS_ANALYST_SYSTEM_PROMPT,
  TIER_A_QUERY,
  TIER_B_QUERY,
  TIER_C_QUERY,
  buildTierUserPrompt,
} from "../config/prompts";
import type { PromptVersions } from "../config/prompts/versions";
import type { LanguageModelClient, LLMMessage } from "../llm/client";
import { withResilience } from "../llm/resilience";
import { classifyCapabilityError, logError } from "../utils/errorHandler";
import { PromptVersionTracker } from "../utils/promptVersionTracker";
import { buildContext } from "./contextBuilder";
import { parseTierAResponse, parseTierCResponse } from "./parsers";
import type { SentimentClassifier } from "./sentiment";
import type {
  AnalysisResult,
  AnalysisStatus,
  Chunk,
  ContextFocus,
  MarketData,
  TierName,
  TierOutcome,
} from "./types";

type TierDefinition = {
  tier: TierName;
  query: string;
  queryPrompt: keyof PromptVersions;
  focus: ContextFocus;
};

export const TIER_DEFINITIONS: readonly TierDefinition[] = [
  { tier: "tierA", query: TIER_A_QUERY, queryPrompt: "TIER_A_QUERY", focus: "financial_metrics" },
  { tier: "tierB", query: TIER_B_QUERY, queryPrompt: "TIER_B_QUERY", focus: "general" },
  { tier: "tierC", query: TIER_C_QUERY, queryPrompt: "TIER_C_QUERY", focus: "detailed_analysis" },
];

export type TierOrchestratorConfig = {
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
};

export type TierOrchestratorDeps = {
  llm: LanguageModelClient;
  /** Answers a tier whose live call failed. */
  fallbackLlm: LanguageModelClient;
  sentiment: SentimentClassifier;
  config: TierOrchestratorConfig;
};

type TierRun = {
  text: string;
  outcome: TierOutcome;
};

export function buildTierMessages(context: string, query: string): LLMMessage[] {
  return [
    { role: "system", content: EARNINGS_ANALYST_SYSTEM_PROMPT },
    { role: "user", content: buildTierUserPrompt(context, query) },
  ];
}

export function summarizeOutcomes(outcomes: readonly TierOutcome[]): AnalysisStatus {
  const fallbacks = outcomes.filter(o => o.status === "fallback").length;
  if (fallbacks === 0) return "completed";
  if (fallbacks === outcomes.length) return "failed";
  return "partial";
}

export class TierOrchestrator {
  constructor(private readonly deps: TierOrchestratorDeps) {}

  /**
   * Runs all three tiers concurrently. Only caller cancellation rejects;
   * model failures are absorbed per tier.
   */
  async analyzeEarningsCall(
    chunks: readonly Chunk[],
    marketData?: MarketData | null,
    signal?: AbortSignal,
  ): Promise<AnalysisResult> {
    const tracker = new PromptVersionTracker();
    tracker.track("EARNINGS_ANALYST_SYSTEM_PROMPT");

    const runs = await Promise.all(
      TIER_DEFINITIONS.map(definition => {
        tracker.track(definition.queryPrompt);
        return this.runTier(definition, chunks, marketData, signal);
      }),
    );

    const [tierA, tierB, tierC] = runs;
    const tierOutcomes = runs.map(r => r.outcome);

    return {
      tierABullets: parseTierAResponse(tierA.text, this.deps.sentiment),
      tierBSummary: tierB.text,
      tierCExpert: parseTierCResponse(tierC.text),
      rawResponses: {
        tierA: tierA.text,
        tierB: tierB.text,
        tierC: tierC.text,
      },
      tierOutcomes,
      status: summarizeOutcomes(tierOutcomes),
      promptVersions: tracker.getVersions(),
    };
  }

  private async runTier(
    definition: TierDefinition,
    chunks: readonly Chunk[],
    marketData: MarketData | null | undefined,
    signal?: AbortSignal,
  ): Promise<TierRun> {
    const { llm, fallbackLlm, config } = this.deps;
    const context = buildContext(chunks, marketData, definition.focus);
    const messages = buildTierMessages(context, definition.query);

    try {
      const text = await withResilience(
        attemptSignal => llm.complete(messages, {
          temperature: config.temperature,
          maxTokens: config.maxTokens,
          signal: attemptSignal,
        }),
        { label: `LLM ${definition.tier}`, timeoutMs: config.timeoutMs, maxRetries: config.maxRetries },
        signal,
      );
      return { text, outcome: { tier: definition.tier, status: "ok" } };
    } catch (error) {
      if (signal?.aborted) throw error;

      logError(`Composer ${definition.tier}`, error);
      const classified = classifyCapabilityError(error);
      const text = await fallbackLlm.complete(messages);
      return {
        text,
        outcome: {
          tier: definition.tier,
          status: "fallback",
          errorType: classified.type,
          error: classified.errorMessage,
        },
      };
    }
  }
}
