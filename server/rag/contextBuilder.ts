/**
 * Prompt context assembly.
 *
 * Selection here is positional (first N chunks, optionally keyword-filtered),
 * not similarity-ranked like server/rag/retriever.ts.
 *
 * Layer: RAG (context)
 */

import { CONTEXT_LIMITS, FINANCIAL_KEYWORDS } from "../config/constants";
import type { Chunk, ContextFocus, MarketData } from "./types";

export function mentionsFinancialMetrics(text: string): boolean {
  const lower = text.toLowerCase();
  return FINANCIAL_KEYWORDS.some(keyword => lower.includes(keyword));
}

export function selectChunks(chunks: readonly Chunk[], focus: ContextFocus): Chunk[] {
  if (focus === "financial_metrics") {
    return chunks
      .filter(c => mentionsFinancialMetrics(c.text))
      .slice(0, CONTEXT_LIMITS.FINANCIAL_METRICS_CHUNKS);
  }
  return chunks.slice(0, CONTEXT_LIMITS.GENERAL_CHUNKS);
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * One line per top-level key: scalars as `key: value`, nested mappings as
 * `key: <json>`. Arrays and nulls are skipped.
 */
export function formatMarketData(marketData: MarketData): string {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(marketData)) {
    if (typeof value === "number" || typeof value === "string" || typeof value === "boolean") {
      lines.push(`${key}: ${value}`);
    } else if (isMapping(value)) {
      lines.push(`${key}: ${JSON.stringify(value)}`);
    }
  }
  return lines.join("\n");
}

export function buildContext(
  chunks: readonly Chunk[],
  marketData: MarketData | null | undefined,
  focus: ContextFocus,
): string {
  const parts: string[] = [];

  const selected = selectChunks(chunks, focus);
  if (selected.length > 0) {
    parts.push("TRANSCRIPT EXCERPTS:\n" + selected.map(c => c.text).join("\n\n"));
  }

  if (marketData && Object.keys(marketData).length > 0) {
    parts.push(`MARKET DATA:\n${formatMarketData(marketData)}`);
  }

  return parts.join("\n\n");
}
