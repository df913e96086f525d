/**
 * Earnings call analysis pipeline.
 *
 * ingest: raw transcript → ProcessedTranscript → market data (when a ticker
 * is given) → three-tier analysis → persisted EarningsCallRecord.
 *
 * searchTranscript: similarity search over the chunks of a stored transcript.
 *
 * Layer: Application service (called from routes, calls ingestion / RAG / storage)
 */

import { randomUUID } from "crypto";
import type { EarningsCallRecord } from "@shared/schema";
import type { TranscriptProcessor } from "../ingestion/processTranscript";
import type { MarketDataAggregator } from "../marketData/types";
import type { TierOrchestrator } from "../rag/composer";
import type { Retriever } from "../rag/retriever";
import type { Chunk, MarketData } from "../rag/types";
import type { IStorage } from "../storage";
import { NotFoundError, ValidationError, logError } from "../utils/errorHandler";

export type IngestInput = {
  text: string;
  ticker?: string;
  period?: string;
};

export type TranscriptSearchHit = {
  rank: number;
  text: string;
  startToken: number;
  endToken: number;
};

export type EarningsCallPipelineDeps = {
  processor: TranscriptProcessor;
  orchestrator: TierOrchestrator;
  retriever: Retriever;
  marketData: MarketDataAggregator;
  storage: IStorage;
  defaultTopK: number;
};

/**
 * `AAPL` + `Q2 FY2025` → `AAPL_Q2_FY2025`. Without both parts the id is
 * generated, so unlabeled uploads never overwrite each other.
 */
export function buildAnalysisId(ticker?: string, period?: string): string {
  if (ticker && period) {
    return `${ticker.toUpperCase()}_${period.trim().replace(/\s+/g, "_")}`;
  }
  return `analysis_${randomUUID()}`;
}

export class EarningsCallPipeline {
  constructor(private readonly deps: EarningsCallPipelineDeps) {}

  async ingest(input: IngestInput, signal?: AbortSignal): Promise<EarningsCallRecord> {
    if (input.text.trim().length === 0) {
      throw new ValidationError("Transcript text is empty");
    }

    const started = Date.now();
    const ticker = input.ticker?.toUpperCase();
    const id = buildAnalysisId(ticker, input.period);
    console.log(`[Ingest] Starting analysis ${id} (${input.text.length} chars)`);

    const processed = this.deps.processor.process(input.text);
    console.log(
      `[Ingest] ${id}: ${processed.metadata.totalTokens} tokens, ${processed.metadata.numChunks} chunks, ${processed.metadata.numSpeakers} speakers`,
    );

    const marketData = ticker ? await this.fetchMarketData(ticker, signal) : null;

    const analysis = await this.deps.orchestrator.analyzeEarningsCall(processed.chunks, marketData, signal);
    const processingTimeMs = Date.now() - started;

    const record = await this.deps.storage.saveAnalysis({
      id,
      ticker: ticker ?? null,
      period: input.period ?? null,
      status: analysis.status,
      analysis,
      metadata: { ...processed.metadata, processingTimeMs },
      marketData,
      transcriptRaw: input.text,
    });

    console.log(`[Ingest] ${id}: ${analysis.status} in ${processingTimeMs}ms`);
    return record;
  }

  async searchTranscript(
    id: string,
    query: string,
    topK: number = this.deps.defaultTopK,
    signal?: AbortSignal,
  ): Promise<TranscriptSearchHit[]> {
    const record = await this.deps.storage.getAnalysis(id);
    if (!record) {
      throw new NotFoundError("Analysis");
    }

    const { chunks } = this.deps.processor.process(record.transcriptRaw);
    const ranked: Chunk[] = await this.deps.retriever.retrieve(query, chunks, topK, signal);

    return ranked.map((chunk, i) => ({
      rank: i + 1,
      text: chunk.text,
      startToken: chunk.startToken,
      endToken: chunk.endToken,
    }));
  }

  private async fetchMarketData(ticker: string, signal?: AbortSignal): Promise<MarketData | null> {
    try {
      return await this.deps.marketData.getComprehensiveMarketData(ticker, signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      logError("Ingest MarketData", error);
      return null;
    }
  }
}
