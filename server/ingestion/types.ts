/**
 * Ingestion Type Definitions
 *
 * Purpose:
 * Shapes produced by the deterministic transcript processing stage.
 *
 * Layer: Ingestion (type definitions)
 */

import type { Chunk } from "../rag/types";

export type SpeakerSegment = {
  speaker: string;
  text: string;
};

export const SECTION_NAMES = [
  "prepared_remarks",
  "qa_section",
  "guidance",
  "financial_metrics",
  "business_update",
  "general",
] as const;

export type SectionName = typeof SECTION_NAMES[number];

/**
 * Each key holds the most recent contiguous run for that section.
 */
export type Sections = Partial<Record<SectionName, string>>;

export type ChunkingOptions = {
  maxChunkSize: number;
  minChunkSize: number;
  chunkOverlap: number;
};

export type TranscriptMetadata = {
  totalTokens: number;
  numChunks: number;
  numSpeakers: number;
};

export type ProcessedTranscript = Readonly<{
  originalText: string;
  cleanedText: string;
  speakers: readonly SpeakerSegment[];
  chunks: readonly Chunk[];
  sections: Readonly<Sections>;
  metadata: Readonly<TranscriptMetadata>;
}>;
