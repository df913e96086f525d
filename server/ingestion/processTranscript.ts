/**
 * Transcript processing pipeline.
 *
 * Responsibilities:
 * - Normalize raw transcript text
 * - Derive speaker segments, sections and token chunks from the SAME
 *   normalized text (three independent derivations)
 * - Compute token / chunk / speaker counts
 *
 * This file MUST NOT:
 * - Call LLMs or embedding models
 * - Persist anything
 *
 * Layer: Ingestion (deterministic)
 */

import { Chunker } from "./chunkTranscript";
import { normalizeTranscript } from "./normalizeTranscript";
import { extractSections } from "./sections";
import { segmentSpeakers } from "./speakerSegments";
import type { Tokenizer } from "./tokenizer";
import type { ChunkingOptions, ProcessedTranscript } from "./types";

export class TranscriptProcessor {
  private readonly chunker: Chunker;

  /**
   * @throws ValidationError when the chunking options are inconsistent.
   */
  constructor(private readonly tokenizer: Tokenizer, chunking: ChunkingOptions) {
    this.chunker = new Chunker(tokenizer, chunking);
  }

  process(text: string): ProcessedTranscript {
    const cleanedText = normalizeTranscript(text);
    const speakers = segmentSpeakers(cleanedText);
    const tokens = this.tokenizer.encode(cleanedText);
    const chunks = this.chunker.chunkTokens(tokens);
    const sections = extractSections(cleanedText);

    return Object.freeze({
      originalText: text,
      cleanedText,
      speakers: Object.freeze(speakers),
      chunks: Object.freeze(chunks),
      sections: Object.freeze(sections),
      metadata: Object.freeze({
        totalTokens: tokens.length,
        numChunks: chunks.length,
        numSpeakers: new Set(speakers.map(s => s.speaker)).size,
      }),
    });
  }
}
