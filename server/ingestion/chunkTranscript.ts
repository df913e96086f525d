/**
 * Token-windowed chunking with sentence snapping.
 *
 * Windows are at most maxChunkSize tokens. A window that is not the last one
 * is pulled back to end on a sentence terminal found inside its trailing
 * overlap region; without one it is cut hard. Windows shorter than
 * minChunkSize are dropped, so a short tail can go uncovered.
 *
 * Layer: Ingestion (deterministic, pure)
 */

import { z } from "zod";
import { SENTENCE_TERMINALS } from "../config/constants";
import { ValidationError, getErrorMessage } from "../utils/errorHandler";
import type { Chunk } from "../rag/types";
import type { Tokenizer } from "./tokenizer";
import type { ChunkingOptions } from "./types";

export const chunkingOptionsSchema = z
  .object({
    maxChunkSize: z.number().int().positive(),
    minChunkSize: z.number().int().min(0),
    chunkOverlap: z.number().int().min(0),
  })
  .refine((o) => o.minChunkSize < o.maxChunkSize, {
    message: "minChunkSize must be smaller than maxChunkSize",
    path: ["minChunkSize"],
  })
  .refine((o) => o.chunkOverlap < o.maxChunkSize, {
    message: "chunkOverlap must be smaller than maxChunkSize",
    path: ["chunkOverlap"],
  });

export class Chunker {
  private readonly options: ChunkingOptions;
  private readonly terminalTokens: ReadonlySet<number>;

  constructor(private readonly tokenizer: Tokenizer, options: ChunkingOptions) {
    const parsed = chunkingOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ValidationError(`Invalid chunking options: ${getErrorMessage(parsed.error)}`);
    }
    this.options = parsed.data;
    this.terminalTokens = new Set(
      SENTENCE_TERMINALS.flatMap((terminal) => tokenizer.encode(terminal).slice(0, 1)),
    );
  }

  chunkText(text: string): Chunk[] {
    return this.chunkTokens(this.tokenizer.encode(text));
  }

  chunkTokens(tokens: readonly number[]): Chunk[] {
    const { maxChunkSize, minChunkSize, chunkOverlap } = this.options;
    const total = tokens.length;
    const chunks: Chunk[] = [];

    let i = 0;
    while (i < total) {
      let chunkEnd = Math.min(i + maxChunkSize, total);

      if (chunkEnd < total) {
        const overlapStart = Math.max(i + maxChunkSize - chunkOverlap, i);
        for (let j = chunkEnd - 1; j > overlapStart; j--) {
          if (this.terminalTokens.has(tokens[j])) {
            chunkEnd = j + 1;
            break;
          }
        }
      }

      const tokenCount = chunkEnd - i;
      if (tokenCount >= minChunkSize) {
        chunks.push({
          text: this.tokenizer.decode(tokens.slice(i, chunkEnd)),
          startToken: i,
          endToken: chunkEnd,
          tokenCount,
        });
      }

      // Always advance by at least one token.
      i = Math.max(i + 1, chunkEnd - chunkOverlap);
    }

    return chunks;
  }
}
