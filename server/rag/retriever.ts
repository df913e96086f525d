/**
 * Similarity retrieval over transcript chunks.
 *
 * Embeds the query and all chunk texts (one batched call), ranks chunks by
 * cosine similarity, ties broken by original chunk order.
 *
 * Layer: RAG (retrieval)
 */

import type { EmbeddingClient } from "../llm/embeddings";
import type { Chunk } from "./types";

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`[Retriever] Vector width mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export type RankedChunk = {
  chunk: Chunk;
  index: number;
  score: number;
};

export class Retriever {
  constructor(private readonly embeddings: EmbeddingClient) {}

  async rank(query: string, chunks: readonly Chunk[], signal?: AbortSignal): Promise<RankedChunk[]> {
    if (chunks.length === 0) return [];

    const [queryVector] = await this.embeddings.embed([query], signal);
    const chunkVectors = await this.embeddings.embed(chunks.map(c => c.text), signal);

    if (!queryVector || chunkVectors.length !== chunks.length) {
      throw new Error(
        `[Retriever] Expected ${chunks.length + 1} embeddings, got ${chunkVectors.length + (queryVector ? 1 : 0)}`,
      );
    }

    return chunks
      .map((chunk, index) => ({ chunk, index, score: cosineSimilarity(queryVector, chunkVectors[index]) }))
      .sort((a, b) => b.score - a.score || a.index - b.index);
  }

  async retrieve(query: string, chunks: readonly Chunk[], topK: number, signal?: AbortSignal): Promise<Chunk[]> {
    const ranked = await this.rank(query, chunks, signal);
    return ranked.slice(0, topK).map(r => r.chunk);
  }
}
