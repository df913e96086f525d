/**
 * Embedding capability: batch text → fixed-width vectors, one per input, in
 * input order.
 */

import { OpenAI } from "openai";
import { EMBEDDING_DIMENSIONS } from "../config/models";
import { OFFLINE_EMBEDDING } from "../config/constants";
import { logError } from "../utils/errorHandler";
import { withResilience, type ResiliencePolicy } from "./resilience";

export interface EmbeddingClient {
  readonly mode: "live" | "offline";
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export class OpenAIEmbeddingClient implements EmbeddingClient {
  readonly mode = "live";
  private readonly openai: OpenAI;

  constructor(private readonly model: string, apiKey: string) {
    this.openai = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.openai.embeddings.create(
      { model: this.model, input: texts },
      { signal },
    );

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(d => d.embedding);
  }
}

/**
 * Constant vector for every input. With identical vectors every chunk ties,
 * so retrieval degrades to original chunk order.
 */
export class OfflineEmbeddingClient implements EmbeddingClient {
  readonly mode = "offline";

  constructor(
    private readonly dimensions: number = OFFLINE_EMBEDDING.DIMENSIONS,
    private readonly value: number = OFFLINE_EMBEDDING.VALUE,
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(() => new Array<number>(this.dimensions).fill(this.value));
  }
}

export function offlineEmbeddingsFor(model: string): OfflineEmbeddingClient {
  return new OfflineEmbeddingClient(EMBEDDING_DIMENSIONS[model] ?? OFFLINE_EMBEDDING.DIMENSIONS);
}

/**
 * Wraps a live client with the timeout/retry policy; once the budget is
 * spent the offline vectors are returned instead of failing the request.
 */
export class ResilientEmbeddingClient implements EmbeddingClient {
  constructor(
    private readonly primary: EmbeddingClient,
    private readonly fallback: EmbeddingClient,
    private readonly policy: ResiliencePolicy,
  ) {}

  get mode(): "live" | "offline" {
    return this.primary.mode;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    try {
      return await withResilience(attemptSignal => this.primary.embed(texts, attemptSignal), this.policy, signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      logError("Embeddings", error);
      console.warn(`[Embeddings] Falling back to offline vectors for ${texts.length} text(s)`);
      return this.fallback.embed(texts, signal);
    }
  }
}
