/**
 * Centralized LLM Model Registry
 *
 * Single source of truth for the model names the analysis pipeline may be
 * configured with. The provider behind a model is detected from this registry
 * (see server/llm/client.ts), so a model has to be listed here or follow one of
 * the known name prefixes.
 *
 * MODEL TIERS:
 *
 * FAST_CLASSIFICATION - gpt-4o-mini
 *   Cheap, quick. Good enough for short factor lists.
 *
 * STANDARD_REASONING - gpt-4o
 *   Default for all three analysis tiers.
 */

export const LLM_MODELS = {
  FAST_CLASSIFICATION: "gpt-4o-mini",
  STANDARD_REASONING: "gpt-4o",
  LEGACY_ANALYSIS: "gpt-4",
} as const;

/**
 * Gemini models, usable for tier analysis when GEMINI_API_KEY is set.
 */
export const GEMINI_MODELS = {
  FLASH: "gemini-2.5-flash",
  PRO: "gemini-2.5-pro",
} as const;

/**
 * Claude models, usable for tier analysis when ANTHROPIC_API_KEY is set.
 */
export const CLAUDE_MODELS = {
  SONNET: "claude-sonnet-4-5",
} as const;

/**
 * Embedding models. Only OpenAI embeddings are wired; retrieval needs one
 * vector space for query and chunks.
 */
export const EMBEDDING_MODELS = {
  SMALL: "text-embedding-3-small",
  ADA: "text-embedding-ada-002",
} as const;

/**
 * Vector width per embedding model. The offline substitute uses the same
 * width as the default model so the two are interchangeable.
 */
export const EMBEDDING_DIMENSIONS: Record<string, number> = {
  [EMBEDDING_MODELS.SMALL]: 1536,
  [EMBEDDING_MODELS.ADA]: 1536,
};

/**
 * Specific model assignments by task type.
 */
export const MODEL_ASSIGNMENTS = {
  EARNINGS_TIER_ANALYSIS: LLM_MODELS.STANDARD_REASONING,
  TRANSCRIPT_EMBEDDING: EMBEDDING_MODELS.SMALL,
} as const;

/**
 * Output token ceilings by model; a configured MAX_TOKENS above the ceiling
 * is clamped.
 */
export const TOKEN_LIMITS: Record<string, number> = {
  [LLM_MODELS.FAST_CLASSIFICATION]: 4000,
  [LLM_MODELS.STANDARD_REASONING]: 4000,
  [LLM_MODELS.LEGACY_ANALYSIS]: 2000,
  [GEMINI_MODELS.FLASH]: 8000,
  [GEMINI_MODELS.PRO]: 8000,
  [CLAUDE_MODELS.SONNET]: 8000,
};

export function resolveMaxTokens(model: string, requested: number): number {
  const limit = TOKEN_LIMITS[model];
  return limit === undefined ? requested : Math.min(requested, limit);
}
