/**
 * Application Constants
 *
 * Centralized values used across ingestion, retrieval and tier analysis.
 */

/**
 * Token-window defaults for the chunker. Overridable through settings.
 */
export const CHUNKING_DEFAULTS = {
  MAX_CHUNK_SIZE: 1200,
  MIN_CHUNK_SIZE: 500,
  CHUNK_OVERLAP: 100,
} as const;

/**
 * Sentence-terminal characters; their token ids are the chunker's snap points.
 */
export const SENTENCE_TERMINALS = [".", "!", "?"] as const;

export const RETRIEVAL_DEFAULTS = {
  TOP_K: 5,
} as const;

/**
 * Context assembly limits (chunk counts, not tokens).
 */
export const CONTEXT_LIMITS = {
  FINANCIAL_METRICS_CHUNKS: 3,
  GENERAL_CHUNKS: 5,
} as const;

/**
 * Substrings that mark a chunk as relevant to the financial_metrics focus.
 */
export const FINANCIAL_KEYWORDS = ["revenue", "earnings", "eps", "margin", "guidance", "growth"] as const;

export const SENTIMENT_KEYWORDS = {
  POSITIVE: ["beat", "exceed", "strong", "positive", "growth"],
  NEGATIVE: ["miss", "decline", "weak", "negative", "fall"],
} as const;

/**
 * Tier A confidence is not read from the model output; every bullet gets this.
 */
export const TIER_A_DEFAULT_CONFIDENCE = 75;

export const LLM_DEFAULTS = {
  TEMPERATURE: 0.1,
  MAX_TOKENS: 2000,
} as const;

/**
 * Offline embedding substitute: a constant vector.
 */
export const OFFLINE_EMBEDDING = {
  VALUE: 0.1,
  DIMENSIONS: 1536,
} as const;

/**
 * Timeout configuration
 */
export const TIMEOUT_CONSTANTS = {
  /**
   * Per-attempt timeout for embedding and completion calls (milliseconds).
   */
  CAPABILITY_CALL_TIMEOUT_MS: 60000, // 1 minute

  /**
   * Retries after the first failed attempt.
   */
  CAPABILITY_MAX_RETRIES: 1,

  /**
   * Market data provider fetch timeout (milliseconds).
   */
  MARKET_DATA_FETCH_MS: 10000, // 10 seconds
} as const;

export const UPLOAD_LIMITS = {
  MAX_FILE_SIZE_BYTES: 50 * 1024 * 1024,
  ALLOWED_EXTENSIONS: [".txt"],
} as const;
