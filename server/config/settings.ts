/**
 * Settings
 *
 * Parses the process environment once, at startup, into an immutable
 * Settings object. Components receive the slice they need through their
 * constructors; nothing below the composition root reads process.env.
 */

import { z } from "zod";
import { CHUNKING_DEFAULTS, LLM_DEFAULTS, RETRIEVAL_DEFAULTS, TIMEOUT_CONSTANTS, UPLOAD_LIMITS } from "./constants";
import { MODEL_ASSIGNMENTS } from "./models";
import { ValidationError, getErrorMessage } from "../utils/errorHandler";
import type { ChunkingOptions } from "../ingestion/types";

const optionalString = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.string().optional(),
);

const optionalUrl = z.preprocess(
  (value) => (value === "" ? undefined : value),
  z.string().url().optional(),
);

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z
  .object({
    // Server
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    PORT: z.coerce.number().int().positive().default(5000),
    MAX_FILE_SIZE: z.coerce.number().int().positive().default(UPLOAD_LIMITS.MAX_FILE_SIZE_BYTES),

    // Capabilities
    OPENAI_API_KEY: optionalString,
    GEMINI_API_KEY: optionalString,
    ANTHROPIC_API_KEY: optionalString,
    LLM_MODEL: z.string().min(1).default(MODEL_ASSIGNMENTS.EARNINGS_TIER_ANALYSIS),
    EMBEDDING_MODEL: z.string().min(1).default(MODEL_ASSIGNMENTS.TRANSCRIPT_EMBEDDING),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(LLM_DEFAULTS.TEMPERATURE),
    MAX_TOKENS: z.coerce.number().int().positive().default(LLM_DEFAULTS.MAX_TOKENS),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(TIMEOUT_CONSTANTS.CAPABILITY_CALL_TIMEOUT_MS),
    LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(TIMEOUT_CONSTANTS.CAPABILITY_MAX_RETRIES),

    // Chunking & retrieval
    MAX_CHUNK_SIZE: z.coerce.number().int().positive().default(CHUNKING_DEFAULTS.MAX_CHUNK_SIZE),
    MIN_CHUNK_SIZE: z.coerce.number().int().min(0).default(CHUNKING_DEFAULTS.MIN_CHUNK_SIZE),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(CHUNKING_DEFAULTS.CHUNK_OVERLAP),
    TOP_K_RETRIEVAL: z.coerce.number().int().positive().default(RETRIEVAL_DEFAULTS.TOP_K),

    // Collaborators
    DATABASE_URL: optionalUrl,
    ALPHA_VANTAGE_API_KEY: optionalString,
    YAHOO_FINANCE_ENABLED: booleanFlag.default("true"),
  })
  .superRefine((env, ctx) => {
    if (env.MIN_CHUNK_SIZE >= env.MAX_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MIN_CHUNK_SIZE"],
        message: "MIN_CHUNK_SIZE must be smaller than MAX_CHUNK_SIZE",
      });
    }
    if (env.CHUNK_OVERLAP >= env.MAX_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than MAX_CHUNK_SIZE",
      });
    }
  });

export type Environment = z.infer<typeof envSchema>;

export type LLMSettings = {
  model: string;
  embeddingModel: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
};

export type Settings = {
  nodeEnv: Environment["NODE_ENV"];
  port: number;
  maxFileSize: number;
  apiKeys: {
    openai?: string;
    gemini?: string;
    anthropic?: string;
    alphaVantage?: string;
  };
  llm: LLMSettings;
  chunking: ChunkingOptions;
  topK: number;
  yahooFinanceEnabled: boolean;
  databaseUrl?: string;
};

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Readonly<Settings> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(`Invalid configuration: ${getErrorMessage(parsed.error)}`);
  }
  const e = parsed.data;

  return Object.freeze({
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    maxFileSize: e.MAX_FILE_SIZE,
    apiKeys: {
      openai: e.OPENAI_API_KEY,
      gemini: e.GEMINI_API_KEY,
      anthropic: e.ANTHROPIC_API_KEY,
      alphaVantage: e.ALPHA_VANTAGE_API_KEY,
    },
    llm: {
      model: e.LLM_MODEL,
      embeddingModel: e.EMBEDDING_MODEL,
      temperature: e.LLM_TEMPERATURE,
      maxTokens: e.MAX_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxRetries: e.LLM_MAX_RETRIES,
    },
    chunking: {
      maxChunkSize: e.MAX_CHUNK_SIZE,
      minChunkSize: e.MIN_CHUNK_SIZE,
      chunkOverlap: e.CHUNK_OVERLAP,
    },
    topK: e.TOP_K_RETRIEVAL,
    yahooFinanceEnabled: e.YAHOO_FINANCE_ENABLED,
    databaseUrl: e.DATABASE_URL,
  });
}

/**
 * Settings safe to expose over the config endpoint (no credentials).
 */
export function publicSettings(settings: Settings) {
  return {
    llmModel: settings.llm.model,
    embeddingModel: settings.llm.embeddingModel,
    temperature: settings.llm.temperature,
    maxTokens: settings.llm.maxTokens,
    chunking: settings.chunking,
    topK: settings.topK,
    persistence: settings.databaseUrl ? "postgres" : "memory",
  };
}
