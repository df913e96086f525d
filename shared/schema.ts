import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, jsonb, index } from "drizzle-orm/pg-core";
import { z } from "zod";
import type { AnalysisResult, AnalysisStatus } from "../server/rag/types";

export type AnalysisMetadata = {
  totalTokens: number;
  numChunks: number;
  numSpeakers: number;
  processingTimeMs: number;
};

export const earningsCalls = pgTable("earnings_calls", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  ticker: text("ticker"),
  period: text("period"),
  status: text("status").$type<AnalysisStatus>().notNull(),
  analysis: jsonb("analysis").$type<AnalysisResult>().notNull(),
  metadata: jsonb("metadata").$type<AnalysisMetadata>().notNull(),
  marketData: jsonb("market_data").$type<Record<string, unknown>>(),
  transcriptRaw: text("transcript_raw").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  index("idx_earnings_calls_ticker").on(table.ticker),
]);

export type EarningsCallRecord = typeof earningsCalls.$inferSelect;
export type InsertEarningsCall = typeof earningsCalls.$inferInsert;

export type EarningsCallSummary = Pick<EarningsCallRecord, "id" | "ticker" | "period" | "status" | "createdAt">;

const optionalTrimmed = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().trim().max(64).optional(),
);

/**
 * Ingest form fields. The transcript itself arrives either as an uploaded
 * file or as the `text` field.
 */
export const ingestRequestSchema = z.object({
  text: z.string().optional(),
  ticker: optionalTrimmed.refine(
    (value) => value === undefined || /^[A-Za-z.\-]{1,10}$/.test(value),
    { message: "Ticker must be 1-10 letters" },
  ),
  period: optionalTrimmed,
});

export const searchTranscriptSchema = z.object({
  query: z.string().trim().min(1, "Query is required"),
  topK: z.coerce.number().int().min(1).max(50).optional(),
});
