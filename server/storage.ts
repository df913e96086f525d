import {
  type EarningsCallRecord,
  type EarningsCallSummary,
  type InsertEarningsCall,
  earningsCalls as earningsCallsTable,
} from "@shared/schema";
import { randomUUID } from "crypto";
import { drizzle } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";
import { desc, eq } from "drizzle-orm";

export interface IStorage {
  saveAnalysis(record: InsertEarningsCall): Promise<EarningsCallRecord>;
  getAnalysis(id: string): Promise<EarningsCallRecord | undefined>;
  listAnalysesByTicker(ticker: string): Promise<EarningsCallSummary[]>;
}

function toSummary(record: EarningsCallRecord): EarningsCallSummary {
  return {
    id: record.id,
    ticker: record.ticker,
    period: record.period,
    status: record.status,
    createdAt: record.createdAt,
  };
}

export class MemStorage implements IStorage {
  private earningsCalls: Map<string, EarningsCallRecord>;

  constructor() {
    this.earningsCalls = new Map();
  }

  /** Saving under an existing id replaces the earlier analysis. */
  async saveAnalysis(insert: InsertEarningsCall): Promise<EarningsCallRecord> {
    const id = insert.id ?? randomUUID();
    const record: EarningsCallRecord = {
      id,
      ticker: insert.ticker ?? null,
      period: insert.period ?? null,
      status: insert.status,
      analysis: insert.analysis,
      metadata: insert.metadata,
      marketData: insert.marketData ?? null,
      transcriptRaw: insert.transcriptRaw,
      createdAt: insert.createdAt ?? new Date(),
    };
    this.earningsCalls.set(id, record);
    return record;
  }

  async getAnalysis(id: string): Promise<EarningsCallRecord | undefined> {
    return this.earningsCalls.get(id);
  }

  async listAnalysesByTicker(ticker: string): Promise<EarningsCallSummary[]> {
    const normalized = ticker.toUpperCase();
    return Array.from(this.earningsCalls.values())
      .filter(r => r.ticker === normalized)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(toSummary);
  }
}

export class DbStorage implements IStorage {
  private db;

  constructor(databaseUrl: string) {
    const queryClient = neon(databaseUrl);
    this.db = drizzle(queryClient);
  }

  async saveAnalysis(insert: InsertEarningsCall): Promise<EarningsCallRecord> {
    const { id: _id, createdAt: _createdAt, ...updatable } = insert;
    const results = await this.db
      .insert(earningsCallsTable)
      .values(insert)
      .onConflictDoUpdate({
        target: earningsCallsTable.id,
        set: { ...updatable, createdAt: new Date() },
      })
      .returning();
    return results[0];
  }

  async getAnalysis(id: string): Promise<EarningsCallRecord | undefined> {
    const results = await this.db
      .select()
      .from(earningsCallsTable)
      .where(eq(earningsCallsTable.id, id))
      .limit(1);
    return results[0];
  }

  async listAnalysesByTicker(ticker: string): Promise<EarningsCallSummary[]> {
    return this.db
      .select({
        id: earningsCallsTable.id,
        ticker: earningsCallsTable.ticker,
        period: earningsCallsTable.period,
        status: earningsCallsTable.status,
        createdAt: earningsCallsTable.createdAt,
      })
      .from(earningsCallsTable)
      .where(eq(earningsCallsTable.ticker, ticker.toUpperCase()))
      .orderBy(desc(earningsCallsTable.createdAt));
  }
}

export function createStorage(databaseUrl: string | undefined): IStorage {
  if (databaseUrl) {
    console.log("[Storage] Using Postgres storage");
    return new DbStorage(databaseUrl);
  }
  console.log("[Storage] DATABASE_URL not set, using in-memory storage");
  return new MemStorage();
}
