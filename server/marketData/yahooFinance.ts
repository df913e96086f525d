/**
 * Yahoo Finance provider.
 *
 * One quoteSummary call (profile, valuation, earnings, financial data,
 * analyst trend) and one daily chart over the last year. Each half is
 * optional: if one fails it is logged and the other is still returned.
 */

import yahooFinance from "yahoo-finance2";
import { z } from "zod";
import { ExternalServiceError, getErrorMessage, logError } from "../utils/errorHandler";
import type { MarketDataProvider } from "./types";

const ONE_YEAR_MS = 365 * 24 * 60 * 60 * 1000;

/** Trading-day offsets for the 1m / 3m price change lookbacks. */
const LOOKBACK_1M = 22;
const LOOKBACK_3M = 66;
const TRAILING_WINDOW = 30;
const RECENT_QUARTERS = 4;

/**
 * The two yahoo-finance2 calls the provider makes. Results are validated
 * below, so the client only has to return something.
 */
export interface YahooFinanceClient {
  quoteSummary(ticker: string): Promise<unknown>;
  chart(ticker: string, period1: Date): Promise<unknown>;
}

export function createYahooFinanceClient(): YahooFinanceClient {
  return {
    quoteSummary: ticker =>
      yahooFinance.quoteSummary(ticker, {
        modules: [
          "price",
          "summaryProfile",
          "summaryDetail",
          "financialData",
          "earnings",
          "calendarEvents",
          "recommendationTrend",
        ],
      }),
    chart: (ticker, period1) => yahooFinance.chart(ticker, { period1, interval: "1d" }),
  };
}

const num = z.number().nullish();

const quoteSummarySchema = z.object({
  price: z.object({ longName: z.string().nullish(), marketCap: num, regularMarketPrice: num }).optional(),
  summaryProfile: z.object({ sector: z.string().nullish(), industry: z.string().nullish() }).optional(),
  summaryDetail: z.object({ trailingPE: num, dividendYield: num, beta: num }).optional(),
  financialData: z
    .object({
      currentPrice: num,
      totalRevenue: num,
      grossMargins: num,
      totalDebt: num,
      revenueGrowth: num,
      earningsGrowth: num,
      targetMeanPrice: num,
      numberOfAnalystOpinions: num,
      recommendationKey: z.string().nullish(),
    })
    .optional(),
  earnings: z
    .object({
      earningsChart: z
        .object({
          quarterly: z.array(z.object({ date: z.string(), actual: num, estimate: num })).default([]),
        })
        .optional(),
    })
    .optional(),
  calendarEvents: z
    .object({
      earnings: z.object({ earningsDate: z.array(z.coerce.date()).default([]) }).optional(),
    })
    .optional(),
  recommendationTrend: z
    .object({
      trend: z
        .array(
          z.object({
            period: z.string(),
            strongBuy: z.number(),
            buy: z.number(),
            hold: z.number(),
            sell: z.number(),
            strongSell: z.number(),
          }),
        )
        .default([]),
    })
    .optional(),
});

type QuoteSummary = z.infer<typeof quoteSummarySchema>;

const chartSchema = z.object({
  quotes: z.array(z.object({ high: num, low: num, close: num, volume: num })),
});

export type PriceBar = {
  high: number;
  low: number;
  close: number;
  volume: number;
};

type Section = Record<string, unknown>;

function percentChange(current: number, previous: number): number {
  return ((current - previous) / previous) * 100;
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation; null below two values. */
function sampleStdDev(values: number[]): number | null {
  if (values.length < 2) return null;
  const m = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Price-change, volume and volatility figures over daily bars, oldest first.
 */
export function summarizePriceHistory(bars: PriceBar[]): Section {
  if (bars.length === 0) return {};

  const closes = bars.map(b => b.close);
  const n = closes.length;
  const current = closes[n - 1];
  const oneMonthAgo = n >= LOOKBACK_1M ? closes[n - LOOKBACK_1M] : closes[0];
  const threeMonthsAgo = n >= LOOKBACK_3M ? closes[n - LOOKBACK_3M] : closes[0];

  const trailingCloses = closes.slice(-TRAILING_WINDOW);
  const dailyReturns = trailingCloses.slice(1).map((close, i) => (close - trailingCloses[i]) / trailingCloses[i]);
  const volatility = sampleStdDev(dailyReturns);

  return {
    current_price: current,
    price_changes: {
      "1m": percentChange(current, oneMonthAgo),
      "3m": percentChange(current, threeMonthsAgo),
      "1y": percentChange(current, closes[0]),
    },
    volume_avg_30d: mean(bars.slice(-TRAILING_WINDOW).map(b => b.volume)),
    volatility_30d: volatility === null ? null : volatility * 100,
    high_52w: Math.max(...bars.map(b => b.high)),
    low_52w: Math.min(...bars.map(b => b.low)),
    data_points: n,
  };
}

function basicInfo(summary: QuoteSummary): Section {
  const { price, summaryProfile, summaryDetail, financialData } = summary;
  if (!price && !summaryProfile && !summaryDetail) return {};
  return {
    company_name: price?.longName ?? null,
    sector: summaryProfile?.sector ?? null,
    industry: summaryProfile?.industry ?? null,
    market_cap: price?.marketCap ?? null,
    current_price: financialData?.currentPrice ?? price?.regularMarketPrice ?? null,
    pe_ratio: summaryDetail?.trailingPE ?? null,
    dividend_yield: summaryDetail?.dividendYield ?? null,
    beta: summaryDetail?.beta ?? null,
  };
}

function earningsData(summary: QuoteSummary): Section {
  const quarterly = summary.earnings?.earningsChart?.quarterly ?? [];
  const nextDate = summary.calendarEvents?.earnings?.earningsDate[0];
  if (quarterly.length === 0 && !nextDate) return {};

  const recent = quarterly.slice(-RECENT_QUARTERS);
  const section: Section = {
    recent_earnings: recent.map(q => ({ quarter: q.date, actual: q.actual ?? null, estimate: q.estimate ?? null })),
    next_earnings_date: nextDate ? nextDate.toISOString() : null,
  };

  const latest = recent.at(-1)?.actual;
  const previous = recent.at(-2)?.actual;
  if (typeof latest === "number" && typeof previous === "number") {
    section.earnings_growth = {
      quarter_over_quarter: previous === 0 ? 0 : ((latest - previous) / Math.abs(previous)) * 100,
    };
  }
  return section;
}

function financials(summary: QuoteSummary): Section {
  const data = summary.financialData;
  if (!data) return {};
  const metrics: Section = {};
  if (typeof data.totalRevenue === "number") metrics.revenue = data.totalRevenue;
  if (typeof data.grossMargins === "number") metrics.gross_margin = data.grossMargins * 100;
  if (typeof data.totalDebt === "number") metrics.total_debt = data.totalDebt;
  if (typeof data.revenueGrowth === "number") metrics.revenue_growth = data.revenueGrowth * 100;
  if (typeof data.earningsGrowth === "number") metrics.earnings_growth = data.earningsGrowth * 100;
  return Object.keys(metrics).length === 0 ? {} : { key_metrics: metrics };
}

function analystRecommendations(summary: QuoteSummary): Section {
  const trend = summary.recommendationTrend?.trend ?? [];
  const current = trend.find(t => t.period === "0m") ?? trend[0];
  if (!current) return {};

  const counts = {
    strong_buy: current.strongBuy,
    buy: current.buy,
    hold: current.hold,
    sell: current.sell,
    strong_sell: current.strongSell,
  };
  const counted = Object.values(counts).reduce((sum, c) => sum + c, 0);

  return {
    consensus: {
      recommendation: summary.financialData?.recommendationKey ?? null,
      recommendation_counts: counts,
      average_price_target: summary.financialData?.targetMeanPrice ?? null,
      total_analysts: summary.financialData?.numberOfAnalystOpinions ?? counted,
    },
  };
}

export class YahooFinanceProvider implements MarketDataProvider {
  readonly name = "yahoo_finance";

  constructor(
    private readonly client: YahooFinanceClient = createYahooFinanceClient(),
    private readonly now: () => number = Date.now,
  ) {}

  async fetch(ticker: string, signal?: AbortSignal): Promise<Record<string, unknown>> {
    signal?.throwIfAborted();

    const [summary, history] = await Promise.allSettled([
      this.loadSummary(ticker),
      this.loadHistory(ticker),
    ]);
    signal?.throwIfAborted();

    if (summary.status === "rejected" && history.status === "rejected") {
      throw new ExternalServiceError("Yahoo Finance", getErrorMessage(summary.reason));
    }

    const sections: Record<string, Section> = {};
    if (summary.status === "fulfilled") {
      Object.assign(sections, summary.value);
    } else {
      logError(`MarketData yahoo_finance ${ticker} summary`, summary.reason);
    }
    if (history.status === "fulfilled") {
      sections.historical_data = history.value;
    } else {
      logError(`MarketData yahoo_finance ${ticker} history`, history.reason);
    }

    const result: Record<string, unknown> = {};
    for (const [key, section] of Object.entries(sections)) {
      if (Object.keys(section).length > 0) result[key] = section;
    }
    return result;
  }

  private async loadSummary(ticker: string): Promise<Record<string, Section>> {
    const parsed = quoteSummarySchema.safeParse(await this.client.quoteSummary(ticker));
    if (!parsed.success) {
      throw new ExternalServiceError("Yahoo Finance", "unexpected quoteSummary payload");
    }
    return {
      basic_info: basicInfo(parsed.data),
      earnings_data: earningsData(parsed.data),
      financials: financials(parsed.data),
      analyst_recommendations: analystRecommendations(parsed.data),
    };
  }

  private async loadHistory(ticker: string): Promise<Section> {
    const parsed = chartSchema.safeParse(await this.client.chart(ticker, new Date(this.now() - ONE_YEAR_MS)));
    if (!parsed.success) {
      throw new ExternalServiceError("Yahoo Finance", "unexpected chart payload");
    }
    const bars: PriceBar[] = [];
    for (const q of parsed.data.quotes) {
      if (typeof q.close === "number" && typeof q.high === "number" && typeof q.low === "number") {
        bars.push({ high: q.high, low: q.low, close: q.close, volume: q.volume ?? 0 });
      }
    }
    return summarizePriceHistory(bars);
  }
}
