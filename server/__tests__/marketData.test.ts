import { describe, it, expect, vi, afterEach } from "vitest";
import { ProviderMarketDataAggregator } from "../marketData/aggregator";
import { AlphaVantageProvider, type FetchLike } from "../marketData/alphaVantage";
import type { MarketDataProvider } from "../marketData/types";
import { YahooFinanceProvider, summarizePriceHistory, type YahooFinanceClient } from "../marketData/yahooFinance";
import { ExternalServiceError } from "../utils/errorHandler";

function provider(name: string, fetch: MarketDataProvider["fetch"]): MarketDataProvider {
  return { name, fetch };
}

describe("ProviderMarketDataAggregator", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("merges provider results under their names", async () => {
    const aggregator = new ProviderMarketDataAggregator([
      provider("quotes", async () => ({ price: 190.5 })),
      provider("fundamentals", async () => ({ pe: 28 })),
    ]);

    expect(await aggregator.getComprehensiveMarketData(" aapl ")).toEqual({
      ticker: "AAPL",
      sources: ["quotes", "fundamentals"],
      data: { quotes: { price: 190.5 }, fundamentals: { pe: 28 } },
    });
  });

  it("logs and skips a failing provider", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const aggregator = new ProviderMarketDataAggregator([
      provider("broken", async () => {
        throw new Error("rate limited");
      }),
      provider("quotes", async () => ({ price: 1 })),
    ]);

    const result = await aggregator.getComprehensiveMarketData("MSFT");

    expect(result.sources).toEqual(["quotes"]);
    expect(result.data).toEqual({ quotes: { price: 1 } });
    expect(errorSpy).toHaveBeenCalledWith("[MarketData broken] rate limited", expect.any(String));
  });

  it("leaves out providers that return nothing", async () => {
    const aggregator = new ProviderMarketDataAggregator([provider("empty", async () => ({}))]);
    expect(await aggregator.getComprehensiveMarketData("IBM")).toEqual({ ticker: "IBM", sources: [], data: {} });
  });

  it("returns an empty result without providers", async () => {
    const aggregator = new ProviderMarketDataAggregator([]);
    expect(await aggregator.getComprehensiveMarketData("IBM")).toEqual({ ticker: "IBM", sources: [], data: {} });
  });
});

describe("AlphaVantageProvider", () => {
  function fakeFetch(status: number, payload: unknown) {
    return vi.fn<FetchLike>(async () => ({
      ok: status >= 200 && status < 300,
      status,
      json: async () => payload,
    }));
  }

  it("parses a GLOBAL_QUOTE payload", async () => {
    const fetchImpl = fakeFetch(200, {
      "Global Quote": {
        "01. symbol": "IBM",
        "05. price": "190.50",
        "06. volume": "1000",
        "08. previous close": "188.00",
        "09. change": "2.50",
        "10. change percent": "1.3298%",
      },
    });
    const av = new AlphaVantageProvider("test-secret", fetchImpl);

    expect(await av.fetch("IBM")).toEqual({
      price: 190.5,
      volume: 1000,
      previous_close: 188,
      change: 2.5,
      change_percent: 1.3298,
    });
    const [url] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://www.alphavantage.co/query?function=GLOBAL_QUOTE&symbol=IBM&apikey=test-secret");
  });

  it("returns {} when the quote is missing or empty", async () => {
    expect(await new AlphaVantageProvider("test-secret", fakeFetch(200, {})).fetch("ZZZZ")).toEqual({});
    expect(await new AlphaVantageProvider("test-secret", fakeFetch(200, { "Global Quote": {} })).fetch("ZZZZ"))
      .toEqual({});
  });

  it("raises ExternalServiceError on HTTP failure", async () => {
    const av = new AlphaVantageProvider("test-secret", fakeFetch(500, {}));
    await expect(av.fetch("IBM")).rejects.toThrow(ExternalServiceError);
    await expect(av.fetch("IBM")).rejects.toThrow("Alpha Vantage error: HTTP 500");
  });
});

describe("YahooFinanceProvider", () => {
  const NOW = Date.parse("2025-06-01T00:00:00.000Z");

  const summaryPayload = {
    price: { longName: "Example Corp", marketCap: 1000, regularMarketPrice: 12 },
    summaryProfile: { sector: "Technology", industry: "Software" },
    summaryDetail: { trailingPE: 20, dividendYield: 0.01, beta: 1.2 },
    financialData: {
      currentPrice: 12.5,
      totalRevenue: 500,
      grossMargins: 0.5,
      totalDebt: 100,
      revenueGrowth: 0.25,
      earningsGrowth: 0.125,
      targetMeanPrice: 15,
      numberOfAnalystOpinions: 12,
      recommendationKey: "buy",
    },
    earnings: {
      earningsChart: {
        quarterly: [
          { date: "1Q2025", actual: 1, estimate: 0.9 },
          { date: "2Q2025", actual: 1.5, estimate: 1.25 },
        ],
      },
    },
    calendarEvents: { earnings: { earningsDate: [new Date("2025-07-30T00:00:00.000Z")] } },
    recommendationTrend: {
      trend: [
        { period: "0m", strongBuy: 2, buy: 3, hold: 4, sell: 1, strongSell: 0 },
        { period: "-1m", strongBuy: 1, buy: 1, hold: 1, sell: 1, strongSell: 1 },
      ],
    },
  };

  const chartPayload = {
    quotes: [
      { high: 11, low: 9, close: 8, volume: 100 },
      { high: 12, low: 10, close: 10, volume: 200 },
      { high: null, low: null, close: null, volume: null },
      { high: 13, low: 8, close: 12, volume: 300 },
    ],
  };

  function stubClient(overrides: Partial<YahooFinanceClient> = {}) {
    return {
      quoteSummary: vi.fn<YahooFinanceClient["quoteSummary"]>(async () => summaryPayload),
      chart: vi.fn<YahooFinanceClient["chart"]>(async () => chartPayload),
      ...overrides,
    };
  }

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps the quote summary and price history into sections", async () => {
    const client = stubClient();
    const result = await new YahooFinanceProvider(client, () => NOW).fetch("EXMP");

    expect(result.basic_info).toEqual({
      company_name: "Example Corp",
      sector: "Technology",
      industry: "Software",
      market_cap: 1000,
      current_price: 12.5,
      pe_ratio: 20,
      dividend_yield: 0.01,
      beta: 1.2,
    });
    expect(result.earnings_data).toEqual({
      recent_earnings: [
        { quarter: "1Q2025", actual: 1, estimate: 0.9 },
        { quarter: "2Q2025", actual: 1.5, estimate: 1.25 },
      ],
      next_earnings_date: "2025-07-30T00:00:00.000Z",
      earnings_growth: { quarter_over_quarter: 50 },
    });
    expect(result.financials).toEqual({
      key_metrics: { revenue: 500, gross_margin: 50, total_debt: 100, revenue_growth: 25, earnings_growth: 12.5 },
    });
    expect(result.analyst_recommendations).toEqual({
      consensus: {
        recommendation: "buy",
        recommendation_counts: { strong_buy: 2, buy: 3, hold: 4, sell: 1, strong_sell: 0 },
        average_price_target: 15,
        total_analysts: 12,
      },
    });
    expect(result.historical_data).toEqual({
      current_price: 12,
      price_changes: { "1m": 50, "3m": 50, "1y": 50 },
      volume_avg_30d: 200,
      volatility_30d: expect.closeTo(3.5355, 4),
      high_52w: 13,
      low_52w: 8,
      data_points: 3,
    });

    expect(client.quoteSummary).toHaveBeenCalledWith("EXMP");
    expect(client.chart).toHaveBeenCalledWith("EXMP", new Date("2024-06-01T00:00:00.000Z"));
  });

  it("keeps the price history when the summary call fails", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const client = stubClient({
      quoteSummary: async () => {
        throw new Error("quote not found");
      },
    });

    const result = await new YahooFinanceProvider(client, () => NOW).fetch("EXMP");

    expect(Object.keys(result)).toEqual(["historical_data"]);
    expect(errorSpy).toHaveBeenCalledWith("[MarketData yahoo_finance EXMP summary] quote not found", expect.any(String));
  });

  it("drops sections the summary has no data for", async () => {
    const client = stubClient({ quoteSummary: async () => ({ price: { longName: "Example Corp" } }) });

    const result = await new YahooFinanceProvider(client, () => NOW).fetch("EXMP");

    expect(Object.keys(result)).toEqual(["basic_info", "historical_data"]);
  });

  it("rejects a malformed chart payload but keeps the summary", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const client = stubClient({ chart: async () => ({ quotes: "none" }) });

    const result = await new YahooFinanceProvider(client, () => NOW).fetch("EXMP");

    expect(result.historical_data).toBeUndefined();
    expect(result.basic_info).toEqual(expect.objectContaining({ company_name: "Example Corp" }));
  });

  it("raises ExternalServiceError when both calls fail", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const failing = async () => {
      throw new Error("network down");
    };
    const provider = new YahooFinanceProvider(stubClient({ quoteSummary: failing, chart: failing }), () => NOW);

    await expect(provider.fetch("EXMP")).rejects.toThrow("Yahoo Finance error: network down");
  });

  it("does not call Yahoo once the request is cancelled", async () => {
    const client = stubClient();
    const controller = new AbortController();
    controller.abort();

    await expect(new YahooFinanceProvider(client, () => NOW).fetch("EXMP", controller.signal)).rejects.toThrow();
    expect(client.quoteSummary).not.toHaveBeenCalled();
  });
});

describe("summarizePriceHistory", () => {
  it("uses the 22 and 66 trading-day lookbacks once there is enough history", () => {
    const bars = Array.from({ length: 70 }, (_, i) => ({ high: i + 2, low: i, close: i + 1, volume: 1000 }));

    const summary = summarizePriceHistory(bars);

    expect(summary.current_price).toBe(70);
    expect(summary.price_changes).toEqual({ "1m": expect.closeTo(42.857, 3), "3m": 1300, "1y": 6900 });
    expect(summary.volume_avg_30d).toBe(1000);
    expect(summary.high_52w).toBe(71);
    expect(summary.low_52w).toBe(0);
    expect(summary.data_points).toBe(70);
  });

  it("reports no volatility for a single bar", () => {
    expect(summarizePriceHistory([{ high: 2, low: 1, close: 1.5, volume: 10 }]).volatility_30d).toBeNull();
  });

  it("returns {} without bars", () => {
    expect(summarizePriceHistory([])).toEqual({});
  });
});
