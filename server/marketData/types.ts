/**
 * Market data collaborator shapes.
 */

export interface MarketDataProvider {
  readonly name: string;
  fetch(ticker: string, signal?: AbortSignal): Promise<Record<string, unknown>>;
}

export type ComprehensiveMarketData = {
  ticker: string;
  sources: string[];
  data: Record<string, Record<string, unknown>>;
};

export interface MarketDataAggregator {
  getComprehensiveMarketData(ticker: string, signal?: AbortSignal): Promise<ComprehensiveMarketData>;
}
