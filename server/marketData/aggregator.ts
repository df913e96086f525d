/**
 * Market data aggregation.
 *
 * Queries every configured provider for a ticker and merges the results
 * under the provider's name. A failing provider is logged and left out; it
 * never fails the analysis.
 */

import { logError } from "../utils/errorHandler";
import type { ComprehensiveMarketData, MarketDataAggregator, MarketDataProvider } from "./types";

export class ProviderMarketDataAggregator implements MarketDataAggregator {
  constructor(private readonly providers: readonly MarketDataProvider[]) {}

  async getComprehensiveMarketData(ticker: string, signal?: AbortSignal): Promise<ComprehensiveMarketData> {
    const normalizedTicker = ticker.trim().toUpperCase();
    const result: ComprehensiveMarketData = { ticker: normalizedTicker, sources: [], data: {} };

    const settled = await Promise.allSettled(
      this.providers.map(provider => provider.fetch(normalizedTicker, signal)),
    );

    settled.forEach((outcome, i) => {
      const provider = this.providers[i];
      if (outcome.status === "fulfilled") {
        if (Object.keys(outcome.value).length === 0) return;
        result.data[provider.name] = outcome.value;
        result.sources.push(provider.name);
      } else {
        logError(`MarketData ${provider.name}`, outcome.reason);
      }
    });

    return result;
  }
}
