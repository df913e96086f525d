/**
 * Alpha Vantage quote provider (GLOBAL_QUOTE endpoint).
 */

import { z } from "zod";
import { TIMEOUT_CONSTANTS } from "../config/constants";
import { ExternalServiceError } from "../utils/errorHandler";
import type { MarketDataProvider } from "./types";

const ALPHA_VANTAGE_URL = "https://www.alphavantage.co/query";

const numeric = z.coerce.number();

const globalQuoteSchema = z.object({
  "Global Quote": z
    .object({
      "05. price": numeric,
      "06. volume": numeric,
      "08. previous close": numeric,
      "09. change": numeric,
      "10. change percent": z.string().transform(v => Number(v.replace("%", ""))),
    })
    .partial()
    .optional(),
});

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

export class AlphaVantageProvider implements MarketDataProvider {
  readonly name = "alpha_vantage";

  constructor(
    private readonly apiKey: string,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async fetch(ticker: string, signal?: AbortSignal): Promise<Record<string, unknown>> {
    const url = `${ALPHA_VANTAGE_URL}?function=GLOBAL_QUOTE&symbol=${encodeURIComponent(ticker)}&apikey=${encodeURIComponent(this.apiKey)}`;
    const timeout = AbortSignal.timeout(TIMEOUT_CONSTANTS.MARKET_DATA_FETCH_MS);

    const response = await this.fetchImpl(url, {
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });
    if (!response.ok) {
      throw new ExternalServiceError("Alpha Vantage", `HTTP ${response.status}`);
    }

    const parsed = globalQuoteSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError("Alpha Vantage", "unexpected GLOBAL_QUOTE payload");
    }

    // Unknown symbols come back as an empty "Global Quote" object.
    const quote = parsed.data["Global Quote"];
    if (!quote || quote["05. price"] === undefined) return {};

    return {
      price: quote["05. price"],
      volume: quote["06. volume"],
      previous_close: quote["08. previous close"],
      change: quote["09. change"],
      change_percent: quote["10. change percent"],
    };
  }
}
