import type { PricePoint, RawQuote } from "../domain/raw_quote";

/**
 * Market data source for the comparison engine. Implementations reject with
 * `MarketDataError` when a ticker cannot be served.
 */
export interface MarketDataProvider {
  getQuote(ticker: string): Promise<RawQuote>;
  getPriceHistory(params: {
    ticker: string;
    from: Date;
    to: Date;
  }): Promise<PricePoint[]>;
}
