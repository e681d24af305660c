export * from "./config";
export * from "./domain/raw_quote";
export * from "./domain/types";
export * from "./business/compare_tickers";
export * from "./business/delta";
export * from "./business/format_value";
export * from "./business/metrics";
export * from "./business/news_links";
export * from "./business/normalize_quote";
export * from "./business/performance";
export * from "./business/recommendation";
export * from "./infrastructure/contracts";
export * from "./infrastructure/errors";
export * from "./infrastructure/yahoo_provider";
export * from "./presentation/metric_cards";
export * from "./presentation/price_chart";
export * from "./presentation/render_text";
export * from "@src/market/classify_market";
export * from "@src/market/get_price_history";

import { loadComparisonConfig, type ComparisonConfig } from "./config";
import type { PricePoint } from "./domain/raw_quote";
import type { ComparisonReport } from "./domain/types";
import { compareTwoTickers } from "./business/compare_tickers";
import type { DeltaMode } from "./business/delta";
import type { MarketDataProvider } from "./infrastructure/contracts";
import { YahooFinanceProvider } from "./infrastructure/yahoo_provider";
import { fetchPriceHistory } from "@src/market/get_price_history";

export interface ComparisonEngine {
  compareTwoTickers(
    tickerA: string,
    tickerB: string
  ): Promise<ComparisonReport | null>;
  fetchPriceHistory(
    ticker: string,
    windowDays: number
  ): Promise<PricePoint[] | null>;
}

/**
 * The two presentation entry points bound to one provider and config.
 * Neither throws; "no result" is null.
 */
export function createComparisonEngine(
  deps: {
    provider?: MarketDataProvider;
    config?: ComparisonConfig;
    now?: () => Date;
    deltaMode?: DeltaMode;
  } = {}
): ComparisonEngine {
  const config = deps.config ?? loadComparisonConfig();
  const provider =
    deps.provider ?? new YahooFinanceProvider({ timeoutMs: config.timeoutMs });
  return {
    compareTwoTickers: (tickerA, tickerB) =>
      compareTwoTickers(
        { tickerA, tickerB },
        { provider, config, now: deps.now, deltaMode: deps.deltaMode }
      ),
    fetchPriceHistory: (ticker, windowDays) =>
      fetchPriceHistory({ ticker, windowDays }, { provider, now: deps.now }),
  };
}
