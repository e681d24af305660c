/**
 * Business logic: daily closes for one ticker over a trailing window.
 */
import { loadComparisonConfig } from "@src/comparison/config";
import type { PricePoint } from "@src/comparison/domain/raw_quote";
import type { MarketDataProvider } from "@src/comparison/infrastructure/contracts";
import { YahooFinanceProvider } from "@src/comparison/infrastructure/yahoo_provider";
import { getLogger } from "@src/util/logger";

const MAX_WINDOW_DAYS = 3650;

export interface GetPriceHistoryInput {
  ticker: string;
  windowDays: number;
}

export interface GetPriceHistoryDependencies {
  provider?: MarketDataProvider;
  now?: () => Date;
}

/**
 * Returns null when the provider fails or has no points for the window.
 */
export async function fetchPriceHistory(
  input: GetPriceHistoryInput,
  deps: GetPriceHistoryDependencies = {}
): Promise<PricePoint[] | null> {
  const logger = getLogger("market/get_price_history");
  const ticker = String(input.ticker || "")
    .trim()
    .toUpperCase();
  if (!ticker) return null;

  let provider: MarketDataProvider;
  try {
    provider =
      deps.provider ??
      new YahooFinanceProvider({ timeoutMs: loadComparisonConfig().timeoutMs });
  } catch (err) {
    logger.error({ err }, "price history config invalid");
    return null;
  }
  const days = clampDays(input.windowDays);
  const now = deps.now ?? (() => new Date());
  const { from, to } = resolveDateRange(days, now());

  let points: PricePoint[];
  try {
    points = await provider.getPriceHistory({ ticker, from, to });
  } catch (err) {
    logger.warn({ ticker, days, err }, "price history fetch failed");
    return null;
  }

  logger.debug(
    { ticker, days, count: points.length },
    "price history business result"
  );
  return points.length > 0 ? points : null;
}

function clampDays(days: number): number {
  if (!Number.isFinite(days)) return 1;
  return Math.min(MAX_WINDOW_DAYS, Math.max(1, Math.floor(days)));
}

export function resolveDateRange(
  days: number,
  end: Date
): { from: Date; to: Date } {
  const start = new Date(end);
  start.setUTCDate(end.getUTCDate() - Math.max(0, days - 1));
  return { from: start, to: end };
}
