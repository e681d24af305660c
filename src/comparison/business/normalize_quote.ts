/**
 * Business logic: coerce a provider quote into the fixed-shape record the
 * report is built from. Every metric is present, as a number or "N/A".
 */
import { DEFAULT_COMPARISON_CONFIG, type ComparisonConfig } from "../config";
import {
  RawQuoteSchema,
  type Horizon,
  type PricePoint,
  type RawQuote,
} from "../domain/raw_quote";
import {
  NOT_AVAILABLE,
  type MetricKey,
  type MetricValue,
  type NormalizedRecord,
} from "../domain/types";
import { classifyMarket } from "@src/market/classify_market";
import { fail, ok, type Result } from "@src/util/result";
import { formatValue, toMetricValue } from "./format_value";
import { METRIC_DEFINITIONS, mapMetrics } from "./metrics";
import { resolveNewsItems } from "./news_links";
import { calculatePerformance, performanceChange } from "./performance";
import { recommendationTier } from "./recommendation";

export function normalizeQuote(
  ticker: string,
  raw: unknown,
  config: ComparisonConfig = DEFAULT_COMPARISON_CONFIG
): Result<NormalizedRecord> {
  const parsed = RawQuoteSchema.safeParse(raw);
  if (!parsed.success) {
    return fail(`invalid quote for ${ticker}: ${parsed.error.message}`);
  }
  const quote = parsed.data;
  const history = resolveHistory(quote);

  const currentPrice = resolveCurrentPrice(quote, history);
  if (currentPrice === NOT_AVAILABLE) {
    return fail(`no current price for ${ticker}`);
  }

  const region = classifyMarket(ticker, config.domesticSuffixes);
  const companyName = resolveCompanyName(quote, ticker);
  const metrics = buildMetrics(quote, history, currentPrice);
  const recommendation = recommendationTier(quote.recommendationMean);

  const display = mapMetrics((key) => {
    const { kind } = METRIC_DEFINITIONS[key];
    return kind === "tier"
      ? recommendation
      : formatValue(metrics[key], {
          kind,
          region,
          currencySymbols: config.currencySymbols,
        });
  });

  return ok({
    ticker,
    companyName,
    region,
    currencySymbol: config.currencySymbols[region],
    sector: quote.sector?.trim() || NOT_AVAILABLE,
    industry: quote.industry?.trim() || NOT_AVAILABLE,
    employees: toMetricValue(quote.fullTimeEmployees),
    metrics,
    display,
    recommendation,
    performance: {
      "1y": calculatePerformance(history["1y"]),
      "1m": calculatePerformance(history["1m"]),
      "5d": calculatePerformance(history["5d"]),
    },
    news: resolveNewsItems(quote.news, { region, companyName }, config),
    history,
  });
}

function buildMetrics(
  quote: RawQuote,
  history: Record<Horizon, PricePoint[]>,
  currentPrice: number
): Record<MetricKey, MetricValue> {
  // Without a reported previous close the day is treated as flat
  const previousClose = toMetricValue(quote.previousClose ?? currentPrice);
  const dayChangeAbsolute =
    previousClose === NOT_AVAILABLE ? NOT_AVAILABLE : currentPrice - previousClose;
  const dayChangePercent =
    previousClose === NOT_AVAILABLE || previousClose === 0
      ? NOT_AVAILABLE
      : ((currentPrice - previousClose) / previousClose) * 100;

  return {
    currentPrice,
    previousClose,
    dayChangePercent,
    dayChangeAbsolute,
    marketCap: toMetricValue(quote.marketCap),
    peRatio: toMetricValue(quote.trailingPE),
    pegRatio: toMetricValue(quote.pegRatio),
    forwardPe: toMetricValue(quote.forwardPE),
    priceToBook: toMetricValue(quote.priceToBook),
    enterpriseValue: toMetricValue(quote.enterpriseValue),
    ebitda: toMetricValue(quote.ebitda),
    debtToEquity: toMetricValue(quote.debtToEquity),
    currentRatio: toMetricValue(quote.currentRatio),
    returnOnEquity: toMetricValue(quote.returnOnEquity),
    fiftyTwoWeekHigh: toMetricValue(quote.fiftyTwoWeekHigh),
    fiftyTwoWeekLow: toMetricValue(quote.fiftyTwoWeekLow),
    averageVolume: toMetricValue(quote.averageVolume),
    dividendYield: toMetricValue(quote.dividendYield),
    beta: toMetricValue(quote.beta),
    recommendationScore: toMetricValue(quote.recommendationMean),
    performance1y: performanceChange(history["1y"]),
    performance1m: performanceChange(history["1m"]),
    performance5d: performanceChange(history["5d"]),
  };
}

function resolveHistory(quote: RawQuote): Record<Horizon, PricePoint[]> {
  return {
    "1y": quote.history?.["1y"] ?? [],
    "1m": quote.history?.["1m"] ?? [],
    "5d": quote.history?.["5d"] ?? [],
  };
}

function resolveCurrentPrice(
  quote: RawQuote,
  history: Record<Horizon, PricePoint[]>
): MetricValue {
  if (quote.spotPrice !== undefined) return toMetricValue(quote.spotPrice);
  for (const horizon of ["5d", "1m", "1y"] as const) {
    const series = history[horizon];
    const last = series[series.length - 1];
    if (last) return toMetricValue(last.close);
  }
  return NOT_AVAILABLE;
}

/**
 * "TATAMOTORS.NS" -> "Tatamotors", "BRK-B" -> "Brk B" when the provider has no name.
 */
export function resolveCompanyName(quote: RawQuote, ticker: string): string {
  const named = quote.shortName?.trim() || quote.longName?.trim();
  if (named) return named;
  const base = ticker.split(".")[0].replace(/-/g, " ");
  return titleCase(base);
}

function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_, boundary: string, letter: string) =>
      `${boundary}${letter.toUpperCase()}`
    );
}
