import type { MetricKey } from "../domain/types";
import type { ValueKind } from "./format_value";

/**
 * "tier" metrics display the recommendation text instead of the number.
 */
export type MetricKind = ValueKind | "tier";

export interface MetricDefinition {
  key: MetricKey;
  label: string;
  kind: MetricKind;
}

export const METRIC_DEFINITIONS: Record<MetricKey, MetricDefinition> = {
  currentPrice: { key: "currentPrice", label: "Current Price", kind: "currency" },
  previousClose: { key: "previousClose", label: "Previous Close", kind: "currency" },
  dayChangePercent: { key: "dayChangePercent", label: "Day Change (%)", kind: "percent" },
  dayChangeAbsolute: { key: "dayChangeAbsolute", label: "Day Change", kind: "currency" },
  marketCap: { key: "marketCap", label: "Market Cap", kind: "currency" },
  peRatio: { key: "peRatio", label: "P/E Ratio", kind: "number" },
  pegRatio: { key: "pegRatio", label: "PEG Ratio", kind: "number" },
  forwardPe: { key: "forwardPe", label: "Forward P/E", kind: "number" },
  priceToBook: { key: "priceToBook", label: "Price/Book", kind: "number" },
  enterpriseValue: { key: "enterpriseValue", label: "Enterprise Value", kind: "currency" },
  ebitda: { key: "ebitda", label: "EBITDA", kind: "currency" },
  debtToEquity: { key: "debtToEquity", label: "Debt/Equity", kind: "number" },
  currentRatio: { key: "currentRatio", label: "Current Ratio", kind: "number" },
  returnOnEquity: { key: "returnOnEquity", label: "ROE", kind: "number" },
  fiftyTwoWeekHigh: { key: "fiftyTwoWeekHigh", label: "52W High", kind: "currency" },
  fiftyTwoWeekLow: { key: "fiftyTwoWeekLow", label: "52W Low", kind: "currency" },
  averageVolume: { key: "averageVolume", label: "Avg Volume", kind: "count" },
  dividendYield: { key: "dividendYield", label: "Dividend Yield", kind: "number" },
  beta: { key: "beta", label: "Beta", kind: "number" },
  recommendationScore: { key: "recommendationScore", label: "Analyst Rec", kind: "tier" },
  performance1y: { key: "performance1y", label: "1Y Performance", kind: "percent" },
  performance1m: { key: "performance1m", label: "1M Performance", kind: "percent" },
  performance5d: { key: "performance5d", label: "5D Performance", kind: "percent" },
};

/**
 * Builds a record with an entry for every metric key.
 */
export function mapMetrics<T>(fn: (key: MetricKey) => T): Record<MetricKey, T> {
  return {
    currentPrice: fn("currentPrice"),
    previousClose: fn("previousClose"),
    dayChangePercent: fn("dayChangePercent"),
    dayChangeAbsolute: fn("dayChangeAbsolute"),
    marketCap: fn("marketCap"),
    peRatio: fn("peRatio"),
    pegRatio: fn("pegRatio"),
    forwardPe: fn("forwardPe"),
    priceToBook: fn("priceToBook"),
    enterpriseValue: fn("enterpriseValue"),
    ebitda: fn("ebitda"),
    debtToEquity: fn("debtToEquity"),
    currentRatio: fn("currentRatio"),
    returnOnEquity: fn("returnOnEquity"),
    fiftyTwoWeekHigh: fn("fiftyTwoWeekHigh"),
    fiftyTwoWeekLow: fn("fiftyTwoWeekLow"),
    averageVolume: fn("averageVolume"),
    dividendYield: fn("dividendYield"),
    beta: fn("beta"),
    recommendationScore: fn("recommendationScore"),
    performance1y: fn("performance1y"),
    performance1m: fn("performance1m"),
    performance5d: fn("performance5d"),
  };
}

/**
 * Ordered rows of the side-by-side table.
 */
export const COMPARISON_ROWS: readonly MetricKey[] = [
  "currentPrice",
  "previousClose",
  "dayChangePercent",
  "marketCap",
  "peRatio",
  "pegRatio",
  "forwardPe",
  "priceToBook",
  "enterpriseValue",
  "ebitda",
  "debtToEquity",
  "currentRatio",
  "returnOnEquity",
  "fiftyTwoWeekHigh",
  "fiftyTwoWeekLow",
  "averageVolume",
  "dividendYield",
  "beta",
  "recommendationScore",
  "performance1y",
  "performance1m",
  "performance5d",
];
