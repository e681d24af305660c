/**
 * Domain types for the two-ticker comparison report.
 */
import type { Horizon, PricePoint } from "./raw_quote";

export const NOT_AVAILABLE = "N/A";
export type NotAvailable = typeof NOT_AVAILABLE;

/** A numeric attribute or the explicit unavailable sentinel. */
export type MetricValue = number | NotAvailable;

/** Closed set; add a member together with its currency symbol in config. */
export type MarketRegion = "domestic" | "foreign";

export type RecommendationTier =
  | "Strong Buy"
  | "Buy"
  | "Hold"
  | "Sell"
  | "Strong Sell";

export type MetricKey =
  | "currentPrice"
  | "previousClose"
  | "dayChangePercent"
  | "dayChangeAbsolute"
  | "marketCap"
  | "peRatio"
  | "pegRatio"
  | "forwardPe"
  | "priceToBook"
  | "enterpriseValue"
  | "ebitda"
  | "debtToEquity"
  | "currentRatio"
  | "returnOnEquity"
  | "fiftyTwoWeekHigh"
  | "fiftyTwoWeekLow"
  | "averageVolume"
  | "dividendYield"
  | "beta"
  | "recommendationScore"
  | "performance1y"
  | "performance1m"
  | "performance5d";

export interface NewsItem {
  title: string;
  link: string;
  publisher: string;
  isResearchPortal: boolean;
}

export interface NormalizedRecord {
  ticker: string;
  companyName: string;
  region: MarketRegion;
  currencySymbol: string;
  sector: string;
  industry: string;
  employees: MetricValue;
  metrics: Record<MetricKey, MetricValue>;
  display: Record<MetricKey, string>;
  recommendation: RecommendationTier | NotAvailable;
  performance: Record<Horizon, string>;
  news: NewsItem[];
  history: Record<Horizon, PricePoint[]>;
}

export interface MetricRow {
  readonly label: string;
  readonly key: MetricKey;
  readonly valueA: string;
  readonly valueB: string;
  readonly delta?: string;
}

export interface ComparisonReport {
  readonly recordA: NormalizedRecord;
  readonly recordB: NormalizedRecord;
  readonly rows: readonly MetricRow[];
  /** True if either ticker is listed on a domestic market. */
  readonly anyDomestic: boolean;
  readonly lastUpdated: string; // YYYY-MM-DD HH:MM:SS (UTC)
}
