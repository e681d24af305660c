/**
 * Price-history chart for two tickers as a chart.js line configuration.
 * Dates missing from one series (e.g. exchange holidays) are gaps.
 */
import type { ChartConfiguration, ChartDataset } from "chart.js";
import type { PricePoint } from "../domain/raw_quote";
import {
  fetchPriceHistory,
  type GetPriceHistoryDependencies,
} from "@src/market/get_price_history";

export type PriceChartConfig = ChartConfiguration<
  "line",
  (number | null)[],
  string
>;

export interface PriceSeries {
  ticker: string;
  points: readonly PricePoint[];
}

export const CHART_DAYS_DEFAULT = 90;
export const CHART_DAYS_MIN = 30;
export const CHART_DAYS_MAX = 365;

const SERIES_COLORS = ["#3498db", "#e74c3c"] as const;

export function buildPriceChart(
  seriesA: PriceSeries,
  seriesB: PriceSeries
): PriceChartConfig {
  const labels = Array.from(
    new Set([...seriesA.points, ...seriesB.points].map((p) => p.date))
  ).sort();

  return {
    type: "line",
    data: {
      labels,
      datasets: [
        toDataset(seriesA, labels, SERIES_COLORS[0]),
        toDataset(seriesB, labels, SERIES_COLORS[1]),
      ],
    },
    options: {
      responsive: true,
      maintainAspectRatio: false,
      interaction: { mode: "index", intersect: false },
      scales: {
        x: { display: true, title: { display: true, text: "Date" } },
        y: { display: true, title: { display: true, text: "Price" } },
      },
      plugins: {
        legend: { display: true },
      },
    },
  };
}

function toDataset(
  series: PriceSeries,
  labels: readonly string[],
  color: string
): ChartDataset<"line", (number | null)[]> {
  const byDate = new Map(series.points.map((p) => [p.date, p.close]));
  return {
    label: series.ticker,
    data: labels.map((date) => byDate.get(date) ?? null),
    borderColor: color,
    backgroundColor: color,
    tension: 0.15,
    pointRadius: 0,
    spanGaps: true,
    fill: false,
  };
}

export function clampChartDays(days: number | undefined): number {
  if (days === undefined || !Number.isFinite(days)) return CHART_DAYS_DEFAULT;
  return Math.min(CHART_DAYS_MAX, Math.max(CHART_DAYS_MIN, Math.floor(days)));
}

/**
 * Null when either ticker's history is unavailable.
 */
export async function loadPriceChart(
  input: { tickerA: string; tickerB: string; days?: number },
  deps: GetPriceHistoryDependencies = {}
): Promise<PriceChartConfig | null> {
  const windowDays = clampChartDays(input.days);
  const [pointsA, pointsB] = await Promise.all([
    fetchPriceHistory({ ticker: input.tickerA, windowDays }, deps),
    fetchPriceHistory({ ticker: input.tickerB, windowDays }, deps),
  ]);
  if (!pointsA || !pointsB) return null;
  return buildPriceChart(
    { ticker: input.tickerA.trim().toUpperCase(), points: pointsA },
    { ticker: input.tickerB.trim().toUpperCase(), points: pointsB }
  );
}
