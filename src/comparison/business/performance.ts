import type { PricePoint } from "../domain/raw_quote";
import { NOT_AVAILABLE, type MetricValue } from "../domain/types";
import { formatValue } from "./format_value";

/**
 * Percentage change from the first to the last close of a chronological series.
 */
export function performanceChange(
  series: readonly PricePoint[] | null | undefined
): MetricValue {
  if (!series || series.length < 2) return NOT_AVAILABLE;
  const start = series[0].close;
  const end = series[series.length - 1].close;
  if (!Number.isFinite(start) || !Number.isFinite(end) || start === 0) {
    return NOT_AVAILABLE;
  }
  return ((end - start) / start) * 100;
}

export function calculatePerformance(
  series: readonly PricePoint[] | null | undefined
): string {
  return formatValue(performanceChange(series), {
    kind: "percent",
    region: "foreign",
  });
}
