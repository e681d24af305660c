import { NOT_AVAILABLE } from "../domain/types";
import { toMetricValue } from "./format_value";

/**
 * percent: "X.X% above|below", relative to the second value (canonical)
 * absolute: "X.XX higher|lower"
 */
export type DeltaMode = "percent" | "absolute";

export function calculateDelta(
  a: unknown,
  b: unknown,
  mode: DeltaMode = "percent"
): string | undefined {
  const first = toMetricValue(a);
  const second = toMetricValue(b);
  if (first === NOT_AVAILABLE || second === NOT_AVAILABLE) return undefined;

  const diff = first - second;
  if (mode === "absolute") {
    return `${Math.abs(diff).toFixed(2)} ${diff > 0 ? "higher" : "lower"}`;
  }

  if (second === 0) return undefined;
  const pct = Math.abs((diff / second) * 100);
  return `${pct.toFixed(1)}% ${diff > 0 ? "above" : "below"}`;
}
