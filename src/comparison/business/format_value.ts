import {
  NOT_AVAILABLE,
  type MarketRegion,
  type MetricValue,
} from "../domain/types";

/**
 * - currency: symbol + magnitude suffix
 * - count: magnitude suffix, no symbol
 * - number: thousands separators, 2 decimals
 * - percent: 2 decimals and a trailing "%"
 */
export type ValueKind = "currency" | "count" | "number" | "percent";

export interface FormatOptions {
  kind: ValueKind;
  region: MarketRegion;
  currencySymbols?: Record<MarketRegion, string>;
}

export const DEFAULT_CURRENCY_SYMBOLS: Record<MarketRegion, string> = {
  domestic: "₹",
  foreign: "$",
};

// Largest first; first match wins
const MAGNITUDES: ReadonlyArray<{ threshold: number; suffix: string }> = [
  { threshold: 1e12, suffix: "T" },
  { threshold: 1e9, suffix: "B" },
  { threshold: 1e6, suffix: "M" },
];

const twoDecimals = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function toMetricValue(value: unknown): MetricValue {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    if (Number.isFinite(n)) return n;
  }
  return NOT_AVAILABLE;
}

export function formatValue(value: unknown, options: FormatOptions): string {
  const num = toMetricValue(value);
  if (num === NOT_AVAILABLE) return NOT_AVAILABLE;

  switch (options.kind) {
    case "percent":
      return `${num.toFixed(2)}%`;
    case "number":
      return twoDecimals.format(num);
    case "count":
      return scale(num, "");
    case "currency": {
      const symbols = options.currencySymbols ?? DEFAULT_CURRENCY_SYMBOLS;
      return scale(num, symbols[options.region]);
    }
  }
}

function scale(num: number, prefix: string): string {
  const sign = num < 0 ? "-" : "";
  const magnitude = Math.abs(num);
  for (let i = 0; i < MAGNITUDES.length; i++) {
    const { threshold, suffix } = MAGNITUDES[i];
    // Tier on the value as the tier below would round it, so 999,999.999
    // reads 1.00M rather than 1,000,000.00
    const unitBelow = MAGNITUDES[i + 1]?.threshold ?? 1;
    if (Number((magnitude / unitBelow).toFixed(2)) >= threshold / unitBelow) {
      return `${sign}${prefix}${(magnitude / threshold).toFixed(2)}${suffix}`;
    }
  }
  return `${sign}${prefix}${twoDecimals.format(magnitude)}`;
}
