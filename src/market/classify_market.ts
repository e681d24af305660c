import type { MarketRegion } from "@src/comparison/domain/types";

export const DEFAULT_DOMESTIC_SUFFIXES: readonly string[] = [".NS", ".BO"];

/**
 * Classify a ticker by its exchange suffix, e.g. "RELIANCE.NS" -> domestic.
 * Anything that matches no configured suffix is foreign.
 */
export function classifyMarket(
  ticker: string,
  domesticSuffixes: readonly string[] = DEFAULT_DOMESTIC_SUFFIXES
): MarketRegion {
  const normalized = String(ticker ?? "")
    .trim()
    .toUpperCase();
  if (!normalized) return "foreign";
  const isDomestic = domesticSuffixes.some((suffix) => {
    const s = suffix.trim().toUpperCase();
    return s.length > 0 && normalized.endsWith(s);
  });
  return isDomestic ? "domestic" : "foreign";
}
