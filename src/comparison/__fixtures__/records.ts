import { normalizeQuote } from "@src/comparison/business/normalize_quote";
import type { NormalizedRecord } from "@src/comparison/domain/types";
import quotes from "./quotes.json";

export const fixtureNow = new Date("2025-01-02T03:04:05.678Z");

export function fixtureRecord(
  ticker: string,
  key: keyof typeof quotes
): NormalizedRecord {
  const result = normalizeQuote(ticker, quotes[key]);
  if (!result.ok) throw new Error(result.error);
  return result.data;
}
