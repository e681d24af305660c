import {
  NOT_AVAILABLE,
  type NotAvailable,
  type RecommendationTier,
} from "../domain/types";
import { toMetricValue } from "./format_value";

// Inclusive upper bounds, ascending; lower score = more bullish
const TIERS: ReadonlyArray<{ max: number; tier: RecommendationTier }> = [
  { max: 1.5, tier: "Strong Buy" },
  { max: 2.5, tier: "Buy" },
  { max: 3.5, tier: "Hold" },
  { max: 4.5, tier: "Sell" },
];

export function recommendationTier(
  score: unknown
): RecommendationTier | NotAvailable {
  const value = toMetricValue(score);
  if (value === NOT_AVAILABLE) return NOT_AVAILABLE;
  const match = TIERS.find(({ max }) => value <= max);
  return match ? match.tier : "Strong Sell";
}
