import { calculateDelta } from "../business/delta";
import { METRIC_DEFINITIONS } from "../business/metrics";
import type { ComparisonReport, MetricKey } from "../domain/types";

/** "inverse" marks metrics where a lower value reads as better. */
export type DeltaColor = "normal" | "inverse";

export interface MetricCard {
  key: MetricKey;
  label: string;
  valueA: string;
  valueB: string;
  delta?: string;
  deltaColor: DeltaColor;
}

interface CardSpec {
  key: MetricKey;
  withDelta: boolean;
  deltaColor: DeltaColor;
}

const KEY_METRIC_CARDS: readonly CardSpec[] = [
  { key: "currentPrice", withDelta: true, deltaColor: "normal" },
  { key: "marketCap", withDelta: false, deltaColor: "normal" },
  { key: "peRatio", withDelta: true, deltaColor: "inverse" },
  { key: "pegRatio", withDelta: true, deltaColor: "inverse" },
];

const VALUATION_CARDS: readonly CardSpec[] = [
  { key: "forwardPe", withDelta: true, deltaColor: "normal" },
  { key: "priceToBook", withDelta: true, deltaColor: "normal" },
  { key: "enterpriseValue", withDelta: false, deltaColor: "normal" },
  { key: "ebitda", withDelta: false, deltaColor: "normal" },
];

export interface MetricCards {
  keyMetrics: MetricCard[];
  valuation: MetricCard[];
}

export function buildMetricCards(report: ComparisonReport): MetricCards {
  const toCard = (spec: CardSpec): MetricCard => {
    const { recordA, recordB } = report;
    const delta = spec.withDelta
      ? calculateDelta(recordA.metrics[spec.key], recordB.metrics[spec.key])
      : undefined;
    return {
      key: spec.key,
      label: METRIC_DEFINITIONS[spec.key].label,
      valueA: recordA.display[spec.key],
      valueB: recordB.display[spec.key],
      ...(delta !== undefined ? { delta } : {}),
      deltaColor: spec.deltaColor,
    };
  };
  return {
    keyMetrics: KEY_METRIC_CARDS.map(toCard),
    valuation: VALUATION_CARDS.map(toCard),
  };
}
