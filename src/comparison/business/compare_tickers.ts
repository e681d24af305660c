/**
 * Business logic: side-by-side comparison of two tickers.
 */
import { loadComparisonConfig, type ComparisonConfig } from "../config";
import type { RawQuote } from "../domain/raw_quote";
import type {
  ComparisonReport,
  MetricRow,
  NormalizedRecord,
} from "../domain/types";
import type { MarketDataProvider } from "../infrastructure/contracts";
import { YahooFinanceProvider } from "../infrastructure/yahoo_provider";
import { getLogger } from "@src/util/logger";
import type { Result } from "@src/util/result";
import { calculateDelta, type DeltaMode } from "./delta";
import { COMPARISON_ROWS, METRIC_DEFINITIONS } from "./metrics";
import { normalizeQuote } from "./normalize_quote";

export interface CompareTickersInput {
  tickerA: string;
  tickerB: string;
}

export interface CompareTickersDependencies {
  provider?: MarketDataProvider;
  config?: ComparisonConfig;
  now?: () => Date;
  deltaMode?: DeltaMode;
}

/**
 * Returns null unless both tickers were fetched and normalized.
 */
export async function compareTwoTickers(
  input: CompareTickersInput,
  deps: CompareTickersDependencies = {}
): Promise<ComparisonReport | null> {
  const logger = getLogger("comparison/compare_tickers");
  const tickerA = normalizeTicker(input.tickerA);
  const tickerB = normalizeTicker(input.tickerB);
  if (!tickerA || !tickerB) {
    logger.warn({ tickerA, tickerB }, "comparison requires two tickers");
    return null;
  }

  let config: ComparisonConfig;
  try {
    config = deps.config ?? loadComparisonConfig();
  } catch (err) {
    logger.error({ err }, "comparison config invalid");
    return null;
  }
  const provider =
    deps.provider ?? new YahooFinanceProvider({ timeoutMs: config.timeoutMs });

  const [recordA, recordB] = await Promise.all([
    loadRecord(provider, tickerA, config),
    loadRecord(provider, tickerB, config),
  ]);

  if (!recordA || !recordB) {
    logger.info(
      { tickerA, tickerB, okA: recordA != null, okB: recordB != null },
      "comparison unavailable"
    );
    return null;
  }

  const report = buildComparisonReport(recordA, recordB, {
    now: (deps.now ?? (() => new Date()))(),
    deltaMode: deps.deltaMode,
  });
  logger.debug(
    { tickerA, tickerB, rows: report.rows.length },
    "comparison business result"
  );
  return report;
}

export function buildComparisonReport(
  recordA: NormalizedRecord,
  recordB: NormalizedRecord,
  options: { now: Date; deltaMode?: DeltaMode }
): ComparisonReport {
  const rows = COMPARISON_ROWS.map((key): MetricRow => {
    const { label, kind } = METRIC_DEFINITIONS[key];
    const delta =
      kind === "tier"
        ? undefined
        : calculateDelta(
            recordA.metrics[key],
            recordB.metrics[key],
            options.deltaMode
          );
    const row: MetricRow = {
      label,
      key,
      valueA: recordA.display[key],
      valueB: recordB.display[key],
      ...(delta !== undefined ? { delta } : {}),
    };
    return Object.freeze(row);
  });

  return Object.freeze({
    recordA: freezeRecord(recordA),
    recordB: freezeRecord(recordB),
    rows: Object.freeze(rows),
    anyDomestic:
      recordA.region === "domestic" || recordB.region === "domestic",
    lastUpdated: formatTimestamp(options.now),
  });
}

function freezeRecord(record: NormalizedRecord): NormalizedRecord {
  Object.freeze(record.metrics);
  Object.freeze(record.display);
  Object.freeze(record.performance);
  record.news.forEach((item) => Object.freeze(item));
  Object.freeze(record.news);
  Object.values(record.history).forEach((points) => {
    points.forEach((point) => Object.freeze(point));
    Object.freeze(points);
  });
  Object.freeze(record.history);
  return Object.freeze(record);
}

async function loadRecord(
  provider: MarketDataProvider,
  ticker: string,
  config: ComparisonConfig
): Promise<NormalizedRecord | null> {
  const logger = getLogger("comparison/compare_tickers");
  let raw: RawQuote;
  try {
    raw = await provider.getQuote(ticker);
  } catch (err) {
    logger.warn({ ticker, err }, "quote fetch failed");
    return null;
  }

  let result: Result<NormalizedRecord>;
  try {
    result = normalizeQuote(ticker, raw, config);
  } catch (err) {
    logger.error({ ticker, err }, "quote normalization threw");
    return null;
  }
  if (!result.ok) {
    logger.warn({ ticker, error: result.error }, "quote normalization failed");
    return null;
  }
  return result.data;
}

export function normalizeTicker(ticker: string): string {
  return String(ticker || "")
    .trim()
    .toUpperCase();
}

function formatTimestamp(d: Date): string {
  return d.toISOString().slice(0, 19).replace("T", " ");
}
