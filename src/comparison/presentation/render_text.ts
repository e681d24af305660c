import type {
  ComparisonReport,
  MetricRow,
  NormalizedRecord,
} from "../domain/types";

export const FINANCIAL_DISCLAIMER =
  "Informational use only. Consult a financial advisor before making investment decisions.";

export const RESEARCH_PORTAL_NOTICE =
  "Research portal links open the portal's company search. Sign in there for full research reports.";

export function renderComparisonText(
  report: ComparisonReport,
  options: { includeDisclaimer?: boolean } = {}
): string {
  const { recordA, recordB } = report;
  const chunks: string[] = [
    `Comparison: ${recordA.ticker} vs ${recordB.ticker}`,
    `Last updated: ${report.lastUpdated} UTC`,
    "",
    ...renderHeader(recordA),
    ...renderHeader(recordB),
    "",
    ...renderTable(report.rows, recordA.ticker, recordB.ticker),
    "",
    ...renderNews(recordA),
    "",
    ...renderNews(recordB),
  ];
  if (report.anyDomestic) {
    chunks.push("", RESEARCH_PORTAL_NOTICE);
  }
  if (options.includeDisclaimer ?? true) {
    chunks.push("---", FINANCIAL_DISCLAIMER);
  }
  return chunks.join("\n");
}

function renderHeader(record: NormalizedRecord): string[] {
  return [
    `${record.ticker} - ${record.companyName}`,
    `  Sector: ${record.sector} | Industry: ${record.industry}`,
  ];
}

export function renderTable(
  rows: readonly MetricRow[],
  tickerA: string,
  tickerB: string
): string[] {
  const table = [
    ["Metric", tickerA, tickerB, "Delta"],
    ...rows.map((row) => [row.label, row.valueA, row.valueB, row.delta ?? ""]),
  ];
  const widths = [0, 1, 2, 3].map((col) =>
    Math.max(...table.map((cells) => cells[col].length))
  );
  return table.map((cells) =>
    cells
      .map((cell, col) => cell.padEnd(widths[col]))
      .join(" | ")
      .trimEnd()
  );
}

function renderNews(record: NormalizedRecord): string[] {
  const lines = [`${record.ticker} News`];
  if (record.news.length === 0) {
    lines.push("  No recent news found");
    return lines;
  }
  for (const item of record.news) {
    lines.push(`  - ${item.title} (${item.publisher})`, `    ${item.link}`);
  }
  return lines;
}
