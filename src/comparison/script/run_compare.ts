// Load envs from .env
// npm run compare -- TATAMOTORS.NS M&M.BO [chartDays]
import "dotenv/config";
import { createComparisonEngine } from "..";
import { buildMetricCards } from "../presentation/metric_cards";
import { clampChartDays, loadPriceChart } from "../presentation/price_chart";
import { renderComparisonText } from "../presentation/render_text";

async function main() {
  const tickerA = process.argv[2] ?? "TATAMOTORS.NS";
  const tickerB = process.argv[3] ?? "M&M.BO";
  const days = clampChartDays(Number(process.argv[4] ?? Number.NaN));

  const engine = createComparisonEngine();
  const report = await engine.compareTwoTickers(tickerA, tickerB);
  if (!report) {
    console.error(`No comparison available for ${tickerA} vs ${tickerB}`);
    process.exit(1);
  }

  console.log(renderComparisonText(report));
  console.log("");

  const cards = buildMetricCards(report);
  console.log("=== Key Metrics ===");
  for (const card of [...cards.keyMetrics, ...cards.valuation]) {
    const delta = card.delta ? ` (${card.delta})` : "";
    console.log(`${card.label}: ${card.valueA}${delta} | ${report.recordB.ticker}: ${card.valueB}`);
  }

  const chart = await loadPriceChart({ tickerA, tickerB, days });
  console.log("");
  if (!chart) {
    console.log("Could not load historical price data for one or both stocks");
    return;
  }
  const labels = chart.data.labels ?? [];
  console.log(
    `=== Price History (${days}d): ${labels.length} sessions, ${labels[0] ?? "-"} .. ${labels[labels.length - 1] ?? "-"} ===`
  );
}

main().catch((err) => {
  console.error("Unhandled error:", err);
  process.exit(1);
});
