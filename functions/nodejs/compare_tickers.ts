// Lambda handler comparing two tickers side by side.
//
// Endpoint: GET /compare
// Query params:
//   - tickers: string (required) two symbols separated by "|", e.g. AAPL|RELIANCE.NS
//   - days: number (optional) chart window, clamped to 30..365, default 90
// Behavior:
//   - Builds the comparison report, metric cards and price chart.
//   - 404 when either ticker cannot be fetched; the report is never partial.
import { z } from "zod";
import { compareTwoTickers } from "@src/comparison/business/compare_tickers";
import { buildMetricCards } from "@src/comparison/presentation/metric_cards";
import { loadPriceChart } from "@src/comparison/presentation/price_chart";
import { withRequestContext } from "@src/util/logger";
import {
  jsonResponse,
  type ApiEvent,
  type ApiResponse,
  type LambdaContext,
} from "./http";

const querySchema = z.object({
  tickers: z
    .string()
    .transform((raw) =>
      raw
        .split("|")
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
    )
    .refine((parts) => parts.length === 2, {
      message: "tickers must name exactly two symbols separated by |",
    }),
  days: z.coerce.number().int().positive().optional(),
});

export const handler = async (
  event: ApiEvent,
  context: LambdaContext = {}
): Promise<ApiResponse> => {
  const logger = withRequestContext("functions/compare_tickers", context);
  const parsed = querySchema.safeParse(event.queryStringParameters ?? {});
  if (!parsed.success) {
    return jsonResponse(400, {
      error: parsed.error.issues[0]?.message ?? "invalid query",
    });
  }

  try {
    const [tickerA, tickerB] = parsed.data.tickers;
    const report = await compareTwoTickers({ tickerA, tickerB });
    if (!report) {
      return jsonResponse(404, {
        error: `no comparison available for ${tickerA} and ${tickerB}`,
      });
    }
    const chart = await loadPriceChart({
      tickerA,
      tickerB,
      days: parsed.data.days,
    });
    return jsonResponse(200, {
      report,
      cards: buildMetricCards(report),
      chart,
    });
  } catch (err) {
    logger.error({ err }, "compare_tickers error");
    return jsonResponse(500, { error: "Internal server error" });
  }
};
