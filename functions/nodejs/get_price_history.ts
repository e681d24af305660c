// Lambda handler returning daily closes for one ticker.
//
// Endpoint: GET /history
// Query params:
//   - ticker: string (required)
//   - days: number (optional) trailing window in days, default 90
import { z } from "zod";
import { fetchPriceHistory } from "@src/market/get_price_history";
import { withRequestContext } from "@src/util/logger";
import {
  jsonResponse,
  type ApiEvent,
  type ApiResponse,
  type LambdaContext,
} from "./http";

const querySchema = z.object({
  ticker: z.string().trim().min(1, "ticker is required"),
  days: z.coerce.number().int().positive().max(3650).default(90),
});

export const handler = async (
  event: ApiEvent,
  context: LambdaContext = {}
): Promise<ApiResponse> => {
  const logger = withRequestContext("functions/get_price_history", context);
  const parsed = querySchema.safeParse(event.queryStringParameters ?? {});
  if (!parsed.success) {
    return jsonResponse(400, {
      error: parsed.error.issues[0]?.message ?? "invalid query",
    });
  }

  try {
    const { ticker, days } = parsed.data;
    const points = await fetchPriceHistory({ ticker, windowDays: days });
    if (!points) {
      return jsonResponse(404, { error: `no price history for ${ticker}` });
    }
    return jsonResponse(200, {
      ticker: ticker.toUpperCase(),
      days,
      count: points.length,
      points,
    });
  } catch (err) {
    logger.error({ err }, "get_price_history error");
    return jsonResponse(500, { error: "Internal server error" });
  }
};
