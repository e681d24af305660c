import { fetchPriceHistory } from "@src/market/get_price_history";
import { handler } from "../get_price_history";

jest.mock("@src/market/get_price_history");

const historyMock = jest.mocked(fetchPriceHistory);

describe("get_price_history handler", () => {
  beforeEach(() => {
    historyMock.mockReset();
  });

  it("requires a ticker", async () => {
    const res = await handler({ queryStringParameters: { ticker: "  " } });
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body)).toEqual({ error: "ticker is required" });
  });

  it("rejects a non-numeric window", async () => {
    const res = await handler({
      queryStringParameters: { ticker: "AAPL", days: "lots" },
    });
    expect(res.statusCode).toBe(400);
    expect(historyMock).not.toHaveBeenCalled();
  });

  it("returns the points with a default 90 day window", async () => {
    historyMock.mockResolvedValue([
      { date: "2025-03-07", close: 101 },
      { date: "2025-03-10", close: 103.5 },
    ]);

    const res = await handler({ queryStringParameters: { ticker: "aapl" } });

    expect(res.statusCode).toBe(200);
    expect(historyMock).toHaveBeenCalledWith({ ticker: "aapl", windowDays: 90 });
    expect(JSON.parse(res.body)).toEqual({
      ticker: "AAPL",
      days: 90,
      count: 2,
      points: [
        { date: "2025-03-07", close: 101 },
        { date: "2025-03-10", close: 103.5 },
      ],
    });
  });

  it("returns 404 when no history is available", async () => {
    historyMock.mockResolvedValue(null);

    const res = await handler({
      queryStringParameters: { ticker: "NOPE", days: "30" },
    });

    expect(res.statusCode).toBe(404);
    expect(JSON.parse(res.body)).toEqual({ error: "no price history for NOPE" });
  });

  it("returns 500 on unexpected failure", async () => {
    historyMock.mockRejectedValue(new Error("boom"));

    const res = await handler({ queryStringParameters: { ticker: "AAPL" } });

    expect(res.statusCode).toBe(500);
  });
});
