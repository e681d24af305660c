import { createComparisonEngine } from "@src/comparison";
import { DEFAULT_COMPARISON_CONFIG } from "@src/comparison/config";
import { RawQuoteSchema } from "@src/comparison/domain/raw_quote";
import type { MarketDataProvider } from "@src/comparison/infrastructure/contracts";
import quotes from "../__fixtures__/quotes.json";

describe("createComparisonEngine", () => {
  const aapl = RawQuoteSchema.parse(quotes.aapl);
  const msft = RawQuoteSchema.parse(quotes.msft);
  const provider: MarketDataProvider = {
    getQuote: jest.fn(async (ticker: string) =>
      ticker === "AAPL" ? aapl : msft
    ),
    getPriceHistory: jest.fn(async () => [{ date: "2025-01-02", close: 190 }]),
  };

  it("binds both entry points to one provider and config", async () => {
    const engine = createComparisonEngine({
      provider,
      config: { ...DEFAULT_COMPARISON_CONFIG, newsLimit: 1 },
      now: () => new Date("2025-01-02T00:00:00Z"),
      deltaMode: "absolute",
    });

    const report = await engine.compareTwoTickers("aapl", "msft");
    const history = await engine.fetchPriceHistory("aapl", 7);

    expect(report?.recordA.news).toHaveLength(1);
    expect(report?.rows[0].delta).toBe("210.00 lower");
    expect(report?.lastUpdated).toBe("2025-01-02 00:00:00");
    expect(history).toEqual([{ date: "2025-01-02", close: 190 }]);
    expect(provider.getPriceHistory).toHaveBeenCalledWith({
      ticker: "AAPL",
      from: new Date("2024-12-27T00:00:00Z"),
      to: new Date("2025-01-02T00:00:00Z"),
    });
  });
});
