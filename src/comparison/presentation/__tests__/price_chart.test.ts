import type { PricePoint } from "@src/comparison/domain/raw_quote";
import type { MarketDataProvider } from "@src/comparison/infrastructure/contracts";
import {
  buildPriceChart,
  clampChartDays,
  loadPriceChart,
} from "@src/comparison/presentation/price_chart";

const seriesA = {
  ticker: "AAPL",
  points: [
    { date: "2024-01-02", close: 10 },
    { date: "2024-01-03", close: 11 },
  ],
};
const seriesB = {
  ticker: "MSFT",
  points: [
    { date: "2024-01-04", close: 21 },
    { date: "2024-01-03", close: 20 },
  ],
};

describe("buildPriceChart", () => {
  it("aligns both series on the union of dates with null gaps", () => {
    const chart = buildPriceChart(seriesA, seriesB);

    expect(chart.type).toBe("line");
    expect(chart.data.labels).toEqual([
      "2024-01-02",
      "2024-01-03",
      "2024-01-04",
    ]);
    const [a, b] = chart.data.datasets;
    expect(a.label).toBe("AAPL");
    expect(a.data).toEqual([10, 11, null]);
    expect(a.borderColor).toBe("#3498db");
    expect(b.label).toBe("MSFT");
    expect(b.data).toEqual([null, 20, 21]);
    expect(b.borderColor).toBe("#e74c3c");
  });
});

describe("clampChartDays", () => {
  it("defaults and clamps the window", () => {
    expect(clampChartDays(undefined)).toBe(90);
    expect(clampChartDays(Number.NaN)).toBe(90);
    expect(clampChartDays(10)).toBe(30);
    expect(clampChartDays(45.7)).toBe(45);
    expect(clampChartDays(1000)).toBe(365);
  });
});

describe("loadPriceChart", () => {
  function createProvider(series: Record<string, PricePoint[]>) {
    const getPriceHistory = jest.fn(
      async ({ ticker }: { ticker: string; from: Date; to: Date }) =>
        series[ticker] ?? []
    );
    const provider: MarketDataProvider = {
      getQuote: jest.fn(async () => {
        throw new Error("not used");
      }),
      getPriceHistory,
    };
    return { provider, getPriceHistory };
  }

  const now = () => new Date("2024-01-05T00:00:00Z");

  it("builds the chart from both histories", async () => {
    const { provider, getPriceHistory } = createProvider({
      AAPL: seriesA.points,
      MSFT: seriesB.points,
    });

    const chart = await loadPriceChart(
      { tickerA: "aapl", tickerB: "msft", days: 5 },
      { provider, now }
    );

    expect(chart?.data.datasets.map((d) => d.label)).toEqual(["AAPL", "MSFT"]);
    expect(getPriceHistory).toHaveBeenCalledTimes(2);
    // 5 days is raised to the 30 day minimum
    expect(getPriceHistory.mock.calls[0][0].from).toEqual(
      new Date("2023-12-07T00:00:00Z")
    );
  });

  it("returns null when either history is missing", async () => {
    const { provider } = createProvider({ AAPL: seriesA.points });

    const chart = await loadPriceChart(
      { tickerA: "AAPL", tickerB: "MSFT" },
      { provider, now }
    );

    expect(chart).toBeNull();
  });
});
