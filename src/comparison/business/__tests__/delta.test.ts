import { calculateDelta } from "../delta";

describe("calculateDelta", () => {
  it("reports percentage difference relative to the second value", () => {
    expect(calculateDelta(120, 100)).toBe("20.0% above");
    expect(calculateDelta(80, 100)).toBe("20.0% below");
    expect(calculateDelta(190, 95)).toBe("100.0% above");
  });

  it("reports an absolute difference in absolute mode", () => {
    expect(calculateDelta(12.5, 10, "absolute")).toBe("2.50 higher");
    expect(calculateDelta(10, 12.5, "absolute")).toBe("2.50 lower");
    expect(calculateDelta(3, 0, "absolute")).toBe("3.00 higher");
  });

  it("has no delta for a zero denominator", () => {
    expect(calculateDelta(50, 0)).toBeUndefined();
  });

  it("has no delta when either side is unavailable", () => {
    expect(calculateDelta("N/A", 5)).toBeUndefined();
    expect(calculateDelta(5, "N/A")).toBeUndefined();
    expect(calculateDelta(5, undefined)).toBeUndefined();
    expect(calculateDelta(null, 5)).toBeUndefined();
    expect(calculateDelta("Buy", "Hold")).toBeUndefined();
  });

  it("compares performance percentages relative to the second value", () => {
    expect(calculateDelta(10, -5)).toBe("300.0% above");
    expect(calculateDelta(-5, 10)).toBe("150.0% below");
  });
});
