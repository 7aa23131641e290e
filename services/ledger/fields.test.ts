import { formatAmount, isValidIsoDate, parseAmount } from "./fields";

describe("ledger fields", () => {
  it("should accept only real calendar dates", () => {
    expect(isValidIsoDate("2024-02-29")).toBe(true);
    expect(isValidIsoDate("2023-02-29")).toBe(false);
    expect(isValidIsoDate("2024-6-1")).toBe(false);
    expect(isValidIsoDate("")).toBe(false);
  });

  it("should parse plain decimals only", () => {
    expect(parseAmount(" 42.50 ")).toBe(42.5);
    expect(parseAmount("-5")).toBe(-5);
    expect(parseAmount("")).toBeNull();
    expect(parseAmount("$10")).toBeNull();
    expect(parseAmount("1,000")).toBeNull();
  });

  it("should write amounts in their shortest form with one decimal place at least", () => {
    expect(formatAmount(42.5)).toBe("42.5");
    expect(formatAmount(75)).toBe("75.0");
    expect(formatAmount(0)).toBe("0.0");
    expect(formatAmount(100.04)).toBe("100.04");
  });
});
