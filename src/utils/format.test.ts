// src/utils/format.test.ts
import {
  formatCurrency,
  formatMonthsAsYearsMonths,
  formatPercent,
  parseNumber,
} from "./format";

describe("formatCurrency", () => {
  test("uses rupees with Indian digit grouping and no decimals", () => {
    expect(formatCurrency(450_000)).toBe("₹4,50,000");
    expect(formatCurrency(9341.26)).toBe("₹9,341");
    expect(formatCurrency(0)).toBe("₹0");
  });

  test("renders missing values as an em dash", () => {
    expect(formatCurrency(null)).toBe("—");
    expect(formatCurrency(undefined)).toBe("—");
    expect(formatCurrency(Number.NaN)).toBe("—");
  });
});

describe("formatPercent", () => {
  test("shows two decimals", () => {
    expect(formatPercent(45)).toBe("45.00%");
    expect(formatPercent(14.74044648301181)).toBe("14.74%");
    expect(formatPercent(null)).toBe("—");
  });
});

describe("formatMonthsAsYearsMonths", () => {
  test("splits months into years and months", () => {
    expect(formatMonthsAsYearsMonths(34)).toBe("2 years 10 months");
    expect(formatMonthsAsYearsMonths(36)).toBe("3 years");
    expect(formatMonthsAsYearsMonths(13)).toBe("1 year 1 month");
    expect(formatMonthsAsYearsMonths(5)).toBe("5 months");
  });

  test("returns an em dash for less than a month", () => {
    expect(formatMonthsAsYearsMonths(0)).toBe("—");
    expect(formatMonthsAsYearsMonths(0.5)).toBe("—");
    expect(formatMonthsAsYearsMonths(-3)).toBe("—");
  });
});

describe("parseNumber", () => {
  test("accepts Indian digit grouping and the rupee sign", () => {
    expect(parseNumber("5,00,000")).toBe(500_000);
    expect(parseNumber("₹ 4,50,000")).toBe(450_000);
    expect(parseNumber(" 9.5 ")).toBe(9.5);
  });

  test("returns null for empty or non-numeric input", () => {
    expect(parseNumber("")).toBeNull();
    expect(parseNumber("   ")).toBeNull();
    expect(parseNumber("₹")).toBeNull();
    expect(parseNumber("abc")).toBeNull();
  });
});
