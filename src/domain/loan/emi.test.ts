// src/domain/loan/emi.test.ts
import { computeMonthlyInstallment, monthlyRateFromAnnualPercent } from "./emi";

describe("computeMonthlyInstallment", () => {
  test("matches the annuity formula for 4.5 lakh at 9% over 5 years", () => {
    const emi = computeMonthlyInstallment(450_000, 9, 5);
    expect(emi).toBeCloseTo(9341.26, 2);
  });

  test("zero interest spreads principal evenly over the tenure", () => {
    expect(computeMonthlyInstallment(100_000, 0, 2)).toBe(100_000 / 24);
    expect(computeMonthlyInstallment(100_000, 0, 2)).toBeCloseTo(4166.67, 2);
  });

  test("returns 0 when there are no months to amortize", () => {
    expect(computeMonthlyInstallment(450_000, 9, 0)).toBe(0);
    expect(computeMonthlyInstallment(450_000, 9, -1)).toBe(0);
  });

  test("returns 0 for a zero principal", () => {
    expect(computeMonthlyInstallment(0, 9, 5)).toBe(0);
  });

  test("the installment amortizes the principal exactly over the tenure", () => {
    const principal = 300_000;
    const months = 7 * 12;
    const r = monthlyRateFromAnnualPercent(11.5);
    const emi = computeMonthlyInstallment(principal, 11.5, 7);

    let balance = principal;
    for (let m = 0; m < months; m++) {
      balance = balance * (1 + r) - emi;
    }
    expect(balance).toBeCloseTo(0, 4);
  });
});

describe("monthlyRateFromAnnualPercent", () => {
  test("converts an annual percentage into a monthly fraction", () => {
    expect(monthlyRateFromAnnualPercent(9)).toBeCloseTo(0.0075, 10);
    expect(monthlyRateFromAnnualPercent(0)).toBe(0);
  });
});
