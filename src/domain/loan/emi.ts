// src/domain/loan/emi.ts
import type { Money } from "./types";

/**
 * Periodic (monthly) rate for an annual percentage, e.g. 9 → 0.0075.
 */
export function monthlyRateFromAnnualPercent(annualRatePercent: number): number {
  return annualRatePercent / 100 / 12;
}

/**
 * Compute the equated monthly installment for a reducing-balance loan:
 *
 *   EMI = P * r * (1 + r)^n / ((1 + r)^n - 1)
 *
 * where r is the monthly rate and n the number of months. A zero rate
 * spreads the principal evenly; a non-positive tenure has nothing to
 * amortize and yields 0.
 */
export function computeMonthlyInstallment(
  principal: Money,
  annualRatePercent: number,
  tenureYears: number
): Money {
  const totalMonths = tenureYears * 12;
  const r = monthlyRateFromAnnualPercent(annualRatePercent);

  if (totalMonths <= 0) {
    return 0;
  }

  if (r === 0) {
    return principal / totalMonths;
  }

  const pow = Math.pow(1 + r, totalMonths);
  return (principal * r * pow) / (pow - 1);
}
