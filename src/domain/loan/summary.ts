// src/domain/loan/summary.ts
import type {
  LoanTotals,
  Money,
  PaymentBreakdownSlice,
  YearlySummary,
} from "./types";

/**
 * Totals over the yearly roll-up. The one-time prepayment never enters the
 * schedule (it reduces the principal up front) so it is added to the
 * prepayment total here.
 */
export function summarizeLoan(
  yearly: readonly YearlySummary[],
  oneTimePrepayment: Money = 0
): LoanTotals {
  let totalPrincipal = 0;
  let totalPrepayment = oneTimePrepayment;
  let totalInterest = 0;

  for (const y of yearly) {
    totalPrincipal += y.principalSum;
    totalPrepayment += y.prepaymentSum;
    totalInterest += y.interestSum;
  }

  const totalPaid = totalPrincipal + totalPrepayment + totalInterest;
  const finalBalance = yearly.length > 0 ? yearly[yearly.length - 1].finalBalance : 0;

  const slice = (
    label: PaymentBreakdownSlice["label"],
    amount: Money
  ): PaymentBreakdownSlice => ({
    label,
    amount,
    share: totalPaid > 0 ? amount / totalPaid : 0,
  });

  return {
    totalPrincipal,
    totalPrepayment,
    totalInterest,
    totalPaid,
    finalBalance,
    breakdown: [
      slice("Principal", totalPrincipal),
      slice("Prepayment", totalPrepayment),
      slice("Interest", totalInterest),
    ],
  };
}
