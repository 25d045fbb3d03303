// src/domain/loan/comparison.ts
import type { BaselineComparison, LoanTerms, MonthlyRecord, Money } from "./types";
import { buildSchedule } from "./schedule";

function totalInterest(schedule: readonly MonthlyRecord[]): Money {
  return schedule.reduce((sum, r) => sum + r.interestPortion, 0);
}

/**
 * Compare the schedule with monthly/quarterly prepayments against the
 * same loan paid with the plain installment only. Pass `actual` when the
 * schedule for `terms` has already been built.
 */
export function compareWithBaseline(
  terms: LoanTerms,
  actual: readonly MonthlyRecord[] = buildSchedule(terms)
): BaselineComparison {
  const baseline = buildSchedule({
    ...terms,
    monthlyPrepayment: 0,
    quarterlyPrepayment: 0,
  });

  const baselineInterest = totalInterest(baseline);
  const interestWithPrepayments = totalInterest(actual);

  return {
    baselineInterest,
    interestWithPrepayments,
    interestSaved: baselineInterest - interestWithPrepayments,
    baselineMonths: baseline.length,
    monthsWithPrepayments: actual.length,
    monthsSaved: Math.max(0, baseline.length - actual.length),
  };
}
