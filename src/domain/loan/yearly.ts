// src/domain/loan/yearly.ts
import type { Money, MonthlyRecord, YearlySummary } from "./types";

interface YearBucket {
  principalSum: Money;
  prepaymentSum: Money;
  interestSum: Money;
  finalBalance: Money;
}

function groupByYear(records: readonly MonthlyRecord[]): Map<number, YearBucket> {
  const buckets = new Map<number, YearBucket>();

  for (const record of records) {
    const bucket = buckets.get(record.calendarYear) ?? {
      principalSum: 0,
      prepaymentSum: 0,
      interestSum: 0,
      finalBalance: 0,
    };
    bucket.principalSum += record.principalPortion;
    bucket.prepaymentSum += record.prepaymentApplied;
    bucket.interestSum += record.interestPortion;
    // Records arrive in chronological order, so the last one wins.
    bucket.finalBalance = record.closingBalance;
    buckets.set(record.calendarYear, bucket);
  }

  return buckets;
}

/**
 * Roll the monthly schedule up into one summary per nominal year of the
 * tenure, `[startYear, startYear + tenureYears)`.
 *
 * Years with no records (the loan was paid off early, or the schedule is
 * empty) are still emitted with zero sums and a zero balance, so the
 * result always has `tenureYears` entries.
 *
 * `initialPrincipal` is the loan amount before any one-time prepayment was
 * taken off; it defaults to the opening balance of the first record.
 */
export function aggregateYearly(
  records: readonly MonthlyRecord[],
  startYear: number,
  tenureYears: number,
  initialPrincipal: Money = records.length > 0 ? records[0].openingBalance : 0
): YearlySummary[] {
  const buckets = groupByYear(records);
  const summaries: YearlySummary[] = [];
  let cumulativePaid = 0;

  for (let offset = 0; offset < tenureYears; offset++) {
    const year = startYear + offset;
    const bucket = buckets.get(year);

    const principalSum = bucket?.principalSum ?? 0;
    const prepaymentSum = bucket?.prepaymentSum ?? 0;
    const interestSum = bucket?.interestSum ?? 0;
    const finalBalance = Math.max(0, bucket?.finalBalance ?? 0);

    cumulativePaid += principalSum + prepaymentSum;

    let percentLoanPaid =
      initialPrincipal > 0
        ? Math.min(100, (cumulativePaid / initialPrincipal) * 100)
        : 100;
    if (finalBalance <= 0) {
      percentLoanPaid = 100;
    }

    summaries.push({
      year,
      principalSum,
      prepaymentSum,
      interestSum,
      finalBalance,
      totalPayment: principalSum + interestSum + prepaymentSum,
      percentLoanPaid,
    });
  }

  return summaries;
}
