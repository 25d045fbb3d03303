// src/domain/loan/schedule.ts
import type { LoanTerms, MonthlyRecord } from "./types";
import {
  computeMonthlyInstallment,
  monthlyRateFromAnnualPercent,
} from "./emi";
import { monthAbbreviation } from "../../utils/dates";

// Balances below this are floating-point residue of the annuity formula
// and are treated as paid off.
const BALANCE_EPSILON = 1e-6;

/**
 * Build the month-by-month amortization schedule, applying the fixed
 * installment plus any monthly and quarterly prepayments.
 *
 * The schedule stops as soon as the balance reaches zero, or after
 * `tenureYears * 12` months even if some balance is left over.
 */
export function buildSchedule(terms: LoanTerms): MonthlyRecord[] {
  const totalMonths = terms.tenureYears * 12;
  const r = monthlyRateFromAnnualPercent(terms.annualInterestRatePercent);
  const installment = computeMonthlyInstallment(
    terms.principal,
    terms.annualInterestRatePercent,
    terms.tenureYears
  );
  const monthlyPrepayment = terms.monthlyPrepayment ?? 0;
  const quarterlyPrepayment = terms.quarterlyPrepayment ?? 0;

  const schedule: MonthlyRecord[] = [];
  let balance = terms.principal;

  for (let month = 1; balance > 0 && month <= totalMonths; month++) {
    const interestPortion = balance * r;
    const principalPortion = installment - interestPortion;

    let prepaymentApplied = 0;
    if (monthlyPrepayment > 0) {
      prepaymentApplied += monthlyPrepayment;
    }
    if (quarterlyPrepayment > 0 && month % 3 === 0) {
      prepaymentApplied += quarterlyPrepayment;
    }

    const openingBalance = balance;
    balance = Math.max(0, balance - principalPortion - prepaymentApplied);
    if (balance < BALANCE_EPSILON) {
      balance = 0;
    }

    schedule.push({
      calendarYear: terms.startYear + Math.floor((month - 1) / 12),
      monthNumber: month,
      monthOfYearAbbreviation: monthAbbreviation((month - 1) % 12),
      openingBalance,
      interestPortion,
      principalPortion,
      prepaymentApplied,
      closingBalance: balance,
    });
  }

  return schedule;
}
