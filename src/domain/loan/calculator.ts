// src/domain/loan/calculator.ts
import type { CarLoanCalculation, CarLoanInputs } from "./types";
import { deriveLoanPrincipal, toLoanTerms } from "./purchase";
import { validateCarLoanInputs } from "./validation";
import { computeMonthlyInstallment } from "./emi";
import { buildSchedule } from "./schedule";
import { aggregateYearly } from "./yearly";
import { summarizeLoan } from "./summary";
import { compareWithBaseline } from "./comparison";
import { formatMonthYear } from "../../utils/dates";

/**
 * Run the whole car loan calculation for one set of form inputs:
 * principal → installment → monthly schedule → yearly roll-up → totals.
 *
 * Invalid inputs are reported back rather than thrown, so the form can
 * show them next to the fields.
 */
export function runCarLoanCalculation(inputs: CarLoanInputs): CarLoanCalculation {
  const issues = validateCarLoanInputs(inputs);
  if (issues.length > 0) {
    return { ok: false, issues };
  }

  const derived = deriveLoanPrincipal(inputs);
  const terms = toLoanTerms(inputs, derived);

  const monthlyInstallment = computeMonthlyInstallment(
    terms.principal,
    terms.annualInterestRatePercent,
    terms.tenureYears
  );
  const schedule = buildSchedule(terms);
  // Percent paid is measured against the loan before the one-time
  // prepayment came off.
  const yearly = aggregateYearly(
    schedule,
    terms.startYear,
    terms.tenureYears,
    derived.principalBeforeOneTimePrepayment
  );

  const last = schedule.length > 0 ? schedule[schedule.length - 1] : null;

  return {
    ok: true,
    result: {
      inputs,
      derived,
      terms,
      monthlyInstallment,
      schedule,
      yearly,
      totals: summarizeLoan(yearly, inputs.oneTimePrepayment),
      comparison: compareWithBaseline(terms, schedule),
      payoffLabel: last
        ? formatMonthYear(last.monthOfYearAbbreviation, last.calendarYear)
        : null,
    },
  };
}
