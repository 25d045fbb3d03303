// src/domain/loan/validation.ts
import type { CarLoanField, CarLoanInputs, ValidationIssue } from "./types";
import { CAR_LOAN_FIELDS, CAR_LOAN_LIMITS } from "../../config/loanDefaults";

const NON_NEGATIVE_FIELDS: { field: CarLoanField; label: string }[] = [
  { field: "annualInterestRatePercent", label: "Annual interest rate" },
  { field: "insuranceAndFees", label: "Insurance / extra fees" },
  { field: "monthlyPrepayment", label: "Monthly prepayment" },
  { field: "quarterlyPrepayment", label: "Quarterly prepayment" },
  { field: "oneTimePrepayment", label: "One-time prepayment" },
];

/**
 * Check form inputs before they reach the amortization engine. The engine
 * itself accepts anything non-negative; these are the limits of the form.
 * Returns an empty list when the inputs are usable.
 */
export function validateCarLoanInputs(inputs: CarLoanInputs): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const {
    minCarPrice,
    minDownPaymentPercent,
    maxDownPaymentPercent,
    minTenureYears,
    maxTenureYears,
    minStartYear,
    maxStartYear,
  } = CAR_LOAN_LIMITS;

  for (const key of CAR_LOAN_FIELDS) {
    if (!Number.isFinite(inputs[key])) {
      issues.push({ field: key, message: "Enter a number." });
    }
  }
  // Range checks below are meaningless for non-numbers.
  if (issues.length > 0) return issues;

  if (inputs.carPrice < minCarPrice) {
    issues.push({
      field: "carPrice",
      message: `Car price must be at least ${minCarPrice}.`,
    });
  }

  if (
    inputs.downPaymentPercent < minDownPaymentPercent ||
    inputs.downPaymentPercent > maxDownPaymentPercent
  ) {
    issues.push({
      field: "downPaymentPercent",
      message: `Down payment must be between ${minDownPaymentPercent}% and ${maxDownPaymentPercent}%.`,
    });
  }

  if (
    !Number.isInteger(inputs.tenureYears) ||
    inputs.tenureYears < minTenureYears ||
    inputs.tenureYears > maxTenureYears
  ) {
    issues.push({
      field: "tenureYears",
      message: `Loan tenure must be a whole number of years from ${minTenureYears} to ${maxTenureYears}.`,
    });
  }

  if (
    !Number.isInteger(inputs.startYear) ||
    inputs.startYear < minStartYear ||
    inputs.startYear > maxStartYear
  ) {
    issues.push({
      field: "startYear",
      message: `Starting year must be between ${minStartYear} and ${maxStartYear}.`,
    });
  }

  for (const { field, label } of NON_NEGATIVE_FIELDS) {
    if (inputs[field] < 0) {
      issues.push({ field, message: `${label} cannot be negative.` });
    }
  }

  return issues;
}
