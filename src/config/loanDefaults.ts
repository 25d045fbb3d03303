// src/config/loanDefaults.ts
//
// Default form values and the limits the input form enforces. Amounts are
// in Indian rupees.
import type { CarLoanField, CarLoanInputs } from "../domain/loan/types";

export const DEFAULT_CAR_LOAN_INPUTS: CarLoanInputs = {
  carPrice: 500_000,
  downPaymentPercent: 10,
  annualInterestRatePercent: 9,
  tenureYears: 5,
  insuranceAndFees: 0,
  startYear: 2024,
  monthlyPrepayment: 0,
  quarterlyPrepayment: 0,
  oneTimePrepayment: 0,
};

export const CAR_LOAN_FIELDS: readonly CarLoanField[] = [
  "carPrice",
  "downPaymentPercent",
  "annualInterestRatePercent",
  "tenureYears",
  "insuranceAndFees",
  "startYear",
  "monthlyPrepayment",
  "quarterlyPrepayment",
  "oneTimePrepayment",
];

export const CAR_LOAN_LIMITS = {
  minCarPrice: 100_000,
  minDownPaymentPercent: 0,
  maxDownPaymentPercent: 100,
  minTenureYears: 1,
  maxTenureYears: 10,
  minStartYear: 2023,
  maxStartYear: 2100,
} as const;

// Step sizes for the number inputs.
export const INPUT_STEPS: Record<keyof CarLoanInputs, number> = {
  carPrice: 50_000,
  downPaymentPercent: 1,
  annualInterestRatePercent: 0.1,
  tenureYears: 1,
  insuranceAndFees: 1_000,
  startYear: 1,
  monthlyPrepayment: 1_000,
  quarterlyPrepayment: 1_000,
  oneTimePrepayment: 5_000,
};
