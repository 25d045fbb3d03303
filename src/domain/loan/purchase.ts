// src/domain/loan/purchase.ts
import type { CarLoanInputs, DerivedPrincipal, LoanTerms } from "./types";

/**
 * Work out how much has to be financed for a car purchase.
 *
 * The down payment is a percentage of the car price. Insurance / extra
 * fees and the one-time prepayment are taken off the remaining amount,
 * and the principal never goes below zero.
 */
export function deriveLoanPrincipal(inputs: CarLoanInputs): DerivedPrincipal {
  const downPaymentAmount = (inputs.carPrice * inputs.downPaymentPercent) / 100;
  const principalBeforeOneTimePrepayment =
    inputs.carPrice - downPaymentAmount - inputs.insuranceAndFees;
  const principal = Math.max(
    0,
    principalBeforeOneTimePrepayment - inputs.oneTimePrepayment
  );

  return {
    downPaymentAmount,
    principalBeforeOneTimePrepayment,
    principal,
  };
}

export function toLoanTerms(
  inputs: CarLoanInputs,
  derived: DerivedPrincipal = deriveLoanPrincipal(inputs)
): LoanTerms {
  return {
    principal: derived.principal,
    annualInterestRatePercent: inputs.annualInterestRatePercent,
    tenureYears: inputs.tenureYears,
    monthlyPrepayment: inputs.monthlyPrepayment,
    quarterlyPrepayment: inputs.quarterlyPrepayment,
    startYear: inputs.startYear,
  };
}
