// src/domain/loan/types.ts

export type Money = number;

export type MonthAbbreviation =
  | "Jan"
  | "Feb"
  | "Mar"
  | "Apr"
  | "May"
  | "Jun"
  | "Jul"
  | "Aug"
  | "Sep"
  | "Oct"
  | "Nov"
  | "Dec";

export interface LoanTerms {
  principal: Money;
  annualInterestRatePercent: number; // e.g. 9 for 9%
  tenureYears: number;
  monthlyPrepayment?: Money;
  quarterlyPrepayment?: Money; // applied every third month
  startYear: number;
}

// One elapsed month of the amortization schedule.
export interface MonthlyRecord {
  calendarYear: number;
  monthNumber: number; // 1-based across the whole tenure
  monthOfYearAbbreviation: MonthAbbreviation;
  openingBalance: Money;
  interestPortion: Money;
  principalPortion: Money;
  prepaymentApplied: Money;
  closingBalance: Money;
}

// Roll-up of one nominal calendar year of the tenure.
export interface YearlySummary {
  year: number;
  principalSum: Money;
  prepaymentSum: Money;
  interestSum: Money;
  finalBalance: Money;
  totalPayment: Money;
  percentLoanPaid: number; // 0–100
}

// Form inputs collected before the principal is known.
export interface CarLoanInputs {
  carPrice: Money;
  downPaymentPercent: number;
  annualInterestRatePercent: number;
  tenureYears: number;
  insuranceAndFees: Money;
  startYear: number;
  monthlyPrepayment: Money;
  quarterlyPrepayment: Money;
  oneTimePrepayment: Money;
}

export interface DerivedPrincipal {
  downPaymentAmount: Money;
  principalBeforeOneTimePrepayment: Money;
  principal: Money;
}

export type CarLoanField = keyof CarLoanInputs;

export interface ValidationIssue {
  field: CarLoanField;
  message: string;
}

export interface PaymentBreakdownSlice {
  label: "Principal" | "Prepayment" | "Interest";
  amount: Money;
  share: number; // 0–1 of the total paid
}

export interface LoanTotals {
  totalPrincipal: Money;
  totalPrepayment: Money;
  totalInterest: Money;
  totalPaid: Money;
  finalBalance: Money;
  breakdown: PaymentBreakdownSlice[];
}

// Effect of periodic prepayments against the same loan without them.
export interface BaselineComparison {
  baselineInterest: Money;
  interestWithPrepayments: Money;
  interestSaved: Money;
  baselineMonths: number;
  monthsWithPrepayments: number;
  monthsSaved: number;
}

export interface CarLoanResult {
  inputs: CarLoanInputs;
  derived: DerivedPrincipal;
  terms: LoanTerms;
  monthlyInstallment: Money;
  schedule: MonthlyRecord[];
  yearly: YearlySummary[];
  totals: LoanTotals;
  comparison: BaselineComparison;
  payoffLabel: string | null; // e.g. "Mar 2026"
}

export type CarLoanCalculation =
  | { ok: true; result: CarLoanResult }
  | { ok: false; issues: ValidationIssue[] };
