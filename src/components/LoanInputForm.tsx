// src/components/LoanInputForm.tsx
import type { CSSProperties } from "react";
import type { CarLoanField, CarLoanInputs, ValidationIssue } from "../domain/loan/types";
import { CAR_LOAN_LIMITS, INPUT_STEPS } from "../config/loanDefaults";
import { parseNumber } from "../utils/format";
import { LabeledNumberInput, SectionCard } from "./controls";

export type CarLoanFormValues = Record<CarLoanField, string>;

export function toFormValues(inputs: CarLoanInputs): CarLoanFormValues {
  return {
    carPrice: String(inputs.carPrice),
    downPaymentPercent: String(inputs.downPaymentPercent),
    annualInterestRatePercent: String(inputs.annualInterestRatePercent),
    tenureYears: String(inputs.tenureYears),
    insuranceAndFees: String(inputs.insuranceAndFees),
    startYear: String(inputs.startYear),
    monthlyPrepayment: String(inputs.monthlyPrepayment),
    quarterlyPrepayment: String(inputs.quarterlyPrepayment),
    oneTimePrepayment: String(inputs.oneTimePrepayment),
  };
}

// Empty or unparsable fields become NaN so that validation reports them.
export function fromFormValues(values: CarLoanFormValues): CarLoanInputs {
  const num = (field: CarLoanField) => parseNumber(values[field]) ?? Number.NaN;
  return {
    carPrice: num("carPrice"),
    downPaymentPercent: num("downPaymentPercent"),
    annualInterestRatePercent: num("annualInterestRatePercent"),
    tenureYears: num("tenureYears"),
    insuranceAndFees: num("insuranceAndFees"),
    startYear: num("startYear"),
    monthlyPrepayment: num("monthlyPrepayment"),
    quarterlyPrepayment: num("quarterlyPrepayment"),
    oneTimePrepayment: num("oneTimePrepayment"),
  };
}

const LOAN_FIELDS: { field: CarLoanField; label: string; min?: number; max?: number }[] = [
  { field: "carPrice", label: "Car Price (₹)", min: CAR_LOAN_LIMITS.minCarPrice },
  {
    field: "downPaymentPercent",
    label: "Down Payment (%)",
    min: CAR_LOAN_LIMITS.minDownPaymentPercent,
    max: CAR_LOAN_LIMITS.maxDownPaymentPercent,
  },
  { field: "annualInterestRatePercent", label: "Annual Interest Rate (%)", min: 0 },
  {
    field: "tenureYears",
    label: "Loan Tenure (Years)",
    min: CAR_LOAN_LIMITS.minTenureYears,
    max: CAR_LOAN_LIMITS.maxTenureYears,
  },
  { field: "insuranceAndFees", label: "Insurance / Extra Fees (₹)", min: 0 },
  {
    field: "startYear",
    label: "Starting Year",
    min: CAR_LOAN_LIMITS.minStartYear,
    max: CAR_LOAN_LIMITS.maxStartYear,
  },
];

const PREPAYMENT_FIELDS: { field: CarLoanField; label: string }[] = [
  { field: "monthlyPrepayment", label: "Monthly Prepayment (₹)" },
  { field: "quarterlyPrepayment", label: "Quarterly Prepayment (₹)" },
  { field: "oneTimePrepayment", label: "One-time Prepayment (₹)" },
];

export default function LoanInputForm({
  values,
  issues,
  onChange,
  onCalculate,
}: {
  values: CarLoanFormValues;
  issues: ValidationIssue[];
  onChange: (field: CarLoanField, value: string) => void;
  onCalculate: () => void;
}) {
  const errorFor = (field: CarLoanField) =>
    issues.find((i) => i.field === field)?.message;

  return (
    <>
      <SectionCard title="Car Details & Loan Parameters">
        <div style={{ display: "flex", flexWrap: "wrap", gap: 8 }}>
          {LOAN_FIELDS.map(({ field, label, min, max }) => (
            <LabeledNumberInput
              key={field}
              id={field}
              label={label}
              value={values[field]}
              onChange={(v) => onChange(field, v)}
              min={min}
              max={max}
              step={INPUT_STEPS[field]}
              error={errorFor(field)}
            />
          ))}
        </div>
      </SectionCard>

      <SectionCard title="Prepayments" subtitle="Quarterly prepayments are made every third month">
        <div style={{ display: "flex", flexWrap: "wrap", gap: 8 }}>
          {PREPAYMENT_FIELDS.map(({ field, label }) => (
            <LabeledNumberInput
              key={field}
              id={field}
              label={label}
              value={values[field]}
              onChange={(v) => onChange(field, v)}
              min={0}
              step={INPUT_STEPS[field]}
              error={errorFor(field)}
            />
          ))}
        </div>
      </SectionCard>

      <button type="button" onClick={onCalculate} style={calculateButton}>
        Calculate EMI
      </button>
    </>
  );
}

const calculateButton: CSSProperties = {
  padding: "8px 16px",
  fontSize: 14,
  borderRadius: 999,
  border: "none",
  background: "#3b82f6",
  color: "#f9fafb",
  marginBottom: 12,
  cursor: "pointer",
};
