// src/components/CarLoanTab.tsx
//
// The car loan calculator: collects the purchase and loan inputs, runs
// the amortization engine when the user asks for it and shows the
// summary, the yearly chart and both schedule tables.

import { useState } from "react";
import { runCarLoanCalculation } from "../domain/loan";
import type {
  CarLoanField,
  CarLoanInputs,
  CarLoanResult,
  ValidationIssue,
} from "../domain/loan/types";
import { DEFAULT_CAR_LOAN_INPUTS } from "../config/loanDefaults";
import LoanInputForm, {
  fromFormValues,
  toFormValues,
  type CarLoanFormValues,
} from "./LoanInputForm";
import LoanSummary from "./LoanSummary";
import PaymentPieChart from "./PaymentPieChart";
import YearlyChart from "./YearlyChart";
import { MonthlyScheduleTable, YearlyScheduleTable } from "./ScheduleTables";

export default function CarLoanTab({
  initialInputs = DEFAULT_CAR_LOAN_INPUTS,
}: {
  initialInputs?: CarLoanInputs;
}) {
  const [values, setValues] = useState<CarLoanFormValues>(() =>
    toFormValues(initialInputs)
  );
  const [issues, setIssues] = useState<ValidationIssue[]>([]);
  const [result, setResult] = useState<CarLoanResult | null>(null);

  function updateField(field: CarLoanField, value: string) {
    setValues((v) => ({ ...v, [field]: value }));
  }

  function calculate() {
    const outcome = runCarLoanCalculation(fromFormValues(values));
    if (outcome.ok) {
      setIssues([]);
      setResult(outcome.result);
    } else {
      setIssues(outcome.issues);
      setResult(null);
    }
  }

  return (
    <div>
      <LoanInputForm
        values={values}
        issues={issues}
        onChange={updateField}
        onCalculate={calculate}
      />

      {result && (
        <>
          <LoanSummary result={result} />
          <PaymentPieChart breakdown={result.totals.breakdown} />
          <YearlyChart yearly={result.yearly} />
          <YearlyScheduleTable yearly={result.yearly} />
          <MonthlyScheduleTable schedule={result.schedule} />
        </>
      )}
    </div>
  );
}
