// src/components/LoanSummary.tsx
//
// Headline numbers for a calculation: what was financed, the EMI, the
// totals paid and how much the prepayments saved.

import type { CSSProperties } from "react";
import type { CarLoanResult } from "../domain/loan/types";
import { formatCurrency, formatMonthsAsYearsMonths } from "../utils/format";
import { SectionCard } from "./controls";

function Metric({ label, value }: { label: string; value: string }) {
  return (
    <div style={styles.metric}>
      <span style={styles.metricLabel}>{label}</span>
      <strong>{value}</strong>
    </div>
  );
}

export default function LoanSummary({ result }: { result: CarLoanResult }) {
  const { inputs, derived, totals, comparison } = result;

  return (
    <SectionCard title="Summary">
      <div style={styles.grid}>
        <Metric label="Car Price" value={formatCurrency(inputs.carPrice)} />
        <Metric label="Down Payment" value={formatCurrency(derived.downPaymentAmount)} />
        <Metric label="Insurance / Extra Fees" value={formatCurrency(inputs.insuranceAndFees)} />
        <Metric label="One-time Prepayment" value={formatCurrency(inputs.oneTimePrepayment)} />
        <Metric label="Effective Car Loan Principal" value={formatCurrency(derived.principal)} />
        <Metric label="Monthly EMI" value={formatCurrency(result.monthlyInstallment)} />
      </div>

      <div style={styles.divider} />

      <div style={styles.grid}>
        <Metric label="Total Principal Paid" value={formatCurrency(totals.totalPrincipal)} />
        <Metric label="Total Prepayments" value={formatCurrency(totals.totalPrepayment)} />
        <Metric label="Total Interest" value={formatCurrency(totals.totalInterest)} />
        <Metric label="Paid Off" value={result.payoffLabel ?? "—"} />
        <Metric label="Interest Saved" value={formatCurrency(comparison.interestSaved)} />
        <Metric label="Time Saved" value={formatMonthsAsYearsMonths(comparison.monthsSaved)} />
      </div>

      {totals.finalBalance > 0 && (
        <div role="status" style={styles.warning}>
          {formatCurrency(totals.finalBalance)} is still outstanding at the end of the tenure.
        </div>
      )}

    </SectionCard>
  );
}

const styles: Record<string, CSSProperties> = {
  grid: {
    display: "grid",
    gridTemplateColumns: "repeat(auto-fill, minmax(200px, 1fr))",
    gap: 8,
  },
  metric: {
    display: "flex",
    flexDirection: "column",
    fontSize: 14,
  },
  metricLabel: {
    fontSize: 11,
    color: "#9ca3af",
  },
  divider: {
    borderTop: "1px solid #1f2933",
    margin: "12px 0",
  },
  warning: {
    marginTop: 8,
    fontSize: 12,
    color: "#fecaca",
  },
};
