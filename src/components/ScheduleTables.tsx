// src/components/ScheduleTables.tsx
import type { CSSProperties } from "react";
import type { MonthlyRecord, YearlySummary } from "../domain/loan/types";
import { formatCurrency, formatPercent } from "../utils/format";
import { SectionCard } from "./controls";

export function YearlyScheduleTable({ yearly }: { yearly: YearlySummary[] }) {
  return (
    <SectionCard title="Yearly Payment Schedule">
      <div style={styles.scroll}>
        <table style={styles.table}>
          <thead>
            <tr>
              <th style={styles.th}>Year</th>
              <th style={styles.th}>Principal (₹)</th>
              <th style={styles.th}>Prepayments (₹)</th>
              <th style={styles.th}>Interest (₹)</th>
              <th style={styles.th}>Total Payment (₹)</th>
              <th style={styles.th}>Balance (₹)</th>
              <th style={styles.th}>% of Loan Paid</th>
            </tr>
          </thead>
          <tbody>
            {yearly.map((y) => (
              <tr key={y.year}>
                <td style={styles.tdLeft}>{y.year}</td>
                <td style={styles.td}>{formatCurrency(y.principalSum)}</td>
                <td style={styles.td}>{formatCurrency(y.prepaymentSum)}</td>
                <td style={styles.td}>{formatCurrency(y.interestSum)}</td>
                <td style={styles.td}>{formatCurrency(y.totalPayment)}</td>
                <td style={styles.td}>{formatCurrency(y.finalBalance)}</td>
                <td style={styles.td}>{formatPercent(y.percentLoanPaid)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </SectionCard>
  );
}

export function MonthlyScheduleTable({ schedule }: { schedule: MonthlyRecord[] }) {
  if (schedule.length === 0) {
    return (
      <SectionCard title="Monthly Amortization Schedule">
        <div style={styles.emptyState}>
          No monthly data (loan is 0 or ended instantly).
        </div>
      </SectionCard>
    );
  }

  return (
    <SectionCard title="Monthly Amortization Schedule">
      <div style={{ ...styles.scroll, maxHeight: 420 }}>
        <table style={styles.table}>
          <thead>
            <tr>
              <th style={styles.th}>Year</th>
              <th style={styles.th}>Month #</th>
              <th style={styles.th}>Month</th>
              <th style={styles.th}>Opening Balance</th>
              <th style={styles.th}>Interest</th>
              <th style={styles.th}>Principal</th>
              <th style={styles.th}>Prepayment</th>
              <th style={styles.th}>Closing Balance</th>
            </tr>
          </thead>
          <tbody>
            {schedule.map((m) => (
              <tr key={m.monthNumber}>
                <td style={styles.tdLeft}>{m.calendarYear}</td>
                <td style={styles.tdLeft}>{m.monthNumber}</td>
                <td style={styles.tdLeft}>{m.monthOfYearAbbreviation}</td>
                <td style={styles.td}>{formatCurrency(m.openingBalance)}</td>
                <td style={styles.td}>{formatCurrency(m.interestPortion)}</td>
                <td style={styles.td}>{formatCurrency(m.principalPortion)}</td>
                <td style={styles.td}>{formatCurrency(m.prepaymentApplied)}</td>
                <td style={styles.td}>{formatCurrency(m.closingBalance)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </SectionCard>
  );
}

const styles: Record<string, CSSProperties> = {
  scroll: {
    overflow: "auto",
  },
  table: {
    width: "100%",
    borderCollapse: "collapse",
    fontSize: 13,
  },
  th: {
    backgroundColor: "#5DADE2",
    color: "white",
    fontWeight: "bold",
    padding: "6px 8px",
    textAlign: "right",
    position: "sticky",
    top: 0,
  },
  td: {
    padding: "4px 8px",
    textAlign: "right",
    borderBottom: "1px dashed #1f2933",
  },
  tdLeft: {
    padding: "4px 8px",
    textAlign: "left",
    borderBottom: "1px dashed #1f2933",
  },
  emptyState: {
    fontSize: 13,
    color: "#9ca3af",
  },
};
