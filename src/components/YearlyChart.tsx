// src/components/YearlyChart.tsx
//
// Stacked yearly bars (principal, interest, prepayment) with a dashed line
// for the balance left at the end of each year.

import {
  Bar,
  CartesianGrid,
  ComposedChart,
  Legend,
  Line,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import type { YearlySummary } from "../domain/loan/types";
import { formatCurrency } from "../utils/format";
import { BALANCE_LINE_COLOR, SERIES_COLORS } from "./chartColors";
import { SectionCard } from "./controls";

export interface YearlyChartDatum {
  year: string;
  principal: number;
  interest: number;
  prepayment: number;
  balance: number;
}

export function toYearlyChartData(
  yearly: readonly YearlySummary[]
): YearlyChartDatum[] {
  return yearly.map((y) => ({
    year: String(y.year),
    principal: y.principalSum,
    interest: y.interestSum,
    prepayment: y.prepaymentSum,
    balance: y.finalBalance,
  }));
}

// Compact axis ticks: 450000 → "₹4.5L", 25000 → "₹25k".
export function formatAxisAmount(value: number): string {
  if (Math.abs(value) >= 100_000) return `₹${+(value / 100_000).toFixed(1)}L`;
  if (Math.abs(value) >= 1_000) return `₹${+(value / 1_000).toFixed(0)}k`;
  return `₹${value}`;
}

export default function YearlyChart({ yearly }: { yearly: YearlySummary[] }) {
  const data = toYearlyChartData(yearly);

  return (
    <SectionCard title="Car Loan Yearly Breakdown">
      <div style={{ width: "100%", height: 320 }}>
        <ResponsiveContainer width="100%" height="100%">
          <ComposedChart data={data}>
            <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#27272a" />
            <XAxis dataKey="year" tick={{ fontSize: 12, fill: "#9ca3af" }} />
            <YAxis
              tick={{ fontSize: 12, fill: "#9ca3af" }}
              tickFormatter={formatAxisAmount}
              width={64}
            />
            <Tooltip formatter={(value) => formatCurrency(Number(value))} />
            <Legend verticalAlign="top" height={36} />
            <Bar dataKey="principal" name="Principal" stackId="paid" fill={SERIES_COLORS.Principal} />
            <Bar dataKey="interest" name="Interest" stackId="paid" fill={SERIES_COLORS.Interest} />
            <Bar dataKey="prepayment" name="Prepayment" stackId="paid" fill={SERIES_COLORS.Prepayment} />
            <Line
              type="linear"
              dataKey="balance"
              name="Remaining Balance"
              stroke={BALANCE_LINE_COLOR}
              strokeDasharray="5 5"
              dot={{ r: 3 }}
              isAnimationActive={false}
            />
          </ComposedChart>
        </ResponsiveContainer>
      </div>
    </SectionCard>
  );
}
