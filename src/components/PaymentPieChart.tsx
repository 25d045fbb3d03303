// src/components/PaymentPieChart.tsx
import { Cell, Legend, Pie, PieChart, ResponsiveContainer, Tooltip } from "recharts";
import type { PaymentBreakdownSlice } from "../domain/loan/types";
import { formatCurrency, formatPercent } from "../utils/format";
import { SERIES_COLORS } from "./chartColors";
import { SectionCard } from "./controls";

export interface PieDatum {
  name: PaymentBreakdownSlice["label"];
  value: number;
}

// Empty slices are left out so the pie has no zero-width wedges or labels.
export function toPieData(breakdown: readonly PaymentBreakdownSlice[]): PieDatum[] {
  return breakdown
    .filter((s) => s.amount > 0)
    .map((s) => ({ name: s.label, value: s.amount }));
}

function sliceLabel({ name, percent }: { name?: string; percent?: number }): string {
  return `${name ?? ""} ${formatPercent((percent ?? 0) * 100)}`;
}

export default function PaymentPieChart({
  breakdown,
}: {
  breakdown: PaymentBreakdownSlice[];
}) {
  const data = toPieData(breakdown);

  return (
    <SectionCard title="Car EMI Payment Breakdown">
      {data.length === 0 ? (
        <div style={{ fontSize: 13, color: "#9ca3af" }}>Nothing was paid.</div>
      ) : (
        <div style={{ width: "100%", height: 280 }}>
          <ResponsiveContainer width="100%" height="100%">
            <PieChart>
              <Pie
                data={data}
                dataKey="value"
                nameKey="name"
                startAngle={140}
                endAngle={500}
                outerRadius={90}
                label={sliceLabel}
                isAnimationActive={false}
              >
                {data.map((d) => (
                  <Cell key={d.name} fill={SERIES_COLORS[d.name]} />
                ))}
              </Pie>
              <Tooltip formatter={(value) => formatCurrency(Number(value))} />
              <Legend verticalAlign="bottom" height={24} />
            </PieChart>
          </ResponsiveContainer>
        </div>
      )}
    </SectionCard>
  );
}
