// Display formatting shared by the summary, charts and tables.

// Format an amount in Indian rupees with Indian digit grouping and no
// fractional digits, e.g. 450000 → "₹4,50,000". Null or NaN values are
// rendered as an em dash.
export function formatCurrency(value: number | null | undefined): string {
  if (value == null || Number.isNaN(value)) return "—";
  return value.toLocaleString("en-IN", {
    style: "currency",
    currency: "INR",
    minimumFractionDigits: 0,
    maximumFractionDigits: 0,
  });
}

// Format a value that is already a percentage (0–100) with two
// fractional digits, e.g. 45 → "45.00%".
export function formatPercent(value: number | null | undefined): string {
  if (value == null || Number.isNaN(value)) return "—";
  return `${value.toFixed(2)}%`;
}

// Describe a number of months as "2 years 10 months", "3 years" or
// "5 months". Anything under one month returns an em dash.
export function formatMonthsAsYearsMonths(
  totalMonths: number | null | undefined
): string {
  if (totalMonths == null || !Number.isFinite(totalMonths) || totalMonths < 1) {
    return "—";
  }
  const plural = (n: number, unit: string) => `${n} ${unit}${n === 1 ? "" : "s"}`;
  const months = Math.floor(totalMonths);
  const years = Math.floor(months / 12);
  const rest = months % 12;

  if (years === 0) return plural(rest, "month");
  if (rest === 0) return plural(years, "year");
  return `${plural(years, "year")} ${plural(rest, "month")}`;
}

// Rupee amounts are typed with Indian digit grouping ("5,00,000") and
// sometimes with the currency sign; both are stripped before parsing.
const AMOUNT_NOISE = /[₹,\s]/g;

// Returns null for empty or non-numeric input.
export function parseNumber(value: string): number | null {
  const cleaned = value.replace(AMOUNT_NOISE, "");
  if (cleaned === "") return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}
