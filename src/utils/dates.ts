/**
 * Month labels used by the schedule and the UI. Months are always shown
 * in their three letter English form (Jan … Dec) regardless of locale so
 * that tables line up.
 */
import type { MonthAbbreviation } from "../domain/loan/types";

const MONTH_ABBREVIATIONS: readonly MonthAbbreviation[] = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

/**
 * Short month name for a zero-based month index. Indexes outside 0–11
 * wrap around, so 12 is "Jan" again and -1 is "Dec".
 */
export function monthAbbreviation(monthIndex: number): MonthAbbreviation {
  const i = ((Math.trunc(monthIndex) % 12) + 12) % 12;
  return MONTH_ABBREVIATIONS[i];
}

/**
 * Label a schedule month as "Mar 2026".
 */
export function formatMonthYear(
  month: MonthAbbreviation,
  year: number
): string {
  return `${month} ${year}`;
}
