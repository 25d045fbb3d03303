// src/components/chartColors.ts
import type { PaymentBreakdownSlice } from "../domain/loan/types";

export const SERIES_COLORS: Record<PaymentBreakdownSlice["label"], string> = {
  Principal: "#B0C4DE",
  Prepayment: "#FFB6C1",
  Interest: "#4169E1",
};

export const BALANCE_LINE_COLOR = "#e4e4e7";
