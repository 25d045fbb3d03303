// src/domain/loan/index.ts
export { computeMonthlyInstallment, monthlyRateFromAnnualPercent } from "./emi";
export { buildSchedule } from "./schedule";
export { aggregateYearly } from "./yearly";
export { deriveLoanPrincipal, toLoanTerms } from "./purchase";
export { validateCarLoanInputs } from "./validation";
export { summarizeLoan } from "./summary";
export { compareWithBaseline } from "./comparison";
export { runCarLoanCalculation } from "./calculator";
export type * from "./types";
