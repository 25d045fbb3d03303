// src/domain/loan/yearly.test.ts
import { aggregateYearly } from "./yearly";
import { buildSchedule } from "./schedule";
import type { MonthlyRecord } from "./types";

function record(partial: Partial<MonthlyRecord>): MonthlyRecord {
  return {
    calendarYear: 2024,
    monthNumber: 1,
    monthOfYearAbbreviation: "Jan",
    openingBalance: 0,
    interestPortion: 0,
    principalPortion: 0,
    prepaymentApplied: 0,
    closingBalance: 0,
    ...partial,
  };
}

const handMade: MonthlyRecord[] = [
  record({
    monthNumber: 1,
    openingBalance: 1_000,
    interestPortion: 10,
    principalPortion: 100,
    prepaymentApplied: 50,
    closingBalance: 850,
  }),
  record({
    monthNumber: 2,
    monthOfYearAbbreviation: "Feb",
    openingBalance: 850,
    interestPortion: 8,
    principalPortion: 100,
    closingBalance: 750,
  }),
  record({
    calendarYear: 2025,
    monthNumber: 13,
    openingBalance: 750,
    interestPortion: 5,
    principalPortion: 200,
    closingBalance: 550,
  }),
];

describe("aggregateYearly", () => {
  test("sums each year and keeps the last closing balance", () => {
    const yearly = aggregateYearly(handMade, 2024, 3);

    expect(yearly.map((y) => y.year)).toEqual([2024, 2025, 2026]);
    expect(yearly[0]).toMatchObject({
      principalSum: 200,
      prepaymentSum: 50,
      interestSum: 18,
      finalBalance: 750,
      totalPayment: 268,
    });
    expect(yearly[0].percentLoanPaid).toBeCloseTo(25, 10);
    expect(yearly[1]).toMatchObject({
      principalSum: 200,
      prepaymentSum: 0,
      interestSum: 5,
      finalBalance: 550,
      totalPayment: 205,
    });
    expect(yearly[1].percentLoanPaid).toBeCloseTo(45, 10);
  });

  test("pads years after payoff with zeros and 100% paid", () => {
    const yearly = aggregateYearly(handMade, 2024, 3);

    expect(yearly[2]).toEqual({
      year: 2026,
      principalSum: 0,
      prepaymentSum: 0,
      interestSum: 0,
      finalBalance: 0,
      totalPayment: 0,
      percentLoanPaid: 100,
    });
  });

  test("measures percent paid against an explicit initial principal", () => {
    const yearly = aggregateYearly(handMade, 2024, 2, 2_000);

    expect(yearly[0].percentLoanPaid).toBeCloseTo(12.5, 10);
    expect(yearly[1].percentLoanPaid).toBeCloseTo(22.5, 10);
  });

  test("clamps percent paid at 100", () => {
    const yearly = aggregateYearly(handMade, 2024, 2, 300);

    expect(yearly[0].percentLoanPaid).toBe(83.33333333333334);
    expect(yearly[1].percentLoanPaid).toBe(100);
  });

  test("returns zeroed rows at 100% for an empty schedule", () => {
    const yearly = aggregateYearly([], 2024, 5);

    expect(yearly.length).toBe(5);
    for (const y of yearly) {
      expect(y.principalSum).toBe(0);
      expect(y.prepaymentSum).toBe(0);
      expect(y.interestSum).toBe(0);
      expect(y.finalBalance).toBe(0);
      expect(y.totalPayment).toBe(0);
      expect(y.percentLoanPaid).toBe(100);
    }
  });

  test("treats a zero initial principal as fully paid", () => {
    const yearly = aggregateYearly(handMade, 2024, 2, 0);
    expect(yearly.map((y) => y.percentLoanPaid)).toEqual([100, 100]);
  });

  test("floors a negative year-end balance at zero", () => {
    const yearly = aggregateYearly(
      [record({ openingBalance: 100, principalPortion: 105, closingBalance: -5 })],
      2024,
      1
    );

    expect(yearly[0].finalBalance).toBe(0);
    expect(yearly[0].percentLoanPaid).toBe(100);
  });

  test("ignores records outside the nominal tenure window", () => {
    const yearly = aggregateYearly(
      [...handMade, record({ calendarYear: 2030, principalPortion: 999 })],
      2024,
      2
    );

    expect(yearly.length).toBe(2);
    expect(yearly[1].principalSum).toBe(200);
  });

  test("returns nothing for a zero tenure", () => {
    expect(aggregateYearly(handMade, 2024, 0)).toEqual([]);
  });

  test("always has one row per tenure year when prepayments end the loan early", () => {
    const schedule = buildSchedule({
      principal: 200_000,
      annualInterestRatePercent: 9,
      tenureYears: 5,
      monthlyPrepayment: 5_000,
      startYear: 2024,
    });
    const yearly = aggregateYearly(schedule, 2024, 5);

    expect(schedule.length).toBeLessThan(60);
    expect(yearly.length).toBe(5);
    expect(yearly[1].finalBalance).toBe(0);
    expect(yearly[1].percentLoanPaid).toBe(100);
    for (const y of yearly.slice(2)) {
      expect(y.totalPayment).toBe(0);
      expect(y.finalBalance).toBe(0);
      expect(y.percentLoanPaid).toBe(100);
    }
  });

  test("percent paid never decreases and reaches 100 in the payoff year", () => {
    const schedule = buildSchedule({
      principal: 450_000,
      annualInterestRatePercent: 9,
      tenureYears: 5,
      startYear: 2024,
    });
    const yearly = aggregateYearly(schedule, 2024, 5);

    for (let i = 1; i < yearly.length; i++) {
      expect(yearly[i].percentLoanPaid).toBeGreaterThanOrEqual(
        yearly[i - 1].percentLoanPaid
      );
    }
    expect(yearly[3].percentLoanPaid).toBeLessThan(100);
    expect(yearly[4].finalBalance).toBe(0);
    expect(yearly[4].percentLoanPaid).toBe(100);
  });

  test("first year totals match the first twelve monthly records", () => {
    const schedule = buildSchedule({
      principal: 450_000,
      annualInterestRatePercent: 9,
      tenureYears: 5,
      startYear: 2024,
    });
    const [first] = aggregateYearly(schedule, 2024, 5);

    expect(first.principalSum).toBeCloseTo(74_623.51, 2);
    expect(first.interestSum).toBeCloseTo(37_471.61, 2);
    expect(first.finalBalance).toBeCloseTo(375_376.49, 2);
    expect(first.totalPayment).toBeCloseTo(first.principalSum + first.interestSum, 8);
  });
});
