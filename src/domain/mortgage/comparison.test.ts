// src/domain/mortgage/comparison.test.ts
import { describe, it, expect } from "vitest";
import { compareWithoutOverpayments } from "./comparison";

describe("compareWithoutOverpayments", () => {
  const config = {
    principal: 100_000,
    termMonths: 300,
    fixedPeriods: [{ months: 24, annualRate: 0.041 }],
    variableRate: 0.05,
    monthlyIncome: 3_130,
    monthlyExpenses: 2_000,
    initialSavings: 16_000,
    savingsRate: 0.036,
    savingsTaxRate: 0.2,
    emergencyFloor: 12_520,
    minOverpaymentThreshold: 1_000,
    horizonMonths: 360,
  };

  it("reports interest and time saved by the policy", () => {
    const comparison = compareWithoutOverpayments(config);

    expect(comparison.withOverpayments.summary.monthsToPayoff).toBe(102);
    expect(comparison.withoutOverpayments.summary.monthsToPayoff).toBe(300);
    expect(comparison.monthsSaved).toBe(198);
    expect(comparison.interestSaved).toBeCloseTo(73209.33 - 20470.14, 1);
  });

  it("leaves time saved unknown when either run misses payoff", () => {
    const comparison = compareWithoutOverpayments({ ...config, horizonMonths: 60 });

    expect(comparison.withoutOverpayments.summary.outcome).toBe("horizon-exhausted");
    expect(comparison.monthsSaved).toBeNull();
  });
});
