// src/domain/mortgage/savings.test.ts
import { describe, it, expect } from "vitest";
import { accrueSavings } from "./savings";

describe("savings accrual", () => {
  const terms = { savingsRate: 0.036, savingsTaxRate: 0.2 };

  it("adds after-tax interest on the pre-deposit balance plus the surplus", () => {
    const result = accrueSavings(12_000, 500, terms);

    // 12,000 * 0.003 * 0.8 = 28.8
    expect(result.interestEarned).toBeCloseTo(28.8, 10);
    expect(result.savings).toBeCloseTo(12_528.8, 10);
  });

  it("leaves savings untouched in a deficit month", () => {
    const result = accrueSavings(12_000, -250, terms);
    expect(result).toEqual({ savings: 12_000, interestEarned: 0 });
  });

  it("leaves savings untouched when the month breaks even", () => {
    expect(accrueSavings(12_000, 0, terms).savings).toBe(12_000);
  });

  it("earns nothing at a zero savings rate", () => {
    const result = accrueSavings(5_000, 100, { savingsRate: 0, savingsTaxRate: 0 });
    expect(result.savings).toBe(5_100);
    expect(result.interestEarned).toBe(0);
  });
});
