// src/domain/mortgage/savings.ts
import type { Money } from "./types";

export interface SavingsTerms {
  savingsRate: number;      // annual, e.g. 0.036
  savingsTaxRate: number;   // fraction of interest withheld
}

export interface SavingsAccrual {
  savings: Money;
  interestEarned: Money;
}

/**
 * Month-end savings step. Interest is taken on the balance before the
 * deposit and only in months with a surplus; a deficit leaves savings
 * untouched (no automatic drawdown).
 */
export function accrueSavings(
  savings: Money,
  availableCash: Money,
  terms: SavingsTerms
): SavingsAccrual {
  if (availableCash <= 0) {
    return { savings, interestEarned: 0 };
  }

  const monthlyRate = terms.savingsRate / 12;
  const interestEarned = savings * monthlyRate * (1 - terms.savingsTaxRate);

  return {
    savings: savings + interestEarned + availableCash,
    interestEarned,
  };
}
