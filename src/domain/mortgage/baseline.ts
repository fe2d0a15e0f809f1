// src/domain/mortgage/baseline.ts
import type {
  AmortizationEntry,
  MortgageBaselineResult,
  Money,
} from "./types";

const BALANCE_EPSILON = 1e-6;

/**
 * Level monthly payment that amortizes `principal` to zero after
 * `remainingMonths` payments at `monthlyRate` per period.
 */
export function computeAnnuityPayment(
  monthlyRate: number,
  remainingMonths: number,
  principal: Money
): Money {
  if (remainingMonths <= 0) {
    throw new Error("remainingMonths must be positive");
  }
  if (principal <= 0) {
    return 0;
  }

  if (monthlyRate === 0) {
    // No interest: simple division.
    return principal / remainingMonths;
  }

  // Negative exponent: (1 + r)^-n tends to 0 for long terms instead of
  // overflowing to Infinity.
  const r = monthlyRate;
  const n = remainingMonths;
  return (principal * r) / (1 - Math.pow(1 + r, -n));
}

/**
 * Interest paid over the full term with no overpayments at a single
 * annual rate: total of all level payments less the principal.
 */
export function computeFullTermInterest(
  principal: Money,
  annualRate: number,
  termMonths: number
): Money {
  const payment = computeAnnuityPayment(annualRate / 12, termMonths, principal);
  return payment * termMonths - principal;
}

/**
 * Build the flat-rate amortization schedule assuming no overpayments.
 */
export function computeBaselineSchedule(
  principal: Money,
  annualRate: number,
  termMonths: number
): MortgageBaselineResult {
  const r = annualRate / 12;
  const payment = computeAnnuityPayment(r, termMonths, principal);
  const schedule: AmortizationEntry[] = [];

  let remaining = principal;

  for (let month = 0; month < termMonths && remaining > BALANCE_EPSILON; month++) {
    const interest = r > 0 ? remaining * r : 0;
    const principalPaid = Math.min(payment - interest, remaining);
    remaining = remaining - principalPaid;
    if (remaining < BALANCE_EPSILON) remaining = 0;

    schedule.push({
      month,
      payment: interest + principalPaid,
      interest,
      principal: principalPaid,
      remaining,
    });
  }

  const totalInterest = schedule.reduce((sum, e) => sum + e.interest, 0);

  return {
    schedule,
    monthlyPayment: payment,
    totalInterest,
  };
}
