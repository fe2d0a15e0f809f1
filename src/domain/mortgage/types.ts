// src/domain/mortgage/types.ts

export type Money = number;

// A fixed-rate period once placed on the month axis.
export interface FixedRatePeriod {
  index: number;        // 1-based, in declared order
  startMonth: number;   // inclusive
  endMonth: number;     // exclusive
  annualRate: number;   // e.g. 0.041 for 4.1%
}

export interface RateSchedule {
  fixedPeriods: readonly FixedRatePeriod[];
  variableRate: number;
}

/**
 * Loop-owned state for one run. Each month produces a new value through
 * the transition functions; nothing outside the loop holds a reference.
 */
export interface SimulationState {
  readonly month: number;
  readonly year: number;                  // 0-based mortgage year
  readonly balance: Money;
  readonly payment: Money;                // current standard monthly payment
  readonly savings: Money;
  readonly income: Money;
  readonly expenses: Money;
  readonly totalInterest: Money;
  readonly cumulativeOverpayments: Money;
  readonly allowanceRemaining: Money;     // annual allowance left this year
  readonly allowanceUsed: boolean;
}

export type OverpaymentTrigger =
  | { kind: "end-of-fixed-period"; periodIndex: number }
  | { kind: "variable-rate-period" }
  | { kind: "annual-allowance"; year: number }; // 1-based year

export interface OverpaymentEvent {
  readonly month: number;
  readonly amount: Money;
  readonly balanceBefore: Money;
  readonly trigger: OverpaymentTrigger;
  readonly label: string;
}

// One entry per simulated month.
export interface MonthlyRecord {
  readonly month: number;
  readonly annualRate: number;
  readonly mortgageBalance: Money;
  readonly savingsBalance: Money;
  readonly savingsInterest: Money;        // after tax, credited this month
  readonly cumulativeOverpayments: Money;
  readonly income: Money;
  readonly expenses: Money;
  readonly overpayment: Money;            // all overpayments this month
  readonly availableCash: Money;          // income - expenses - mortgage payment
  readonly mortgagePayment: Money;        // interest + principal
  readonly interest: Money;
  readonly principal: Money;
}

export type SimulationOutcome = "paid-off" | "horizon-exhausted";

export interface SimulationSummary {
  readonly outcome: SimulationOutcome;
  readonly monthsToPayoff: number | null;
  readonly initialPayment: Money;
  readonly totalInterestPaid: Money;
  // Full-term interest with no overpayments at the first rate.
  readonly baselineInterest: Money;
  readonly interestSaved: Money;
  readonly finalSavings: Money;
  readonly finalBalance: Money;
  readonly totalOverpayments: Money;
}

export interface SimulationResult {
  readonly records: readonly MonthlyRecord[];
  readonly events: readonly OverpaymentEvent[];
  readonly summary: SimulationSummary;
}

// A plain amortization line for the no-overpayment baseline.
export interface AmortizationEntry {
  month: number;
  payment: Money;
  interest: Money;
  principal: Money;
  remaining: Money;
}

export interface MortgageBaselineResult {
  schedule: AmortizationEntry[];
  monthlyPayment: Money;
  totalInterest: Money;
}

export interface NoOverpaymentComparison {
  withOverpayments: SimulationResult;
  withoutOverpayments: SimulationResult;
  interestSaved: Money;
  // null when either run did not pay off within the horizon
  monthsSaved: number | null;
}
