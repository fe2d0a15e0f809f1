// src/domain/mortgage/overpaymentPolicy.ts
import type { SimulationConfig } from "../config";
import { SimulationInvariantError } from "../errors";
import { lastFixedPeriodEnd } from "./rateSchedule";
import type {
  FixedRatePeriod,
  Money,
  OverpaymentEvent,
  OverpaymentTrigger,
  RateSchedule,
  SimulationState,
} from "./types";

/**
 * Overpayment policy: three rules that move cash from savings to
 * principal, evaluated by the loop in this order each month:
 *
 *  1. End-of-fixed-period sweep: on the month a fixed deal ends, move
 *     everything above the emergency floor. Re-arms the annual rule.
 *  2. Variable-period sweep: after the last deal has ended (and not on
 *     a month where rule 1 fired), move everything above the floor once
 *     it reaches the minimum threshold.
 *  3. Annual allowance: once per mortgage year, move spare cash up to
 *     what is left of 10% of the balance at the start of the year.
 *
 * Each rule returns a new state and at most one event; none of them
 * touches the regular payment.
 */

export interface PolicyContext {
  config: SimulationConfig;
  schedule: RateSchedule;
}

export interface PolicyOutcome {
  state: SimulationState;
  event: OverpaymentEvent | null;
}

export const ANNUAL_ALLOWANCE_FRACTION = 0.1;

export function describeTrigger(trigger: OverpaymentTrigger): string {
  switch (trigger.kind) {
    case "end-of-fixed-period":
      return `End of fixed period ${trigger.periodIndex}`;
    case "variable-rate-period":
      return "Variable rate period";
    case "annual-allowance":
      return `Annual overpayment (Year ${trigger.year})`;
  }
}

// Allowance for a new mortgage year, measured from the balance at its first month.
export function annualAllowanceFor(balance: Money): Money {
  return ANNUAL_ALLOWANCE_FRACTION * balance;
}

function spareCash(state: SimulationState, config: SimulationConfig): Money {
  return state.savings - config.emergencyFloor;
}

function transferToPrincipal(
  state: SimulationState,
  amount: Money,
  trigger: OverpaymentTrigger
): PolicyOutcome {
  if (!(amount > 0) || amount > state.balance) {
    throw new SimulationInvariantError(
      "overpayment must be positive and no larger than the balance",
      state.month,
      { amount, balance: state.balance }
    );
  }

  const event: OverpaymentEvent = Object.freeze({
    month: state.month,
    amount,
    balanceBefore: state.balance,
    trigger,
    label: describeTrigger(trigger),
  });

  return {
    state: {
      ...state,
      balance: state.balance - amount,
      savings: state.savings - amount,
      cumulativeOverpayments: state.cumulativeOverpayments + amount,
    },
    event,
  };
}

/**
 * Rule 1. The caller has already matched `period` as ending this month.
 */
export function applyEndOfFixedPeriodSweep(
  state: SimulationState,
  period: FixedRatePeriod,
  ctx: PolicyContext
): PolicyOutcome {
  const lumpSum = Math.max(0, spareCash(state, ctx.config));
  if (lumpSum <= 0) {
    return { state, event: null };
  }

  const amount = Math.min(lumpSum, state.balance);
  if (amount <= 0) {
    return { state, event: null };
  }

  const outcome = transferToPrincipal(state, amount, {
    kind: "end-of-fixed-period",
    periodIndex: period.index,
  });

  // A sweep re-arms the annual rule for the rest of this year.
  return {
    state: { ...outcome.state, allowanceUsed: false },
    event: outcome.event,
  };
}

/**
 * Rule 2. Only months strictly after the end of the last fixed deal.
 */
export function applyVariablePeriodSweep(
  state: SimulationState,
  ctx: PolicyContext
): PolicyOutcome {
  const lastEnd = lastFixedPeriodEnd(ctx.schedule);
  if (lastEnd === null || state.month <= lastEnd) {
    return { state, event: null };
  }

  const candidate = Math.max(0, spareCash(state, ctx.config));
  if (candidate < ctx.config.minOverpaymentThreshold) {
    return { state, event: null };
  }

  const amount = Math.min(candidate, state.balance);
  if (amount <= 0) {
    return { state, event: null };
  }

  return transferToPrincipal(state, amount, { kind: "variable-rate-period" });
}

/**
 * Rule 3. Runs after the regular payment, so the balance cap is the
 * post-payment balance.
 */
export function applyAnnualAllowance(
  state: SimulationState,
  ctx: PolicyContext
): PolicyOutcome {
  const { config } = ctx;
  if (state.allowanceUsed || state.savings <= config.emergencyFloor) {
    return { state, event: null };
  }

  const spare = spareCash(state, config);
  if (spare < config.minOverpaymentThreshold) {
    return { state, event: null };
  }

  const amount = Math.min(spare, state.allowanceRemaining, state.balance);
  if (amount <= 0) {
    return { state, event: null };
  }

  const outcome = transferToPrincipal(state, amount, {
    kind: "annual-allowance",
    year: state.year + 1,
  });

  return {
    state: {
      ...outcome.state,
      allowanceUsed: true,
      allowanceRemaining: state.allowanceRemaining - amount,
    },
    event: outcome.event,
  };
}
