// src/domain/mortgage/simulation.ts
import {
  parseSimulationConfig,
  type SimulationConfig,
  type SimulationConfigInput,
} from "../config";
import { SimulationInvariantError } from "../errors";
import { createChildLogger } from "../logger";
import { computeAnnuityPayment, computeFullTermInterest } from "./baseline";
import {
  annualAllowanceFor,
  applyAnnualAllowance,
  applyEndOfFixedPeriodSweep,
  applyVariablePeriodSweep,
  type PolicyContext,
  type PolicyOutcome,
} from "./overpaymentPolicy";
import {
  buildRateSchedule,
  fixedPeriodEndingAt,
  initialRate,
  rateAt,
} from "./rateSchedule";
import { accrueSavings } from "./savings";
import type {
  Money,
  MonthlyRecord,
  OverpaymentEvent,
  SimulationOutcome,
  SimulationResult,
  SimulationState,
} from "./types";

/**
 * Month-by-month simulation of a repayment mortgage and a savings pot.
 *
 * Each month runs, in order:
 *   a. terminal check (paid off / horizon reached)
 *   b. year boundary: new allowance, income and expense growth
 *   c. end-of-fixed-period sweep, then repricing at the new rate
 *   d. variable-period sweep (skipped when c matched a boundary)
 *   e. regular payment
 *   f. annual allowance overpayment
 *   g. savings accrual
 *   h. record
 *
 * The order matters: moving any step changes the numbers.
 */

const log = createChildLogger({ module: "simulation" });

// Residue left by floating point on the final scheduled payment.
const BALANCE_EPSILON = 1e-6;

interface RegularPayment {
  state: SimulationState;
  interest: Money;
  principal: Money;
}

interface MonthStep {
  state: SimulationState;
  record: MonthlyRecord;
  events: OverpaymentEvent[];
}

export function createInitialState(config: SimulationConfig): SimulationState {
  const schedule = buildRateSchedule(config.fixedPeriods, config.variableRate);
  const rate = initialRate(schedule);

  return {
    month: 0,
    year: 0,
    balance: config.principal,
    payment: computeAnnuityPayment(rate / 12, config.termMonths, config.principal),
    savings: config.initialSavings,
    income: config.monthlyIncome,
    expenses: config.monthlyExpenses,
    totalInterest: 0,
    cumulativeOverpayments: 0,
    allowanceRemaining: annualAllowanceFor(config.principal),
    allowanceUsed: false,
  };
}

function terminalOutcome(
  state: SimulationState,
  config: SimulationConfig
): SimulationOutcome | null {
  if (state.balance <= 0) return "paid-off";
  if (state.month >= config.horizonMonths) return "horizon-exhausted";
  return null;
}

/**
 * Year boundary (month divisible by 12): fresh allowance measured from
 * the balance right now, and one year of growth except on month 0.
 */
export function startOfMonth(
  state: SimulationState,
  config: SimulationConfig
): SimulationState {
  if (state.month % 12 !== 0) return state;

  const grow = state.month > 0;
  return {
    ...state,
    year: state.month / 12,
    allowanceRemaining: annualAllowanceFor(state.balance),
    allowanceUsed: false,
    income: grow ? state.income * (1 + config.incomeGrowthRate) : state.income,
    expenses: grow
      ? state.expenses * (1 + config.expenseGrowthRate)
      : state.expenses,
  };
}

/**
 * Re-amortize the current balance over what is left of the original
 * term, at the rate applying from this month.
 */
export function repricePayment(
  state: SimulationState,
  ctx: PolicyContext
): SimulationState {
  if (state.balance <= 0) return state;

  const remainingMonths = Math.max(1, ctx.config.termMonths - state.month);
  const rate = rateAt(ctx.schedule, state.month);
  return {
    ...state,
    payment: computeAnnuityPayment(rate / 12, remainingMonths, state.balance),
  };
}

export function applyRegularPayment(
  state: SimulationState,
  annualRate: number
): RegularPayment {
  const interest = state.balance * (annualRate / 12);
  const due = state.payment - interest;

  if (due < 0) {
    throw new SimulationInvariantError(
      "scheduled payment does not cover interest",
      state.month,
      { payment: state.payment, interest, balance: state.balance }
    );
  }

  let principal = Math.min(due, state.balance);
  if (state.balance - principal < BALANCE_EPSILON) {
    principal = state.balance;
  }

  return {
    state: {
      ...state,
      balance: state.balance - principal,
      totalInterest: state.totalInterest + interest,
    },
    interest,
    principal,
  };
}

function simulateMonth(current: SimulationState, ctx: PolicyContext): MonthStep {
  const { config, schedule } = ctx;
  const events: OverpaymentEvent[] = [];
  const overpaymentsEnabled = config.overpaymentsEnabled;

  const collect = (outcome: PolicyOutcome): SimulationState => {
    if (outcome.event) events.push(outcome.event);
    return outcome.state;
  };

  let state = startOfMonth(current, config);

  const endingPeriod = fixedPeriodEndingAt(schedule, state.month);
  if (endingPeriod) {
    if (overpaymentsEnabled) {
      state = collect(applyEndOfFixedPeriodSweep(state, endingPeriod, ctx));
    }
    state = repricePayment(state, ctx);
  } else if (overpaymentsEnabled) {
    state = collect(applyVariablePeriodSweep(state, ctx));
  }

  const annualRate = rateAt(schedule, state.month);
  const repayment = applyRegularPayment(state, annualRate);
  state = repayment.state;
  const mortgagePayment = repayment.interest + repayment.principal;

  if (overpaymentsEnabled) {
    state = collect(applyAnnualAllowance(state, ctx));
  }

  const availableCash = state.income - state.expenses - mortgagePayment;
  const accrual = accrueSavings(state.savings, availableCash, config);
  state = { ...state, savings: accrual.savings };

  const record: MonthlyRecord = Object.freeze({
    month: state.month,
    annualRate,
    mortgageBalance: state.balance,
    savingsBalance: state.savings,
    savingsInterest: accrual.interestEarned,
    cumulativeOverpayments: state.cumulativeOverpayments,
    income: state.income,
    expenses: state.expenses,
    overpayment: events.reduce((sum, e) => sum + e.amount, 0),
    availableCash,
    mortgagePayment,
    interest: repayment.interest,
    principal: repayment.principal,
  });

  return { state, record, events };
}

/**
 * Run one scenario to payoff or to the horizon.
 *
 * The input is validated first; an invalid config throws
 * InvalidConfigurationError before any month is simulated.
 */
export function runSimulation(
  input: SimulationConfigInput | SimulationConfig
): SimulationResult {
  const config = parseSimulationConfig(input);
  const schedule = buildRateSchedule(config.fixedPeriods, config.variableRate);
  const ctx: PolicyContext = { config, schedule };

  const records: MonthlyRecord[] = [];
  const events: OverpaymentEvent[] = [];
  let state = createInitialState(config);
  const initialPayment = state.payment;

  log.info(
    {
      principal: config.principal,
      termMonths: config.termMonths,
      horizonMonths: config.horizonMonths,
      fixedPeriods: schedule.fixedPeriods.length,
      overpaymentsEnabled: config.overpaymentsEnabled,
    },
    "simulation started"
  );

  for (;;) {
    const outcome = terminalOutcome(state, config);
    if (outcome) {
      const baselineInterest = computeFullTermInterest(
        config.principal,
        initialRate(schedule),
        config.termMonths
      );

      const result: SimulationResult = Object.freeze({
        records: Object.freeze(records),
        events: Object.freeze(events),
        summary: Object.freeze({
          outcome,
          monthsToPayoff: outcome === "paid-off" ? state.month : null,
          initialPayment,
          totalInterestPaid: state.totalInterest,
          baselineInterest,
          interestSaved: baselineInterest - state.totalInterest,
          finalSavings: state.savings,
          finalBalance: state.balance,
          totalOverpayments: state.cumulativeOverpayments,
        }),
      });

      log.info(
        {
          outcome,
          months: records.length,
          overpayments: events.length,
          totalInterestPaid: state.totalInterest,
        },
        "simulation finished"
      );
      return result;
    }

    const step = simulateMonth(state, ctx);
    for (const event of step.events) {
      log.debug(
        { month: event.month, amount: event.amount, trigger: event.trigger.kind },
        "overpayment applied"
      );
      events.push(event);
    }
    records.push(step.record);
    state = { ...step.state, month: state.month + 1 };
  }
}
