// src/domain/mortgage/index.ts
export * from "./types";
export {
  computeAnnuityPayment,
  computeFullTermInterest,
  computeBaselineSchedule,
} from "./baseline";
export {
  buildRateSchedule,
  rateAt,
  fixedPeriodEndingAt,
  lastFixedPeriodEnd,
  initialRate,
} from "./rateSchedule";
export {
  ANNUAL_ALLOWANCE_FRACTION,
  describeTrigger,
  applyEndOfFixedPeriodSweep,
  applyVariablePeriodSweep,
  applyAnnualAllowance,
  type PolicyContext,
  type PolicyOutcome,
} from "./overpaymentPolicy";
export { accrueSavings, type SavingsTerms } from "./savings";
export { runSimulation, createInitialState } from "./simulation";
export { compareWithoutOverpayments } from "./comparison";
