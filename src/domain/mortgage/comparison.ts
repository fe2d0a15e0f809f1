// src/domain/mortgage/comparison.ts
import type { SimulationConfig, SimulationConfigInput } from "../config";
import { runSimulation } from "./simulation";
import type { NoOverpaymentComparison, SimulationResult } from "./types";

/**
 * Run a plan as given and again with the overpayment policy switched
 * off, everything else equal.
 */
export function compareWithoutOverpayments(
  config: SimulationConfigInput | SimulationConfig
): NoOverpaymentComparison {
  const withOverpayments: SimulationResult = runSimulation(config);
  const withoutOverpayments: SimulationResult = runSimulation({
    ...config,
    overpaymentsEnabled: false,
  });

  const interestSaved =
    withoutOverpayments.summary.totalInterestPaid -
    withOverpayments.summary.totalInterestPaid;

  const withMonths = withOverpayments.summary.monthsToPayoff;
  const withoutMonths = withoutOverpayments.summary.monthsToPayoff;
  const monthsSaved =
    withMonths !== null && withoutMonths !== null
      ? withoutMonths - withMonths
      : null;

  return {
    withOverpayments,
    withoutOverpayments,
    interestSaved,
    monthsSaved,
  };
}
