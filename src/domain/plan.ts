// src/domain/plan.ts
import { z } from "zod";
import type { SimulationConfig } from "./config";
import { parseSimulationConfig, toConfigIssues } from "./config";
import { InvalidConfigurationError } from "./errors";

/**
 * What the user types into the planner form. Percentages are whole
 * numbers (4.1 for 4.1%), terms are in years, and the emergency fund
 * is expressed in months of income.
 */
export const PlanInputsSchema = z.object({
  currentBalance: z.number().finite().positive(),
  termYears: z.number().int().min(1).max(50),
  fixedPeriods: z
    .array(
      z.object({
        months: z.number().int().min(1).max(120),
        ratePercent: z.number().finite().min(0).max(20),
      })
    )
    .min(1)
    .max(5),
  variableRatePercent: z.number().finite().min(0).max(20),

  monthlyIncome: z.number().finite().min(0),
  monthlyExpenses: z.number().finite().min(0),
  incomeGrowthPercent: z.number().finite().min(0).max(20),
  expenseGrowthPercent: z.number().finite().min(0).max(20),

  currentSavings: z.number().finite().min(0),
  savingsRatePercent: z.number().finite().min(0).max(20),
  savingsTaxPercent: z.number().finite().min(0).max(50),
  emergencyFundMonths: z.number().finite().min(0).max(12),

  minOverpaymentThreshold: z.number().finite().min(0),
  simulationYears: z.number().int().min(1).max(50),
});

export type PlanInputs = z.infer<typeof PlanInputsSchema>;

export function createDefaultPlanInputs(): PlanInputs {
  return {
    currentBalance: 100_000,
    termYears: 25,
    fixedPeriods: [
      { months: 24, ratePercent: 4.1 },
      { months: 60, ratePercent: 3.4 },
    ],
    variableRatePercent: 5.0,
    monthlyIncome: 3_130,
    monthlyExpenses: 2_000,
    incomeGrowthPercent: 2.0,
    expenseGrowthPercent: 2.0,
    currentSavings: 16_000,
    savingsRatePercent: 3.6,
    savingsTaxPercent: 20.0,
    emergencyFundMonths: 4.0,
    minOverpaymentThreshold: 1_000,
    simulationYears: 30,
  };
}

export function parsePlanInputs(input: unknown): PlanInputs {
  const parsed = PlanInputsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = toConfigIssues(parsed.error);
    throw new InvalidConfigurationError(
      `Invalid plan: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      issues
    );
  }
  return parsed.data;
}

/**
 * Convert form inputs into engine config. The emergency floor is fixed
 * from today's income and does not grow with it.
 */
export function planToSimulationConfig(plan: PlanInputs): SimulationConfig {
  return parseSimulationConfig({
    principal: plan.currentBalance,
    termMonths: plan.termYears * 12,
    fixedPeriods: plan.fixedPeriods.map((p) => ({
      months: p.months,
      annualRate: p.ratePercent / 100,
    })),
    variableRate: plan.variableRatePercent / 100,
    monthlyIncome: plan.monthlyIncome,
    monthlyExpenses: plan.monthlyExpenses,
    incomeGrowthRate: plan.incomeGrowthPercent / 100,
    expenseGrowthRate: plan.expenseGrowthPercent / 100,
    initialSavings: plan.currentSavings,
    savingsRate: plan.savingsRatePercent / 100,
    savingsTaxRate: plan.savingsTaxPercent / 100,
    emergencyFloor: plan.monthlyIncome * plan.emergencyFundMonths,
    minOverpaymentThreshold: plan.minOverpaymentThreshold,
    horizonMonths: plan.simulationYears * 12,
  });
}
