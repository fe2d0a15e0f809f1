// src/domain/config.ts
import { z } from "zod";
import { InvalidConfigurationError, type ConfigIssue } from "./errors";

const rate = z
  .number()
  .finite()
  .min(0, "rate must not be negative")
  .lt(1, "rate must be a fraction below 1");

const money = z.number().finite().min(0, "amount must not be negative");

const wholeMonths = z
  .number()
  .int("must be a whole number of months")
  .positive("must be positive");

// Terms and horizons longer than 50 years are rejected up front.
const MAX_TERM_MONTHS = 600;

const boundedMonths = wholeMonths.max(
  MAX_TERM_MONTHS,
  `must be at most ${MAX_TERM_MONTHS} months`
);

/**
 * One declared fixed-rate deal: how long it lasts and its annual rate.
 * Start/end months are derived by the rate schedule, not declared.
 */
export const FixedRatePeriodInputSchema = z.object({
  months: wholeMonths,
  annualRate: rate,
});

export type FixedRatePeriodInput = z.infer<typeof FixedRatePeriodInputSchema>;

/**
 * Everything one simulation run needs. Rates are fractions (0.041 for
 * 4.1%), cash amounts are monthly unless named otherwise.
 */
export const SimulationConfigSchema = z.object({
  principal: z.number().finite().positive("principal must be positive"),
  termMonths: boundedMonths,
  fixedPeriods: z.array(FixedRatePeriodInputSchema).max(12).default([]),
  variableRate: rate,

  monthlyIncome: money,
  monthlyExpenses: money,
  incomeGrowthRate: rate.default(0),
  expenseGrowthRate: rate.default(0),

  initialSavings: money,
  savingsRate: rate.default(0),
  savingsTaxRate: rate.default(0),

  emergencyFloor: money,
  minOverpaymentThreshold: money,
  horizonMonths: boundedMonths,

  /** When false the policy never fires; rate changes still reprice the payment. */
  overpaymentsEnabled: z.boolean().default(true),
});

type ParsedSimulationConfig = z.infer<typeof SimulationConfigSchema>;

export type SimulationConfig = Readonly<
  Omit<ParsedSimulationConfig, "fixedPeriods">
> & {
  readonly fixedPeriods: readonly Readonly<FixedRatePeriodInput>[];
};
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;

export function toConfigIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
  }));
}

/**
 * Validate raw input and return a frozen config, or throw
 * InvalidConfigurationError listing every offending field.
 */
export function parseSimulationConfig(input: unknown): SimulationConfig {
  const parsed = SimulationConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = toConfigIssues(parsed.error);
    const summary = issues.map((i) => `${i.path}: ${i.message}`).join("; ");
    throw new InvalidConfigurationError(
      `Invalid simulation config: ${summary}`,
      issues
    );
  }

  const config = parsed.data;
  return Object.freeze({
    ...config,
    fixedPeriods: Object.freeze(
      config.fixedPeriods.map((p) => Object.freeze({ ...p }))
    ),
  });
}
