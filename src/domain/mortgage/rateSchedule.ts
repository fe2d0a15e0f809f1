// src/domain/mortgage/rateSchedule.ts
import type { FixedRatePeriodInput } from "../config";
import { InvalidConfigurationError } from "../errors";
import type { FixedRatePeriod, RateSchedule } from "./types";

/**
 * Lay the declared fixed-rate deals end to end from month 0.
 *
 * The table is small (a handful of deals at most), so lookups below
 * are linear scans in declared order.
 */
export function buildRateSchedule(
  periods: readonly FixedRatePeriodInput[],
  variableRate: number
): RateSchedule {
  const fixedPeriods: FixedRatePeriod[] = [];
  let startMonth = 0;

  periods.forEach((p, i) => {
    if (!Number.isInteger(p.months) || p.months <= 0) {
      throw new InvalidConfigurationError(
        `fixed period ${i + 1} must last a positive whole number of months`,
        [{ path: `fixedPeriods.${i}.months`, message: "must be positive" }]
      );
    }
    const endMonth = startMonth + p.months;
    fixedPeriods.push({
      index: i + 1,
      startMonth,
      endMonth,
      annualRate: p.annualRate,
    });
    startMonth = endMonth;
  });

  return { fixedPeriods, variableRate };
}

/**
 * Annual rate applying in `month`: the fixed period whose [start, end)
 * contains it, else the variable rate.
 */
export function rateAt(schedule: RateSchedule, month: number): number {
  const period = schedule.fixedPeriods.find(
    (p) => p.startMonth <= month && month < p.endMonth
  );
  return period ? period.annualRate : schedule.variableRate;
}

export function fixedPeriodEndingAt(
  schedule: RateSchedule,
  month: number
): FixedRatePeriod | undefined {
  return schedule.fixedPeriods.find((p) => p.endMonth === month);
}

// End month of the last fixed deal, or null when there are none.
export function lastFixedPeriodEnd(schedule: RateSchedule): number | null {
  const { fixedPeriods } = schedule;
  if (fixedPeriods.length === 0) return null;
  return fixedPeriods[fixedPeriods.length - 1].endMonth;
}

export function initialRate(schedule: RateSchedule): number {
  return schedule.fixedPeriods.length > 0
    ? schedule.fixedPeriods[0].annualRate
    : schedule.variableRate;
}
