// src/utils/format.ts
//
// Display helpers shared by the report, the charts, the CSV export and
// the form. Amounts are shown in pounds with no pence.

import type { SimulationSummary } from "../domain/mortgage/types";

const EM_DASH = "—";

/**
 * Format a currency value into a GBP string with no fractional digits.
 * Null or NaN values are rendered as an em dash.
 */
export function formatCurrency(value: number | null | undefined): string {
  if (value == null || Number.isNaN(value)) return EM_DASH;
  return value.toLocaleString("en-GB", {
    style: "currency",
    currency: "GBP",
    maximumFractionDigits: 0,
  });
}

// 0.041 -> "4.10%"
export function formatPercent(value: number | null | undefined): string {
  if (value == null || Number.isNaN(value)) return EM_DASH;
  return `${(value * 100).toFixed(2)}%`;
}

/**
 * Convert a number of months into years and months, e.g. 34 →
 * "2 yrs 10 mos". Zero or negative values return an em dash.
 */
export function formatMonthsAsYearsMonths(
  totalMonths: number | null | undefined
): string {
  if (totalMonths == null || !Number.isFinite(totalMonths) || totalMonths <= 0) {
    return EM_DASH;
  }
  const months = Math.floor(totalMonths);
  const years = Math.floor(months / 12);
  const remainingMonths = months % 12;

  const parts: string[] = [];
  if (years > 0) {
    parts.push(`${years} yr${years === 1 ? "" : "s"}`);
  }
  if (remainingMonths > 0) {
    parts.push(`${remainingMonths} mo${remainingMonths === 1 ? "" : "s"}`);
  }

  return parts.join(" ");
}

export function describePayoff(
  summary: Pick<SimulationSummary, "outcome" | "monthsToPayoff">,
  horizonMonths: number
): string {
  if (summary.outcome === "paid-off" && summary.monthsToPayoff !== null) {
    return `Mortgage-free in ${formatMonthsAsYearsMonths(summary.monthsToPayoff)}`;
  }
  return `Not paid off within ${formatMonthsAsYearsMonths(horizonMonths)}`;
}
