// src/domain/export.ts
import type { SimulationConfig } from "./config";
import type { SimulationResult } from "./mortgage/types";
import { formatCurrency } from "../utils/format";

export type ExportCell = string | number;

export interface ExportSheet {
  name: string;
  headers: string[];
  rows: ExportCell[][];
}

// Pence precision for spreadsheet cells.
function round2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

function monthToYears(month: number, digits: number): number {
  return Number((month / 12).toFixed(digits));
}

export function buildMonthlySheet(result: SimulationResult): ExportSheet {
  return {
    name: "Mortgage Simulation",
    headers: [
      "Year",
      "Mortgage Balance",
      "Savings Balance",
      "Total Overpayments",
      "Monthly Income",
      "Monthly Expenses",
      "Overpayment",
      "Available Cash",
    ],
    rows: result.records.map((r) => [
      monthToYears(r.month, 2),
      round2(r.mortgageBalance),
      round2(r.savingsBalance),
      round2(r.cumulativeOverpayments),
      round2(r.income),
      round2(r.expenses),
      round2(r.overpayment),
      round2(r.availableCash),
    ]),
  };
}

export function buildOverpaymentSheet(result: SimulationResult): ExportSheet {
  return {
    name: "Overpayments",
    headers: ["Year", "Amount", "Type"],
    rows: result.events.map((e) => [
      monthToYears(e.month, 1),
      round2(e.amount),
      e.label,
    ]),
  };
}

export function buildSummarySheet(
  config: SimulationConfig,
  result: SimulationResult
): ExportSheet {
  const { summary } = result;
  return {
    name: "Summary",
    headers: ["Metric", "Value"],
    rows: [
      ["Original Mortgage", formatCurrency(config.principal)],
      ["Mortgage Term (Years)", config.termMonths / 12],
      ["Months to Mortgage Free", summary.monthsToPayoff ?? "Not paid off"],
      ["Total Interest Paid", formatCurrency(summary.totalInterestPaid)],
      ["Interest Saved", formatCurrency(summary.interestSaved)],
      ["Final Savings Balance", formatCurrency(summary.finalSavings)],
    ],
  };
}

function escapeCell(cell: ExportCell): string {
  const text = String(cell);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Serialise one sheet as CSV: header line first, fields quoted only
 * when they contain a comma, quote or line break.
 */
export function toCsv(sheet: ExportSheet): string {
  return [sheet.headers, ...sheet.rows]
    .map((row) => row.map(escapeCell).join(","))
    .join("\n");
}
