// src/components/SimulationReport.test.tsx
import { describe, it, expect } from "vitest";
import { renderToStaticMarkup } from "react-dom/server";
import { parseSimulationConfig } from "../domain/config";
import { compareWithoutOverpayments } from "../domain/mortgage";
import SimulationReport, { yearEndRecords } from "./SimulationReport";

const config = parseSimulationConfig({
  principal: 100_000,
  termMonths: 300,
  fixedPeriods: [{ months: 24, annualRate: 0.041 }],
  variableRate: 0.05,
  monthlyIncome: 3_130,
  monthlyExpenses: 2_000,
  initialSavings: 16_000,
  savingsRate: 0.036,
  savingsTaxRate: 0.2,
  emergencyFloor: 12_520,
  minOverpaymentThreshold: 1_000,
  horizonMonths: 360,
});

describe("SimulationReport", () => {
  const comparison = compareWithoutOverpayments(config);

  it("keeps the last month of each year plus the final month", () => {
    const rows = yearEndRecords(comparison.withOverpayments.records);
    expect(rows.map((r) => r.month)).toEqual([11, 23, 35, 47, 59, 71, 83, 95, 101]);
  });

  it("shows the payoff, the comparison and the overpayment schedule", () => {
    const html = renderToStaticMarkup(
      <SimulationReport config={config} comparison={comparison} />
    );

    expect(html).toContain(">Mortgage-free in 8 yrs 6 mos<");
    expect(html).toContain(">Mortgage-free in 25 yrs<");
    expect(html).toContain(">16 yrs 6 mos<");
    expect(html).toContain(">End of fixed period 1<");
    expect(html).toContain(">Annual overpayment (Year 2)<");
  });

  it("says when no overpayments were made", () => {
    const noSpareCash = compareWithoutOverpayments({
      ...config,
      initialSavings: 0,
      monthlyIncome: 2_000,
    });
    const html = renderToStaticMarkup(
      <SimulationReport config={config} comparison={noSpareCash} />
    );

    expect(html).toContain("No overpayments were made.");
    expect(html).toContain(">Mortgage-free in 25 yrs<");
    expect(noSpareCash.monthsSaved).toBe(0);
  });
});
