// src/components/BalanceCharts.test.tsx
import { describe, it, expect } from "vitest";
import { renderToStaticMarkup } from "react-dom/server";
import { parseSimulationConfig } from "../domain/config";
import { computeBaselineSchedule, runSimulation } from "../domain/mortgage";
import BalanceCharts, { toChartPoints } from "./BalanceCharts";

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
const result = runSimulation(config);

describe("toChartPoints", () => {
  const baseline = computeBaselineSchedule(100_000, 0.041, 300);
  const points = toChartPoints(result.records, baseline);

  it("maps every monthly record to a point on a years axis", () => {
    expect(points.length).toBe(102);
    expect(points[0].year).toBe(0);
    expect(points[18].year).toBe(1.5);
    expect(points[101].year).toBe(8.42);
  });

  it("carries the four panels' series from the records", () => {
    const first = points[0];
    expect(first.mortgage).toBeCloseTo(96328.29, 2);
    expect(first.savings).toBeCloseTo(13146.67, 2);
    expect(first.totalOverpayments).toBe(3_480);
    expect(first.overpayment).toBe(3_480);
    expect(first.income).toBe(3_130);
    expect(first.expenses).toBe(2_000);
    expect(first.availableCash).toBeCloseTo(596.63, 2);
  });

  it("sets the original schedule beside the overpaid balance", () => {
    // Month 0 of the opening-rate schedule: one regular payment, no overpayment.
    expect(points[0].originalSchedule).toBeCloseTo(99808.29, 2);
    expect(points[0].originalSchedule - points[0].mortgage).toBeCloseTo(3_480, 6);
    expect(points[101].originalSchedule).toBeGreaterThan(0);
    expect(points[101].mortgage).toBe(0);
  });

  it("drops the original schedule to zero past its last month", () => {
    const short = computeBaselineSchedule(100_000, 0.041, 12);
    const late = toChartPoints(result.records, short);
    expect(late[11].originalSchedule).toBe(0);
    expect(late[50].originalSchedule).toBe(0);
  });
});

describe("BalanceCharts", () => {
  it("renders one chart per panel", () => {
    const html = renderToStaticMarkup(<BalanceCharts config={config} result={result} />);

    expect(html.split('class="recharts-wrapper"').length - 1).toBe(4);
    expect(html).toContain(">Mortgage vs savings<");
    expect(html).toContain(">Monthly overpayments<");
    expect(html).toContain(">Income vs expenses<");
    expect(html).toContain(">Available cash after payments<");
  });
});
