// src/components/BalanceCharts.tsx
//
// Four panels over the months of one run: balances, overpayments,
// income against expenses, and cash left after the mortgage payment.

import type { CSSProperties, ReactNode } from "react";
import {
  CartesianGrid,
  Legend,
  Line,
  LineChart,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import type { SimulationConfig } from "../domain/config";
import {
  buildRateSchedule,
  computeBaselineSchedule,
  initialRate,
} from "../domain/mortgage";
import type {
  MonthlyRecord,
  MortgageBaselineResult,
  SimulationResult,
} from "../domain/mortgage/types";
import { formatCurrency } from "../utils/format";

const CHART_WIDTH = 688;
const CHART_HEIGHT = 220;

export interface ChartPoint {
  year: number;
  mortgage: number;
  originalSchedule: number;
  savings: number;
  totalOverpayments: number;
  overpayment: number;
  income: number;
  expenses: number;
  availableCash: number;
}

/**
 * One point per simulated month. `originalSchedule` is the balance the
 * loan would have had on its opening rate with no overpayments.
 */
export function toChartPoints(
  records: readonly MonthlyRecord[],
  baseline: MortgageBaselineResult
): ChartPoint[] {
  return records.map((r) => {
    const entry =
      r.month < baseline.schedule.length ? baseline.schedule[r.month] : undefined;
    return {
      year: Number((r.month / 12).toFixed(2)),
      mortgage: r.mortgageBalance,
      originalSchedule: entry ? entry.remaining : 0,
      savings: r.savingsBalance,
      totalOverpayments: r.cumulativeOverpayments,
      overpayment: r.overpayment,
      income: r.income,
      expenses: r.expenses,
      availableCash: r.availableCash,
    };
  });
}

function poundsInThousands(value: number): string {
  return `£${(value / 1000).toFixed(0)}k`;
}

function ChartPanel({
  title,
  data,
  children,
}: {
  title: string;
  data: ChartPoint[];
  children: ReactNode;
}) {
  return (
    <div style={styles.panel}>
      <h4 style={styles.panelTitle}>{title}</h4>
      <LineChart
        width={CHART_WIDTH}
        height={CHART_HEIGHT}
        data={data}
        margin={{ top: 10, right: 10, left: 0, bottom: 0 }}
      >
        <CartesianGrid strokeDasharray="3 3" stroke="#1f2937" />
        <XAxis
          dataKey="year"
          type="number"
          domain={[0, "dataMax"]}
          tick={{ fontSize: 12, fill: "#9ca3af" }}
        />
        <YAxis
          tickFormatter={poundsInThousands}
          tick={{ fontSize: 12, fill: "#9ca3af" }}
        />
        <Tooltip
          formatter={(value) => formatCurrency(Number(value))}
          labelFormatter={(label) => `Year ${label}`}
        />
        <Legend />
        {children}
      </LineChart>
    </div>
  );
}

export default function BalanceCharts({
  config,
  result,
}: {
  config: SimulationConfig;
  result: SimulationResult;
}) {
  const schedule = buildRateSchedule(config.fixedPeriods, config.variableRate);
  const baseline = computeBaselineSchedule(
    config.principal,
    initialRate(schedule),
    config.termMonths
  );
  const data = toChartPoints(result.records, baseline);

  return (
    <div>
      <ChartPanel title="Mortgage vs savings" data={data}>
        <Line dot={false} type="monotone" dataKey="mortgage" name="Mortgage Balance" stroke="#ef4444" strokeWidth={3} />
        <Line dot={false} type="monotone" dataKey="originalSchedule" name="Original Schedule" stroke="#6b7280" strokeDasharray="2 4" />
        <Line dot={false} type="monotone" dataKey="savings" name="Savings Balance" stroke="#22c55e" strokeWidth={3} />
        <Line dot={false} type="monotone" dataKey="totalOverpayments" name="Total Overpayments" stroke="#3b82f6" strokeWidth={3} strokeDasharray="6 4" />
      </ChartPanel>

      <ChartPanel title="Monthly overpayments" data={data}>
        <Line dot={false} type="monotone" dataKey="overpayment" name="Overpayments" stroke="#a855f7" strokeWidth={2} />
      </ChartPanel>

      <ChartPanel title="Income vs expenses" data={data}>
        <Line dot={false} type="monotone" dataKey="income" name="Income" stroke="#22c55e" strokeWidth={2} />
        <Line dot={false} type="monotone" dataKey="expenses" name="Expenses" stroke="#ef4444" strokeWidth={2} />
      </ChartPanel>

      <ChartPanel title="Available cash after payments" data={data}>
        <Line dot={false} type="monotone" dataKey="availableCash" name="Available Cash" stroke="#f97316" strokeWidth={2} />
      </ChartPanel>
    </div>
  );
}

const styles: Record<string, CSSProperties> = {
  panel: {
    overflowX: "auto",
    marginBottom: 16,
  },
  panelTitle: {
    marginTop: 0,
    marginBottom: 8,
    fontSize: 14,
    color: "#9ca3af",
  },
};
