// src/components/SimulationReport.tsx
//
// Read-only view of one planner run: headline metrics, charts, the
// comparison with the same plan and no overpayments, the overpayment
// schedule and a year-by-year snapshot of both balances.

import type { CSSProperties, ReactNode } from "react";
import BalanceCharts from "./BalanceCharts";
import type { SimulationConfig } from "../domain/config";
import type {
  MonthlyRecord,
  NoOverpaymentComparison,
} from "../domain/mortgage/types";
import {
  describePayoff,
  formatCurrency,
  formatMonthsAsYearsMonths,
} from "../utils/format";

function Metric({
  label,
  value,
  hint,
}: {
  label: string;
  value: string;
  hint?: string;
}) {
  return (
    <div style={styles.metric}>
      <div style={styles.metricLabel}>{label}</div>
      <div style={styles.metricValue}>{value}</div>
      {hint && <div style={styles.metricHint}>{hint}</div>}
    </div>
  );
}

function SectionCard({ title, children }: { title: string; children: ReactNode }) {
  return (
    <div style={styles.card}>
      <h3 style={styles.cardTitle}>{title}</h3>
      {children}
    </div>
  );
}

// Last record of each mortgage year, plus the final month if it falls mid-year.
export function yearEndRecords(records: readonly MonthlyRecord[]): MonthlyRecord[] {
  return records.filter(
    (r, i) => r.month % 12 === 11 || i === records.length - 1
  );
}

export default function SimulationReport({
  config,
  comparison,
}: {
  config: SimulationConfig;
  comparison: NoOverpaymentComparison;
}) {
  const { withOverpayments: result, withoutOverpayments } = comparison;
  const { summary } = result;

  return (
    <div>
      <SectionCard title="Your results">
        <div style={styles.metricGrid}>
          <Metric
            label="Mortgage status"
            value={describePayoff(summary, config.horizonMonths)}
          />
          <Metric
            label="Interest paid"
            value={formatCurrency(summary.totalInterestPaid)}
            hint={`${formatCurrency(summary.interestSaved)} saved vs. full term`}
          />
          <Metric label="Final savings" value={formatCurrency(summary.finalSavings)} />
          <Metric
            label="Total overpayments"
            value={formatCurrency(summary.totalOverpayments)}
          />
        </div>
      </SectionCard>

      <SectionCard title="Over time">
        <BalanceCharts config={config} result={result} />
      </SectionCard>

      <SectionCard title="Compared with no overpayments">
        <div style={styles.metricGrid}>
          <Metric
            label="Without overpayments"
            value={describePayoff(withoutOverpayments.summary, config.horizonMonths)}
          />
          <Metric
            label="Interest saved"
            value={formatCurrency(comparison.interestSaved)}
          />
          <Metric
            label="Time saved"
            value={
              comparison.monthsSaved === null
                ? "—"
                : formatMonthsAsYearsMonths(comparison.monthsSaved)
            }
          />
        </div>
      </SectionCard>

      <SectionCard title="Overpayment schedule">
        {result.events.length === 0 ? (
          <div style={styles.empty}>No overpayments were made.</div>
        ) : (
          <table style={styles.table}>
            <thead>
              <tr>
                <th style={styles.th}>Year</th>
                <th style={styles.th}>Amount</th>
                <th style={styles.th}>Type</th>
              </tr>
            </thead>
            <tbody>
              {result.events.map((e, i) => (
                <tr key={`${e.month}-${i}`}>
                  <td style={styles.td}>{(e.month / 12).toFixed(1)}</td>
                  <td style={styles.td}>{formatCurrency(e.amount)}</td>
                  <td style={styles.td}>{e.label}</td>
                </tr>
              ))}
            </tbody>
          </table>
        )}
      </SectionCard>

      <SectionCard title="Year by year">
        <table style={styles.table}>
          <thead>
            <tr>
              <th style={styles.th}>Year</th>
              <th style={styles.th}>Mortgage</th>
              <th style={styles.th}>Savings</th>
              <th style={styles.th}>Overpaid to date</th>
            </tr>
          </thead>
          <tbody>
            {yearEndRecords(result.records).map((r) => (
              <tr key={r.month}>
                <td style={styles.td}>{Math.floor(r.month / 12) + 1}</td>
                <td style={styles.td}>{formatCurrency(r.mortgageBalance)}</td>
                <td style={styles.td}>{formatCurrency(r.savingsBalance)}</td>
                <td style={styles.td}>{formatCurrency(r.cumulativeOverpayments)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </SectionCard>
    </div>
  );
}

const styles: Record<string, CSSProperties> = {
  card: {
    background: "#111827",
    borderRadius: 12,
    padding: 16,
    marginBottom: 20,
    boxShadow: "0 1px 8px rgba(0,0,0,0.5)",
    border: "1px solid #1f2937",
  },
  cardTitle: {
    marginTop: 0,
    marginBottom: 12,
  },
  metricGrid: {
    display: "grid",
    gridTemplateColumns: "repeat(auto-fit, minmax(140px, 1fr))",
    gap: 12,
  },
  metric: {
    padding: 10,
    borderRadius: 8,
    borderLeft: "4px solid #3b82f6",
    background: "#0b1220",
  },
  metricLabel: {
    fontSize: 12,
    color: "#9ca3af",
  },
  metricValue: {
    fontSize: 18,
    fontWeight: 600,
  },
  metricHint: {
    fontSize: 11,
    color: "#22c55e",
  },
  table: {
    width: "100%",
    borderCollapse: "collapse",
    fontSize: 13,
  },
  th: {
    textAlign: "left",
    padding: "4px 6px",
    borderBottom: "1px solid #374151",
    color: "#9ca3af",
  },
  td: {
    padding: "4px 6px",
    borderBottom: "1px solid #1f2937",
  },
  empty: {
    fontSize: 13,
    color: "#9ca3af",
  },
};
