// src/App.tsx
import { useEffect, useState, type CSSProperties } from "react";
import PlanForm from "./components/PlanForm";
import SimulationReport from "./components/SimulationReport";
import type { SimulationConfig } from "./domain/config";
import { InvalidConfigurationError } from "./domain/errors";
import {
  buildMonthlySheet,
  buildOverpaymentSheet,
  buildSummarySheet,
  toCsv,
  type ExportSheet,
} from "./domain/export";
import { compareWithoutOverpayments } from "./domain/mortgage";
import type { NoOverpaymentComparison } from "./domain/mortgage";
import { loadPlanInputs, savePlanInputs } from "./domain/persistence";
import {
  createDefaultPlanInputs,
  parsePlanInputs,
  planToSimulationConfig,
  type PlanInputs,
} from "./domain/plan";

interface PlannerRun {
  config: SimulationConfig;
  comparison: NoOverpaymentComparison;
}

function downloadCsv(filename: string, csv: string) {
  const blob = new Blob([csv], { type: "text/csv;charset=utf-8" });
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = filename;
  a.click();
  URL.revokeObjectURL(url);
}

export default function App() {
  const [plan, setPlan] = useState<PlanInputs>(() => loadPlanInputs());
  const [run, setRun] = useState<PlannerRun | null>(null);
  const [errors, setErrors] = useState<string[]>([]);

  useEffect(() => {
    savePlanInputs(plan);
  }, [plan]);

  function calculate() {
    try {
      const config = planToSimulationConfig(parsePlanInputs(plan));
      setRun({ config, comparison: compareWithoutOverpayments(config) });
      setErrors([]);
    } catch (err) {
      if (err instanceof InvalidConfigurationError) {
        setRun(null);
        setErrors(err.issues.map((i) => `${i.path}: ${i.message}`));
        return;
      }
      throw err;
    }
  }

  function resetPlan() {
    setPlan(createDefaultPlanInputs());
    setRun(null);
    setErrors([]);
  }

  function exportSheet(sheet: ExportSheet) {
    const stamp = new Date().toISOString().slice(0, 10).replace(/-/g, "");
    const slug = sheet.name.toLowerCase().replace(/\s+/g, "_");
    downloadCsv(`${slug}_${stamp}.csv`, toCsv(sheet));
  }

  return (
    <div style={styles.container}>
      <h2 style={styles.header}>🏠 Mortgage Overpayment Planner</h2>

      <PlanForm plan={plan} onChange={setPlan} onCalculate={calculate} />
      <button style={styles.resetButton} onClick={resetPlan}>
        Reset to default plan
      </button>

      {errors.length > 0 && (
        <div style={styles.errorBanner} role="alert">
          {errors.map((e) => (
            <div key={e}>{e}</div>
          ))}
        </div>
      )}

      {run && (
        <>
          <SimulationReport config={run.config} comparison={run.comparison} />
          <div style={styles.exportRow}>
            <button
              style={styles.exportButton}
              onClick={() => exportSheet(buildMonthlySheet(run.comparison.withOverpayments))}
            >
              Monthly breakdown (CSV)
            </button>
            <button
              style={styles.exportButton}
              onClick={() => exportSheet(buildOverpaymentSheet(run.comparison.withOverpayments))}
            >
              Overpayments (CSV)
            </button>
            <button
              style={styles.exportButton}
              onClick={() =>
                exportSheet(buildSummarySheet(run.config, run.comparison.withOverpayments))
              }
            >
              Summary (CSV)
            </button>
          </div>
        </>
      )}
    </div>
  );
}

const styles: Record<string, CSSProperties> = {
  container: {
    maxWidth: 720,
    margin: "0 auto",
    padding: 16,
    fontFamily: "system-ui, -apple-system, BlinkMacSystemFont, sans-serif",
    color: "#e5e7eb",
  },
  header: {
    textAlign: "center",
    marginBottom: 16,
  },
  errorBanner: {
    background: "#450a0a",
    border: "1px solid #b91c1c",
    borderRadius: 8,
    padding: 12,
    marginBottom: 20,
    fontSize: 13,
  },
  resetButton: {
    display: "block",
    margin: "0 auto 20px",
    padding: "4px 12px",
    borderRadius: 999,
    border: "1px solid #374151",
    background: "transparent",
    color: "#9ca3af",
    fontSize: 12,
  },
  exportRow: {
    display: "flex",
    gap: 8,
  },
  exportButton: {
    flex: 1,
    padding: "8px 12px",
    borderRadius: 999,
    border: "1px solid #374151",
    background: "transparent",
    color: "#e5e7eb",
    fontSize: 14,
  },
};
