// src/components/PlanForm.tsx
//
// Sidebar-style form for the planner inputs. It edits a PlanInputs
// value in place and leaves validation to the caller (the engine
// rejects bad input with InvalidConfigurationError on Calculate).

import type { CSSProperties } from "react";
import type { PlanInputs } from "../domain/plan";

const MAX_FIXED_PERIODS = 5;

type NumericField = Exclude<keyof PlanInputs, "fixedPeriods">;

interface FieldSpec {
  key: NumericField;
  label: string;
  step: number;
}

const SECTIONS: { title: string; fields: FieldSpec[] }[] = [
  {
    title: "Mortgage",
    fields: [
      { key: "currentBalance", label: "Current mortgage balance (£)", step: 1000 },
      { key: "termYears", label: "Original mortgage term (years)", step: 1 },
      { key: "variableRatePercent", label: "Standard variable rate (%)", step: 0.1 },
    ],
  },
  {
    title: "Income & expenses",
    fields: [
      { key: "monthlyIncome", label: "Monthly net income (£)", step: 50 },
      { key: "monthlyExpenses", label: "Monthly expenses (£)", step: 50 },
      { key: "incomeGrowthPercent", label: "Annual income growth (%)", step: 0.1 },
      { key: "expenseGrowthPercent", label: "Annual expense growth (%)", step: 0.1 },
    ],
  },
  {
    title: "Savings & emergency fund",
    fields: [
      { key: "currentSavings", label: "Current savings (£)", step: 1000 },
      { key: "savingsRatePercent", label: "Savings interest rate (%)", step: 0.1 },
      { key: "savingsTaxPercent", label: "Tax on savings interest (%)", step: 1 },
      { key: "emergencyFundMonths", label: "Emergency fund (months of income)", step: 0.5 },
    ],
  },
  {
    title: "Overpayments",
    fields: [
      { key: "minOverpaymentThreshold", label: "Minimum overpayment threshold (£)", step: 100 },
      { key: "simulationYears", label: "Simulation period (years)", step: 1 },
    ],
  },
];

// Empty input maps to NaN so validation reports it instead of silently using 0.
function parseNumber(value: string): number {
  if (!value.trim()) return Number.NaN;
  return Number(value.replace(/,/g, ""));
}

function displayValue(value: number): string {
  return Number.isFinite(value) ? String(value) : "";
}

function LabeledNumberInput({
  label,
  value,
  step,
  onChange,
}: {
  label: string;
  value: number;
  step: number;
  onChange: (val: number) => void;
}) {
  return (
    <label style={styles.label}>
      <span>{label}</span>
      <input
        type="number"
        value={displayValue(value)}
        step={step}
        min={0}
        onChange={(e) => onChange(parseNumber(e.target.value))}
        style={styles.input}
      />
    </label>
  );
}

export default function PlanForm({
  plan,
  onChange,
  onCalculate,
}: {
  plan: PlanInputs;
  onChange: (plan: PlanInputs) => void;
  onCalculate: () => void;
}) {
  function updateField(key: NumericField, value: number) {
    onChange({ ...plan, [key]: value });
  }

  function updatePeriod(
    index: number,
    patch: Partial<PlanInputs["fixedPeriods"][number]>
  ) {
    onChange({
      ...plan,
      fixedPeriods: plan.fixedPeriods.map((p, i) =>
        i === index ? { ...p, ...patch } : p
      ),
    });
  }

  function addPeriod() {
    if (plan.fixedPeriods.length >= MAX_FIXED_PERIODS) return;
    onChange({
      ...plan,
      fixedPeriods: [...plan.fixedPeriods, { months: 60, ratePercent: 3.4 }],
    });
  }

  function removePeriod(index: number) {
    if (plan.fixedPeriods.length <= 1) return;
    onChange({
      ...plan,
      fixedPeriods: plan.fixedPeriods.filter((_, i) => i !== index),
    });
  }

  return (
    <div style={styles.card}>
      {SECTIONS.map((section) => (
        <div key={section.title} style={styles.section}>
          <h3 style={styles.sectionTitle}>{section.title}</h3>
          {section.fields.map((field) => (
            <LabeledNumberInput
              key={field.key}
              label={field.label}
              value={plan[field.key]}
              step={field.step}
              onChange={(val) => updateField(field.key, val)}
            />
          ))}

          {section.title === "Mortgage" && (
            <div>
              <div style={styles.periodHeader}>
                <span>Fixed rate periods</span>
                <button
                  style={styles.smallButton}
                  onClick={addPeriod}
                  disabled={plan.fixedPeriods.length >= MAX_FIXED_PERIODS}
                >
                  + Add
                </button>
              </div>
              {plan.fixedPeriods.map((period, index) => (
                <div key={index} style={styles.periodRow}>
                  <span style={styles.periodIndex}>{index + 1}.</span>
                  <input
                    type="number"
                    aria-label={`Period ${index + 1} length (months)`}
                    value={displayValue(period.months)}
                    min={1}
                    onChange={(e) =>
                      updatePeriod(index, { months: parseNumber(e.target.value) })
                    }
                    style={styles.periodInput}
                  />
                  <span>months at</span>
                  <input
                    type="number"
                    aria-label={`Period ${index + 1} rate (%)`}
                    value={displayValue(period.ratePercent)}
                    step={0.1}
                    min={0}
                    onChange={(e) =>
                      updatePeriod(index, { ratePercent: parseNumber(e.target.value) })
                    }
                    style={styles.periodInput}
                  />
                  <span>%</span>
                  <button
                    style={styles.smallButton}
                    onClick={() => removePeriod(index)}
                    disabled={plan.fixedPeriods.length <= 1}
                  >
                    ✕
                  </button>
                </div>
              ))}
            </div>
          )}
        </div>
      ))}

      <button style={styles.primaryButton} onClick={onCalculate}>
        Calculate results
      </button>
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
  section: {
    marginBottom: 16,
  },
  sectionTitle: {
    marginTop: 0,
    marginBottom: 8,
    fontSize: 15,
  },
  label: {
    display: "flex",
    flexDirection: "row",
    alignItems: "center",
    justifyContent: "space-between",
    gap: 8,
    marginBottom: 8,
    fontSize: 13,
  },
  input: {
    width: 120,
    padding: 6,
    fontSize: 14,
    borderRadius: 8,
    border: "1px solid #374151",
    background: "#020617",
    color: "#e5e7eb",
  },
  periodHeader: {
    display: "flex",
    justifyContent: "space-between",
    alignItems: "center",
    fontSize: 13,
    marginBottom: 6,
  },
  periodRow: {
    display: "flex",
    alignItems: "center",
    gap: 6,
    fontSize: 12,
    marginBottom: 6,
  },
  periodIndex: {
    color: "#9ca3af",
  },
  periodInput: {
    width: 64,
    padding: 4,
    borderRadius: 6,
    border: "1px solid #374151",
    background: "#020617",
    color: "#e5e7eb",
  },
  smallButton: {
    padding: "2px 8px",
    borderRadius: 999,
    border: "1px solid #374151",
    background: "transparent",
    color: "#9ca3af",
    fontSize: 12,
  },
  primaryButton: {
    width: "100%",
    padding: "10px 12px",
    borderRadius: 999,
    border: "1px solid #2563eb",
    background: "#1d4ed8",
    color: "#f9fafb",
    fontSize: 15,
  },
};
