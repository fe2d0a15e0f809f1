// src/domain/persistence.ts
import { createChildLogger } from "./logger";
import { PlanInputsSchema, createDefaultPlanInputs, type PlanInputs } from "./plan";

const STORAGE_KEY = "mortgage-planner-plan-v1";

const log = createChildLogger({ module: "persistence" });

/**
 * Parse stored JSON; null on anything malformed so callers can fall
 * back to defaults.
 */
function tryParse(raw: string | null): unknown {
  if (!raw) return null;
  try {
    return JSON.parse(raw);
  } catch (err) {
    log.warn({ err }, "stored plan is not valid JSON");
    return null;
  }
}

/**
 * Load the last saved plan, or the defaults when nothing valid is
 * stored (or there is no window, e.g. during server rendering).
 */
export function loadPlanInputs(): PlanInputs {
  if (typeof window === "undefined") return createDefaultPlanInputs();

  const parsed = PlanInputsSchema.safeParse(
    tryParse(window.localStorage.getItem(STORAGE_KEY))
  );
  return parsed.success ? parsed.data : createDefaultPlanInputs();
}

/**
 * Persist a plan. Invalid plans are not written, so a half-edited form
 * never replaces the last good one.
 */
export function savePlanInputs(plan: PlanInputs): boolean {
  if (typeof window === "undefined") return false;

  const parsed = PlanInputsSchema.safeParse(plan);
  if (!parsed.success) return false;

  try {
    window.localStorage.setItem(STORAGE_KEY, JSON.stringify(parsed.data));
    return true;
  } catch (err) {
    log.warn({ err }, "could not save plan");
    return false;
  }
}

export { STORAGE_KEY as PLAN_STORAGE_KEY };
