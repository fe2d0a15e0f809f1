// src/domain/mortgage/baseline.test.ts
import {
  computeAnnuityPayment,
  computeBaselineSchedule,
  computeFullTermInterest,
} from "./baseline";

describe("baseline - computeAnnuityPayment", () => {
  test("zero interest spreads principal evenly over the remaining term", () => {
    expect(computeAnnuityPayment(0, 120, 120_000)).toBe(1000);
  });

  test("positive interest matches the level-payment annuity", () => {
    const payment = computeAnnuityPayment(0.04 / 12, 360, 300_000);
    expect(payment).toBeCloseTo(1432.25, 2);
    expect(payment).toBeGreaterThan(300_000 / 360);
  });

  test("a single remaining month clears balance plus one month of interest", () => {
    expect(computeAnnuityPayment(0.05 / 12, 1, 1000)).toBeCloseTo(1004.17, 2);
  });

  test("stays finite for very long terms", () => {
    const payment = computeAnnuityPayment(0.05 / 12, 200_000, 1000);
    expect(Number.isFinite(payment)).toBe(true);
    // Interest-only in the limit.
    expect(payment).toBeCloseTo(1000 * (0.05 / 12), 10);
  });

  test("nothing is owed on a cleared balance", () => {
    expect(computeAnnuityPayment(0.05 / 12, 12, 0)).toBe(0);
  });

  test("rejects a non-positive remaining term", () => {
    expect(() => computeAnnuityPayment(0.05 / 12, 0, 1000)).toThrow(
      "remainingMonths must be positive"
    );
  });
});

describe("baseline - full term interest and schedule", () => {
  test("full-term interest is total payments less principal", () => {
    expect(computeFullTermInterest(100_000, 0.041, 300)).toBeCloseTo(60012.2, 1);
    expect(computeFullTermInterest(120_000, 0, 120)).toBe(0);
  });

  test("baseline schedule amortizes to zero within the term", () => {
    const baseline = computeBaselineSchedule(100_000, 0.041, 300);

    expect(baseline.schedule.length).toBe(300);
    const last = baseline.schedule[baseline.schedule.length - 1];
    expect(last.remaining).toBe(0);
    expect(baseline.totalInterest).toBeCloseTo(60012.2, 1);

    for (let i = 1; i < baseline.schedule.length; i++) {
      expect(baseline.schedule[i].remaining).toBeLessThan(
        baseline.schedule[i - 1].remaining
      );
    }
  });
});
