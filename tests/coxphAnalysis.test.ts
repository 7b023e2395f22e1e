import { describe, test, expect } from "vitest";
import { fitCoxPH, formatHR } from "@/lib/coxphAnalysis";
import { resolveConfig } from "@/lib/config";
import { InsufficientGroupsError, NonConvergenceError, SeparationError } from "@/lib/errors";
import { silentLogger } from "@/lib/logger";
import { syntheticCohort } from "@/data/syntheticCohort";
import { cohortOf, groupLabels } from "./helpers";

const quiet = { logger: silentLogger };

describe("fitCoxPH: hand-computed example", () => {
  // A: deaths at 1 and 3; B: death at 2, censored at 4.
  // Score U(β) = 1/(1+2e) - 2e/(1+e) with e = exp(β), zero at 4e² + e - 1 = 0
  const cohort = cohortOf({ A: [[1, true], [3, true]], B: [[2, true], [4, false]] });
  const labels = groupLabels(cohort);
  const e = (Math.sqrt(17) - 1) / 8;
  const information = (2 * e) / (1 + e) ** 2 + (2 * e) / (1 + 2 * e) ** 2;

  test("hazard ratio solves the score equation", () => {
    const fit = fitCoxPH(cohort, labels, "A", "B", quiet);
    expect(fit.referenceGroup).toBe("A");
    expect(fit.comparisonGroup).toBe("B");
    expect(fit.hazardRatio).toBeCloseTo(e, 8);
    expect(fit.coefficient).toBeCloseTo(Math.log(e), 8);
  });

  test("standard error comes from the observed information", () => {
    const fit = fitCoxPH(cohort, labels, "A", "B", quiet);
    const se = 1 / Math.sqrt(information);
    expect(fit.se).toBeCloseTo(se, 8);
    expect(fit.zScore).toBeCloseTo(Math.log(e) / se, 8);
    expect(fit.lowerCI).toBeCloseTo(Math.exp(Math.log(e) - 1.959963984540054 * se), 8);
    expect(fit.upperCI).toBeCloseTo(Math.exp(Math.log(e) + 1.959963984540054 * se), 8);
    expect(fit.waldTest.chiSquare).toBeCloseTo(fit.zScore ** 2, 10);
    expect(fit.pValue).toBeCloseTo(fit.waldTest.pValue, 12);
  });

  test("score test uses U(0) and I(0)", () => {
    const fit = fitCoxPH(cohort, labels, "A", "B", quiet);
    // U(0) = 1/3 - 1, I(0) = 1/2 + 2/9
    expect(fit.scoreTest.chiSquare).toBeCloseTo((4 / 9) / (13 / 18), 10);
    expect(fit.likelihoodRatioTest.chiSquare).toBeGreaterThan(0);
    expect(fit.logLikelihood.fitted).toBeGreaterThan(fit.logLikelihood.null);
    expect(fit.nSubjects).toBe(4);
    expect(fit.nEvents).toBe(3);
  });

  test("swapping reference and comparison inverts the hazard ratio", () => {
    const forward = fitCoxPH(cohort, labels, "A", "B", quiet);
    const reversed = fitCoxPH(cohort, labels, "B", "A", quiet);
    expect(reversed.hazardRatio).toBeCloseTo(1 / forward.hazardRatio, 8);
    expect(reversed.pValue).toBeCloseTo(forward.pValue, 8);
  });

  test("iteration limit raises NonConvergenceError", () => {
    const config = resolveConfig({ cox: { maxIterations: 1 } });
    expect(() => fitCoxPH(cohort, labels, "A", "B", { config, logger: silentLogger })).toThrow(NonConvergenceError);
  });
});

describe("fitCoxPH: equal hazards", () => {
  test("identical groups converge to a hazard ratio of exactly 1", () => {
    const twin = cohortOf({
      A: [[1, true], [2, false], [4, true], [6, true]],
      B: [[1, true], [2, false], [4, true], [6, true]],
    });
    const fit = fitCoxPH(twin, groupLabels(twin), "A", "B", quiet);
    expect(fit.coefficient).toBe(0);
    expect(fit.hazardRatio).toBe(1);
    expect(fit.iterations).toBe(1);
    expect(fit.pValue).toBe(1);
  });

  test("groups drawn from one hazard give a hazard ratio near 1", () => {
    const cohort = syntheticCohort({
      seed: 42,
      groups: [
        { label: "A", n: 500, hazard: 0.2 },
        { label: "B", n: 500, hazard: 0.2 },
      ],
      censorHazard: 0.05,
    });
    const fit = fitCoxPH(cohort, groupLabels(cohort), "A", "B", quiet);
    expect(Math.abs(fit.coefficient)).toBeLessThan(0.35);
  });

  test("a doubled hazard is recovered", () => {
    const cohort = syntheticCohort({
      seed: 43,
      groups: [
        { label: "A", n: 500, hazard: 0.1 },
        { label: "B", n: 500, hazard: 0.2 },
      ],
      censorHazard: 0.05,
    });
    const fit = fitCoxPH(cohort, groupLabels(cohort), "A", "B", quiet);
    expect(fit.hazardRatio).toBeGreaterThan(1.5);
    expect(fit.hazardRatio).toBeLessThan(2.7);
    expect(fit.pValue).toBeLessThan(1e-6);
    expect(fit.likelihoodRatioTest.pValue).toBeLessThan(1e-6);
  });
});

describe("fitCoxPH: failures", () => {
  test("a group without events is a separation error", () => {
    const cohort = cohortOf({ A: [[1, true], [3, true]], B: [[2, false], [4, false]] });
    expect(() => fitCoxPH(cohort, groupLabels(cohort), "A", "B", quiet)).toThrow(SeparationError);
  });

  test("events that never share a risk set are a separation error", () => {
    const cohort = cohortOf({ A: [[1, true], [2, true]], B: [[3, true], [4, true]] });
    expect(() => fitCoxPH(cohort, groupLabels(cohort), "A", "B", quiet)).toThrow(SeparationError);
  });

  test("a missing group is InsufficientGroupsError", () => {
    const cohort = cohortOf({ A: [[1, true], [2, true]] });
    expect(() => fitCoxPH(cohort, groupLabels(cohort), "A", "B", quiet)).toThrow(InsufficientGroupsError);
  });
});

describe("formatHR", () => {
  test("two decimals with CI", () => {
    expect(formatHR(1.234, 0.9, 1.7)).toBe("1.23 (0.90–1.70)");
  });
});
