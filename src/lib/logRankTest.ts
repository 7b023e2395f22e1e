/**
 * Log-rank test for comparing survival between two or more groups
 * Returns p-value from the k-sample Mantel-Haenszel statistic
 *
 * Works on subject-level data: at every distinct event time in the pooled
 * sample, observed events per group are compared with the events expected
 * under equal hazards. The statistic uses the full covariance matrix of the
 * first k-1 groups and has k-1 degrees of freedom.
 */

import { chiSquarePValue } from "@/lib/distributions";
import { InsufficientGroupsError } from "@/lib/errors";
import { type Logger, defaultLogger } from "@/lib/logger";
import type { SubjectRecord } from "@/lib/subjectCohort";

export interface SurvivalGroup {
  label: string;
  records: readonly SubjectRecord[];
}

export interface LogRankResult {
  pValue: number;
  chiSquare: number;
  degreesOfFreedom: number;
  groups: Array<{
    label: string;
    n: number;
    observed: number;
    expected: number;
  }>;
  /** Groups with no observed events; the statistic may be unstable */
  degenerateGroups: string[];
  lowConfidence: boolean;
}

const PIVOT_TOLERANCE = 1e-10;

/**
 * u' V^-1 u through LDL' elimination. Zero pivots (a group never at risk
 * at an event time) are skipped, so the rank becomes the degrees of freedom.
 */
function quadraticForm(u: number[], v: number[][]): { value: number; rank: number } {
  const n = u.length;
  const a = v.map(row => [...row]);
  const b = [...u];
  const scale = Math.max(1e-300, ...a.map((row, i) => row[i]));
  let value = 0;
  let rank = 0;

  for (let p = 0; p < n; p++) {
    const pivot = a[p][p];
    if (pivot <= PIVOT_TOLERANCE * scale) continue;
    rank++;
    value += (b[p] * b[p]) / pivot;
    for (let i = p + 1; i < n; i++) {
      const factor = a[i][p] / pivot;
      b[i] -= factor * b[p];
      for (let j = p + 1; j < n; j++) {
        a[i][j] -= factor * a[p][j];
      }
    }
  }

  return { value, rank };
}

/**
 * Perform log-rank test on grouped subject records
 */
export function logRankTest(
  survivalGroups: SurvivalGroup[],
  logger: Logger = defaultLogger
): LogRankResult {
  const groups = survivalGroups.filter(g => g.records.length > 0);
  if (groups.length < 2) {
    throw new InsufficientGroupsError(groups.length);
  }

  const k = groups.length;
  const pooled = groups
    .flatMap((group, g) => group.records.map(r => ({ time: r.time, event: r.event, g })))
    .sort((a, b) => a.time - b.time);

  const atRisk = groups.map(g => g.records.length);
  const observed = new Array<number>(k).fill(0);
  const expected = new Array<number>(k).fill(0);
  const variance: number[][] = Array.from({ length: k }, () => new Array<number>(k).fill(0));

  let i = 0;
  while (i < pooled.length) {
    const time = pooled[i].time;
    const deaths = new Array<number>(k).fill(0);
    const removed = new Array<number>(k).fill(0);
    while (i < pooled.length && pooled[i].time === time) {
      const { g, event } = pooled[i];
      if (event) deaths[g]++;
      removed[g]++;
      i++;
    }

    const totalEvents = deaths.reduce((sum, d) => sum + d, 0);
    const totalAtRisk = atRisk.reduce((sum, n) => sum + n, 0);

    if (totalEvents > 0) {
      for (let j = 0; j < k; j++) {
        observed[j] += deaths[j];
        expected[j] += (atRisk[j] / totalAtRisk) * totalEvents;
      }

      // Var = n_j (δ_jl N - n_l) d (N - d) / (N^2 (N - 1))
      if (totalAtRisk > 1) {
        const factor = (totalEvents * (totalAtRisk - totalEvents)) /
          (totalAtRisk * totalAtRisk * (totalAtRisk - 1));
        for (let j = 0; j < k; j++) {
          for (let l = 0; l < k; l++) {
            const cross = j === l ? atRisk[j] * (totalAtRisk - atRisk[j]) : -atRisk[j] * atRisk[l];
            variance[j][l] += cross * factor;
          }
        }
      }
    }

    for (let j = 0; j < k; j++) atRisk[j] -= removed[j];
  }

  const u = observed.slice(0, k - 1).map((o, j) => o - expected[j]);
  const v = variance.slice(0, k - 1).map(row => row.slice(0, k - 1));
  const { value, rank } = quadraticForm(u, v);
  const chiSquare = Math.max(0, value);

  const degenerateGroups = groups.filter((_, j) => observed[j] === 0).map(g => g.label);
  if (degenerateGroups.length > 0) {
    logger.warn(`Log-rank groups without events: ${degenerateGroups.join(", ")}; result flagged low-confidence`);
  }

  return {
    pValue: rank > 0 ? chiSquarePValue(chiSquare, rank) : 1,
    chiSquare,
    degreesOfFreedom: rank,
    groups: groups.map((g, j) => ({
      label: g.label,
      n: g.records.length,
      observed: observed[j],
      expected: expected[j],
    })),
    degenerateGroups,
    lowConfidence: degenerateGroups.length > 0,
  };
}

/**
 * Format p-value for display
 */
export function formatPValue(pValue: number | null): string {
  if (pValue === null) {
    return "p = NA";
  } else if (pValue < 0.0001) {
    return `p < 0.0001`;
  } else if (pValue < 0.001) {
    return `p = ${pValue.toExponential(2)}`;
  } else if (pValue < 0.01) {
    return `p = ${pValue.toFixed(4)}`;
  } else {
    return `p = ${pValue.toFixed(3)}`;
  }
}
