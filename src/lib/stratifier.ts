/**
 * Group labelling of subjects from their covariates.
 */

import { type AnalysisConfig, defaultConfig } from "@/lib/config";
import { InvalidCovariateError } from "@/lib/errors";
import type { SubjectCohort } from "@/lib/subjectCohort";

export const HIGH = "High";
export const LOW = "Low";

export interface Labeling {
  covariate: string;
  labels: ReadonlyMap<string, string>;
  /** Cut point used for a threshold split */
  threshold?: number;
}

/**
 * Linear-interpolated sample quantile (R type 7). At q = 0.5 this is the median.
 */
export function quantile(values: number[], q: number): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) return sorted[lower];
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function median(values: number[]): number {
  return quantile(values, 0.5);
}

/**
 * Split a numeric covariate at its median (or configured quantile) over the
 * subjects that have a value. Values at or above the threshold are "High".
 */
export function thresholdSplit(
  cohort: SubjectCohort,
  covariate: string,
  config: AnalysisConfig = defaultConfig,
  thresholdOverride?: number
): Labeling {
  const kind = cohort.covariateKind(covariate);
  if (kind === undefined) {
    throw new InvalidCovariateError(covariate, `Covariate "${covariate}" has no values in this cohort`);
  }
  if (kind !== "numeric") {
    throw new InvalidCovariateError(covariate, `Covariate "${covariate}" is categorical and cannot be threshold-split`);
  }

  const values = cohort.numericValues(covariate);
  const available = Array.from(values.values());
  const distinct = new Set(available);
  if (distinct.size < 2) {
    throw new InvalidCovariateError(
      covariate,
      `Covariate "${covariate}" has ${distinct.size} distinct value(s); no split possible`
    );
  }

  const threshold = thresholdOverride ?? quantile(available, config.thresholdQuantile);
  const labels = new Map<string, string>();
  let highCount = 0;
  for (const [id, value] of values) {
    const label = value >= threshold ? HIGH : LOW;
    if (label === HIGH) highCount++;
    labels.set(id, label);
  }

  if (highCount === 0 || highCount === labels.size) {
    throw new InvalidCovariateError(
      covariate,
      `Covariate "${covariate}" split at ${threshold} leaves every subject in one group`
    );
  }

  return { covariate, labels, threshold };
}

/**
 * Use each distinct value of a covariate as its own group (k-level labelling).
 */
export function categoricalSplit(cohort: SubjectCohort, covariate: string): Labeling {
  const labels = cohort.categoricalValues(covariate);
  const levels = new Set(labels.values());
  if (levels.size < 2) {
    throw new InvalidCovariateError(
      covariate,
      `Covariate "${covariate}" has ${levels.size} level(s); at least 2 are needed`
    );
  }
  return { covariate, labels };
}

/**
 * Combine two labelings into composite labels such as "GeneA=High, GeneB=Low".
 * Subjects lacking either label are left out.
 */
export function crossProduct(a: Labeling, b: Labeling): Labeling {
  const labels = new Map<string, string>();
  for (const [id, labelA] of a.labels) {
    const labelB = b.labels.get(id);
    if (labelB === undefined) continue;
    labels.set(id, `${a.covariate}=${labelA}, ${b.covariate}=${labelB}`);
  }
  return { covariate: `${a.covariate} x ${b.covariate}`, labels };
}

/**
 * Distinct labels in first-seen order
 */
export function groupsOf(labeling: Labeling): string[] {
  return Array.from(new Set(labeling.labels.values()));
}
