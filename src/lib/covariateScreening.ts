/**
 * Covariate exclusion applied before a batch run: drop the reference itself,
 * unknown and constant columns, and columns that duplicate the reference or an
 * earlier kept column. Every dropped name is listed with its reason.
 */

import { type AnalysisConfig, defaultConfig } from "@/lib/config";
import { type Logger, defaultLogger } from "@/lib/logger";
import type { SubjectCohort } from "@/lib/subjectCohort";

export type ExclusionReason = "reference" | "unknown" | "constant" | "duplicate";

export interface ExcludedCovariate {
  name: string;
  reason: ExclusionReason;
  /** Column it duplicates, for reason "duplicate" */
  duplicateOf?: string;
}

export interface ScreeningResult {
  kept: string[];
  excluded: ExcludedCovariate[];
}

export interface ScreeningOptions {
  /** Covariate the others are stratified against, e.g. the primary gene */
  reference?: string;
  config?: AnalysisConfig;
  logger?: Logger;
}

/**
 * Pearson correlation over subjects having both values; null when undefined
 */
export function pearsonCorrelation(a: Map<string, number>, b: Map<string, number>): number | null {
  const xs: number[] = [];
  const ys: number[] = [];
  for (const [id, x] of a) {
    const y = b.get(id);
    if (y === undefined) continue;
    xs.push(x);
    ys.push(y);
  }
  const n = xs.length;
  if (n < 2) return null;

  const meanX = xs.reduce((s, v) => s + v, 0) / n;
  const meanY = ys.reduce((s, v) => s + v, 0) / n;
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  if (sxx === 0 || syy === 0) return null;
  return sxy / Math.sqrt(sxx * syy);
}

function sameValues(a: Map<string, string>, b: Map<string, string>): boolean {
  if (a.size !== b.size) return false;
  for (const [id, value] of a) {
    if (b.get(id) !== value) return false;
  }
  return true;
}

export function screenCovariates(
  cohort: SubjectCohort,
  names: string[],
  options: ScreeningOptions = {}
): ScreeningResult {
  const { reference, config = defaultConfig, logger = defaultLogger } = options;
  const threshold = config.screening.duplicateCorrelation;
  const kept: string[] = [];
  const excluded: ExcludedCovariate[] = [];
  const comparators = reference !== undefined && cohort.covariateKind(reference) ? [reference] : [];

  const duplicateOf = (name: string): string | undefined => {
    const kind = cohort.covariateKind(name);
    return comparators.find(other => {
      if (other === name || cohort.covariateKind(other) !== kind) return false;
      if (kind === "numeric") {
        const r = pearsonCorrelation(cohort.numericValues(name), cohort.numericValues(other));
        return r !== null && Math.abs(r) >= threshold;
      }
      return sameValues(cohort.categoricalValues(name), cohort.categoricalValues(other));
    });
  };

  for (const name of new Set(names)) {
    if (name === reference) {
      excluded.push({ name, reason: "reference" });
      continue;
    }
    if (cohort.covariateKind(name) === undefined) {
      excluded.push({ name, reason: "unknown" });
      continue;
    }
    if (new Set(cohort.categoricalValues(name).values()).size < 2) {
      excluded.push({ name, reason: "constant" });
      continue;
    }
    const duplicate = duplicateOf(name);
    if (duplicate !== undefined) {
      excluded.push({ name, reason: "duplicate", duplicateOf: duplicate });
      continue;
    }
    kept.push(name);
    comparators.push(name);
  }

  if (excluded.length > 0) {
    logger.info(`Screening excluded ${excluded.length} of ${kept.length + excluded.length} covariates`);
  }
  return { kept, excluded };
}
