/**
 * Batch survival analysis across many covariates or cohort subsets.
 *
 * Each batch is a lazy sequence of independent analysis units. An executor
 * drains the sequence and collects results keyed by unit; a unit that fails
 * with a SurvivalAnalysisError is recorded as skipped and the batch goes on.
 */

import { type AnalysisConfig, type AnalysisConfigInput, resolveConfig } from "@/lib/config";
import { screenCovariates } from "@/lib/covariateScreening";
import { InsufficientGroupsError, InvalidCovariateError, type SurvivalErrorKind, isSurvivalAnalysisError } from "@/lib/errors";
import type { SurvivalCurve } from "@/lib/kaplanMeier";
import { type Logger, defaultLogger } from "@/lib/logger";
import { benjaminiHochberg, bonferroni } from "@/lib/multipleTesting";
import { type ComparisonResult, compareAll, comparePair } from "@/lib/pairwiseComparison";
import { HIGH, LOW, type Labeling, crossProduct, thresholdSplit } from "@/lib/stratifier";
import type { SubjectCohort, SubjectRecord } from "@/lib/subjectCohort";

export interface AnalysisUnit<T> {
  key: string;
  run: () => T;
}

export interface SkippedUnit {
  key: string;
  kind: SurvivalErrorKind;
  message: string;
}

export interface BatchOutcome<T> {
  results: Map<string, T>;
  skipped: SkippedUnit[];
  /** True when an abort stopped the batch before every unit ran */
  abandoned: boolean;
}

export interface BatchOptions {
  config?: AnalysisConfigInput;
  logger?: Logger;
  /** Apply covariate screening before iterating */
  screen?: boolean;
}

export interface AsyncBatchOptions {
  signal?: AbortSignal;
  /** Units in flight at once */
  concurrency?: number;
  logger?: Logger;
}

export interface SubsetDefinition {
  name: string;
  predicate: (record: SubjectRecord) => boolean;
}

export interface SubsetAnalysis {
  subset: string;
  nSubjects: number;
  threshold: number | undefined;
  comparison: ComparisonResult;
  curves: {
    low: SurvivalCurve;
    high: SurvivalCurve;
  };
}

export interface AdjustedComparison {
  covariate: string;
  result: ComparisonResult;
  logRankFDR: number | null;
  logRankBonferroni: number | null;
  hazardRatioFDR: number | null;
}

function runUnit<T>(unit: AnalysisUnit<T>, outcome: BatchOutcome<T>, logger: Logger): void {
  try {
    outcome.results.set(unit.key, unit.run());
    logger.debug(`Unit "${unit.key}" completed`);
  } catch (error) {
    if (!isSurvivalAnalysisError(error)) throw error;
    logger.warn(`Skipping "${unit.key}": ${error.message}`);
    outcome.skipped.push({ key: unit.key, kind: error.kind, message: error.message });
  }
}

/**
 * Run every unit in order and collect results.
 */
export function executeUnits<T>(units: Iterable<AnalysisUnit<T>>, logger: Logger = defaultLogger): BatchOutcome<T> {
  const outcome: BatchOutcome<T> = { results: new Map(), skipped: [], abandoned: false };
  for (const unit of units) {
    runUnit(unit, outcome, logger);
  }
  return outcome;
}

const yieldToEventLoop = () => new Promise<void>(resolve => setImmediate(resolve));

/**
 * Fan units out over `concurrency` cooperative workers, yielding to the event
 * loop between units. After an abort no further unit starts; results already
 * collected are kept.
 */
export async function executeUnitsAsync<T>(
  units: Iterable<AnalysisUnit<T>>,
  options: AsyncBatchOptions = {}
): Promise<BatchOutcome<T>> {
  const { signal, concurrency = 4, logger = defaultLogger } = options;
  const outcome: BatchOutcome<T> = { results: new Map(), skipped: [], abandoned: false };
  const iterator = units[Symbol.iterator]();
  let exhausted = false;
  // Set when a unit throws a non-survival error; the batch promise has rejected
  let failed = false;

  const worker = async () => {
    while (!exhausted && !failed) {
      await yieldToEventLoop();
      if (failed || signal?.aborted) return;
      const next = iterator.next();
      if (next.done) {
        exhausted = true;
        return;
      }
      try {
        runUnit(next.value, outcome, logger);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  await Promise.all(Array.from({ length: Math.max(1, Math.floor(concurrency)) }, worker));

  if (!exhausted && signal?.aborted) {
    outcome.abandoned = true;
    logger.info(`Batch abandoned after ${outcome.results.size + outcome.skipped.length} unit(s)`);
  }
  return outcome;
}

// Composite groups in a fixed order: primary High before Low, then candidate High before Low
function compositeGroups(primary: string, candidate: string): string[] {
  return [HIGH, LOW].flatMap(p => [HIGH, LOW].map(c => `${primary}=${p}, ${candidate}=${c}`));
}

/**
 * One unit per candidate: split, cross with the primary split, compare every pair.
 */
export function* crossProductUnits(
  cohort: SubjectCohort,
  primary: Labeling,
  candidates: Iterable<string>,
  config: AnalysisConfig,
  logger: Logger = defaultLogger
): Generator<AnalysisUnit<ComparisonResult[]>> {
  for (const candidate of new Set(candidates)) {
    yield {
      key: candidate,
      run: () => {
        if (candidate === primary.covariate) {
          throw new InvalidCovariateError(candidate, `Candidate "${candidate}" is the primary covariate`);
        }
        const split = thresholdSplit(cohort, candidate, config);
        const composite = crossProduct(primary, split);
        const present = new Set(composite.labels.values());
        const groups = compositeGroups(primary.covariate, candidate).filter(g => present.has(g));
        const required = config.requireCompleteCrossProduct ? 4 : 2;
        if (groups.length < required) {
          throw new InsufficientGroupsError(groups.length, required);
        }
        return compareAll(cohort, composite, groups, { config, logger });
      },
    };
  }
}

/**
 * One unit per covariate: High vs Low on its own split.
 */
export function* covariateUnits(
  cohort: SubjectCohort,
  covariates: Iterable<string>,
  config: AnalysisConfig,
  logger: Logger = defaultLogger
): Generator<AnalysisUnit<ComparisonResult>> {
  for (const covariate of new Set(covariates)) {
    yield {
      key: covariate,
      run: () => {
        const split = thresholdSplit(cohort, covariate, config);
        return comparePair(cohort, split, LOW, HIGH, { config, logger }).result;
      },
    };
  }
}

/**
 * One unit per subset: the single-covariate High vs Low pipeline on that subset.
 * With `stratifyWithin: "cohort"` the threshold comes from the whole cohort.
 */
export function* subsetUnits(
  cohort: SubjectCohort,
  covariate: string,
  subsets: SubsetDefinition[],
  config: AnalysisConfig,
  stratifyWithin: "subset" | "cohort" = "subset",
  logger: Logger = defaultLogger
): Generator<AnalysisUnit<SubsetAnalysis>> {
  let cohortThreshold: number | undefined;
  const thresholdFor = (): number | undefined => {
    if (stratifyWithin === "subset") return undefined;
    if (cohortThreshold === undefined) {
      cohortThreshold = thresholdSplit(cohort, covariate, config).threshold;
    }
    return cohortThreshold;
  };

  for (const subset of subsets) {
    yield {
      key: subset.name,
      run: () => {
        const members = cohort.filter(subset.predicate).assertNonEmpty(`subset "${subset.name}"`);
        const split = thresholdSplit(members, covariate, config, thresholdFor());
        const pair = comparePair(members, split, LOW, HIGH, { config, logger });
        return {
          subset: subset.name,
          nSubjects: members.size,
          threshold: split.threshold,
          comparison: pair.result,
          curves: { low: pair.curveA, high: pair.curveB },
        };
      },
    };
  }
}

// Screened-out covariates are reported as InvalidCovariate skips
function screenAsSkips(
  cohort: SubjectCohort,
  names: string[],
  reference: string | undefined,
  config: AnalysisConfig,
  logger: Logger
): { kept: string[]; preSkipped: SkippedUnit[] } {
  const { kept, excluded } = screenCovariates(cohort, names, { reference, config, logger });
  const preSkipped = excluded.map(({ name, reason, duplicateOf }): SkippedUnit => ({
    key: name,
    kind: "InvalidCovariate",
    message:
      reason === "duplicate"
        ? `duplicate of "${duplicateOf}"`
        : reason === "reference"
          ? "primary covariate"
          : `${reason} covariate`,
  }));
  return { kept, preSkipped };
}

function prepareCrossProduct(
  cohort: SubjectCohort,
  primaryCovariate: string,
  candidates: string[],
  options: BatchOptions
) {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? defaultLogger;
  cohort.assertNonEmpty();

  // The primary split is shared by every unit, so its failure ends the batch
  const primary = thresholdSplit(cohort, primaryCovariate, config);

  const { kept, preSkipped } = options.screen
    ? screenAsSkips(cohort, candidates, primaryCovariate, config, logger)
    : { kept: candidates, preSkipped: [] };

  return { units: crossProductUnits(cohort, primary, kept, config, logger), preSkipped, logger };
}

/**
 * Stratify every candidate against the primary covariate and compare all
 * composite groups pairwise. Results are keyed by candidate name.
 */
export function runBatch(
  cohort: SubjectCohort,
  primaryCovariate: string,
  candidates: string[],
  options: BatchOptions = {}
): BatchOutcome<ComparisonResult[]> {
  const { units, preSkipped, logger } = prepareCrossProduct(cohort, primaryCovariate, candidates, options);
  const outcome = executeUnits(units, logger);
  outcome.skipped.unshift(...preSkipped);
  return outcome;
}

export async function runBatchAsync(
  cohort: SubjectCohort,
  primaryCovariate: string,
  candidates: string[],
  options: BatchOptions & Omit<AsyncBatchOptions, "logger"> = {}
): Promise<BatchOutcome<ComparisonResult[]>> {
  const { units, preSkipped, logger } = prepareCrossProduct(cohort, primaryCovariate, candidates, options);
  const outcome = await executeUnitsAsync(units, {
    signal: options.signal,
    concurrency: options.concurrency,
    logger,
  });
  outcome.skipped.unshift(...preSkipped);
  return outcome;
}

/**
 * High vs Low comparison for each covariate (e.g. a per-gene screen).
 */
export function runCovariateBatch(
  cohort: SubjectCohort,
  covariates: string[],
  options: BatchOptions = {}
): BatchOutcome<ComparisonResult> {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? defaultLogger;
  cohort.assertNonEmpty();

  const { kept, preSkipped } = options.screen
    ? screenAsSkips(cohort, covariates, undefined, config, logger)
    : { kept: covariates, preSkipped: [] };

  const outcome = executeUnits(covariateUnits(cohort, kept, config, logger), logger);
  outcome.skipped.unshift(...preSkipped);
  return outcome;
}

/**
 * The single-covariate pipeline repeated over cohort subsets, e.g. one per
 * clinical stratum.
 */
export function runSubsetBatch(
  cohort: SubjectCohort,
  covariate: string,
  subsets: SubsetDefinition[],
  options: BatchOptions & { stratifyWithin?: "subset" | "cohort" } = {}
): BatchOutcome<SubsetAnalysis> {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? defaultLogger;
  cohort.assertNonEmpty();
  return executeUnits(subsetUnits(cohort, covariate, subsets, config, options.stratifyWithin, logger), logger);
}

/**
 * Attach Benjamini-Hochberg and Bonferroni adjusted p-values across a
 * covariate batch, in result order.
 */
export function adjustComparisons(results: Map<string, ComparisonResult>): AdjustedComparison[] {
  const entries = Array.from(results.entries());
  const logRank = entries.map(([, r]) => r.logRankPValue);
  const logRankFDR = benjaminiHochberg(logRank);
  const logRankBonferroni = bonferroni(logRank);
  const hazardRatioFDR = benjaminiHochberg(entries.map(([, r]) => r.hazardRatioPValue));

  return entries.map(([covariate, result], i) => ({
    covariate,
    result,
    logRankFDR: logRankFDR[i],
    logRankBonferroni: logRankBonferroni[i],
    hazardRatioFDR: hazardRatioFDR[i],
  }));
}
