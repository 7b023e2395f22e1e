/**
 * Pairwise survival comparisons between mutually exclusive groups.
 *
 * Every unordered pair yields exactly one row, even when its statistics cannot
 * be computed; such rows carry null values and the issues that caused them.
 */

import { type AnalysisConfig, defaultConfig } from "@/lib/config";
import { fitCoxPH } from "@/lib/coxphAnalysis";
import { InsufficientGroupsError, type SurvivalErrorKind, isSurvivalAnalysisError } from "@/lib/errors";
import { type SurvivalCurve, estimateSurvival } from "@/lib/kaplanMeier";
import { type Logger, defaultLogger } from "@/lib/logger";
import { logRankTest } from "@/lib/logRankTest";
import { type Labeling, groupsOf } from "@/lib/stratifier";
import type { SubjectCohort, SubjectRecord } from "@/lib/subjectCohort";

export type Reliability = "ok" | "low-confidence" | "unreliable";

export interface ComparisonIssue {
  kind: SurvivalErrorKind | "InsufficientEvents" | "InsufficientSubjects";
  message: string;
}

export interface ComparisonResult {
  readonly groupA: string;
  readonly groupB: string;
  readonly nA: number;
  readonly nB: number;
  readonly eventsA: number;
  readonly eventsB: number;
  readonly medianA: number | null;
  readonly medianB: number | null;
  readonly logRankChiSquare: number | null;
  readonly logRankPValue: number | null;
  /** Hazard of group B relative to group A */
  readonly hazardRatio: number | null;
  readonly hazardRatioLowerCI: number | null;
  readonly hazardRatioUpperCI: number | null;
  readonly hazardRatioPValue: number | null;
  readonly reliability: Reliability;
  readonly issues: readonly ComparisonIssue[];
}

export interface PairAnalysis {
  result: ComparisonResult;
  curveA: SurvivalCurve;
  curveB: SurvivalCurve;
}

export interface ComparisonOptions {
  config?: AnalysisConfig;
  logger?: Logger;
}

function membersOf(cohort: SubjectCohort, labeling: Labeling, group: string): SubjectRecord[] {
  return cohort.records.filter(r => labeling.labels.get(r.id) === group);
}

function worse(a: Reliability, b: Reliability): Reliability {
  const rank: Record<Reliability, number> = { ok: 0, "low-confidence": 1, unreliable: 2 };
  return rank[a] >= rank[b] ? a : b;
}

/**
 * Curves, log-rank test and Cox fit for one pair of groups.
 */
export function comparePair(
  cohort: SubjectCohort,
  labeling: Labeling,
  groupA: string,
  groupB: string,
  options: ComparisonOptions = {}
): PairAnalysis {
  const { config = defaultConfig, logger = defaultLogger } = options;
  const recordsA = membersOf(cohort, labeling, groupA);
  const recordsB = membersOf(cohort, labeling, groupB);
  if (recordsA.length === 0 || recordsB.length === 0) {
    throw new InsufficientGroupsError((recordsA.length > 0 ? 1 : 0) + (recordsB.length > 0 ? 1 : 0));
  }

  const curveA = estimateSurvival(recordsA);
  const curveB = estimateSurvival(recordsB);
  const issues: ComparisonIssue[] = [];
  let reliability: Reliability = "ok";

  let logRankChiSquare: number | null = null;
  let logRankPValue: number | null = null;
  let hazardRatio: number | null = null;
  let hazardRatioLowerCI: number | null = null;
  let hazardRatioUpperCI: number | null = null;
  let hazardRatioPValue: number | null = null;

  const smallest = Math.min(recordsA.length, recordsB.length);
  const totalEvents = curveA.nEvents + curveB.nEvents;
  if (smallest < config.minGroupSize) {
    issues.push({
      kind: "InsufficientSubjects",
      message: `Smallest arm has ${smallest} subject(s); at least ${config.minGroupSize} required`,
    });
    reliability = "unreliable";
  } else if (totalEvents < config.minEvents || totalEvents === 0) {
    issues.push({
      kind: "InsufficientEvents",
      message: `${totalEvents} event(s) across "${groupA}" and "${groupB}"; at least ${Math.max(1, config.minEvents)} required`,
    });
    reliability = "unreliable";
  } else {
    const logRank = logRankTest(
      [{ label: groupA, records: recordsA }, { label: groupB, records: recordsB }],
      logger
    );
    logRankChiSquare = logRank.chiSquare;
    logRankPValue = logRank.pValue;
    if (logRank.lowConfidence) {
      issues.push({ kind: "DegenerateGroup", message: `No events in: ${logRank.degenerateGroups.join(", ")}` });
      reliability = worse(reliability, "low-confidence");
    }

    try {
      const cox = fitCoxPH([...recordsA, ...recordsB], labeling.labels, groupA, groupB, { config, logger });
      hazardRatio = cox.hazardRatio;
      hazardRatioLowerCI = cox.lowerCI;
      hazardRatioUpperCI = cox.upperCI;
      hazardRatioPValue = cox.pValue;
    } catch (error) {
      if (!isSurvivalAnalysisError(error)) throw error;
      logger.warn(`Cox fit ${groupB} vs ${groupA} unavailable: ${error.message}`);
      issues.push({ kind: error.kind, message: error.message });
      reliability = worse(reliability, "low-confidence");
    }
  }

  const result: ComparisonResult = Object.freeze({
    groupA,
    groupB,
    nA: curveA.nSubjects,
    nB: curveB.nSubjects,
    eventsA: curveA.nEvents,
    eventsB: curveB.nEvents,
    medianA: curveA.median,
    medianB: curveB.median,
    logRankChiSquare,
    logRankPValue,
    hazardRatio,
    hazardRatioLowerCI,
    hazardRatioUpperCI,
    hazardRatioPValue,
    reliability,
    issues: Object.freeze(issues),
  });

  return { result, curveA, curveB };
}

export function compareGroups(
  cohort: SubjectCohort,
  labeling: Labeling,
  groupA: string,
  groupB: string,
  options: ComparisonOptions = {}
): ComparisonResult {
  return comparePair(cohort, labeling, groupA, groupB, options).result;
}

/**
 * Compare every unordered pair of groups, in input order (A before B).
 * Groups default to the labels present in the labeling.
 */
export function compareAll(
  cohort: SubjectCohort,
  labeling: Labeling,
  groups?: string[],
  options: ComparisonOptions = {}
): ComparisonResult[] {
  const present = new Set(cohort.records.map(r => labeling.labels.get(r.id)));
  const candidates = Array.from(new Set(groups ?? groupsOf(labeling))).filter(g => present.has(g));
  if (candidates.length < 2) {
    throw new InsufficientGroupsError(candidates.length);
  }

  const results: ComparisonResult[] = [];
  for (let i = 0; i < candidates.length; i++) {
    for (let j = i + 1; j < candidates.length; j++) {
      results.push(compareGroups(cohort, labeling, candidates[i], candidates[j], options));
    }
  }
  return results;
}
