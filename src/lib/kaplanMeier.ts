/**
 * Kaplan-Meier product-limit estimator for right-censored survival data.
 *
 * The curve has one step per distinct event time. Times with only censoring
 * do not add a step, but the censored subjects leave the at-risk set for every
 * later time. Confidence bands use Greenwood's variance on the log scale.
 */

import { EmptyCohortError } from "@/lib/errors";
import { SubjectCohort, type SubjectRecord } from "@/lib/subjectCohort";

export interface SurvivalStep {
  time: number;
  nAtRisk: number;
  nEvents: number;
  /** Subjects censored at exactly this time */
  nCensored: number;
  survival: number;
  stdErr: number | null;
  lowerCI: number | null;
  upperCI: number | null;
}

export interface SurvivalCurve {
  steps: SurvivalStep[];
  /** Times with censoring but no event (plot marks) */
  censorTimes: number[];
  nSubjects: number;
  nEvents: number;
  nCensored: number;
  /** First time the curve reaches 0.5 or below; null when not reached */
  median: number | null;
}

const Z_95 = 1.959963984540054;
// Absorbs rounding in products such as 0.9 * 5/9 landing just above 0.5
const MEDIAN_TOLERANCE = 1e-12;

/**
 * Calculate Greenwood's variance for confidence intervals
 * V(S(t)) = S(t)^2 * Σ d_i / (n_i * (n_i - d_i))
 */
export function calculateGreenwoodVariance(
  survivalValue: number,
  cumulativeVarianceTerm: number
): number {
  return survivalValue * survivalValue * cumulativeVarianceTerm;
}

interface TimeTally {
  time: number;
  events: number;
  censored: number;
}

function tallyByTime(records: readonly SubjectRecord[]): TimeTally[] {
  const sorted = [...records].sort((a, b) => a.time - b.time);
  const tallies: TimeTally[] = [];
  for (const record of sorted) {
    let tally: TimeTally | undefined = tallies[tallies.length - 1];
    if (!tally || tally.time !== record.time) {
      tally = { time: record.time, events: 0, censored: 0 };
      tallies.push(tally);
    }
    if (record.event) tally.events++;
    else tally.censored++;
  }
  return tallies;
}

/**
 * Estimate the Kaplan-Meier survival curve of a cohort or record subset.
 */
export function estimateSurvival(subjects: SubjectCohort | readonly SubjectRecord[]): SurvivalCurve {
  const records = subjects instanceof SubjectCohort ? subjects.records : subjects;
  if (records.length === 0) {
    throw new EmptyCohortError("Cannot estimate a survival curve for an empty group");
  }

  const steps: SurvivalStep[] = [];
  const censorTimes: number[] = [];
  let atRisk = records.length;
  let survival = 1;
  let greenwoodTerm = 0;
  let nEvents = 0;
  let nCensored = 0;

  for (const { time, events, censored } of tallyByTime(records)) {
    if (events > 0) {
      survival *= (atRisk - events) / atRisk;
      const stepTerm = atRisk > events ? events / (atRisk * (atRisk - events)) : Infinity;
      greenwoodTerm += stepTerm;

      let stdErr: number | null = null;
      let lowerCI: number | null = null;
      let upperCI: number | null = null;
      if (survival > 0 && Number.isFinite(greenwoodTerm)) {
        stdErr = Math.sqrt(calculateGreenwoodVariance(survival, greenwoodTerm));
        const logSpread = Z_95 * Math.sqrt(greenwoodTerm);
        lowerCI = survival * Math.exp(-logSpread);
        upperCI = Math.min(1, survival * Math.exp(logSpread));
      }

      steps.push({ time, nAtRisk: atRisk, nEvents: events, nCensored: censored, survival, stdErr, lowerCI, upperCI });
    } else {
      censorTimes.push(time);
    }

    nEvents += events;
    nCensored += censored;
    atRisk -= events + censored;
  }

  return {
    steps,
    censorTimes,
    nSubjects: records.length,
    nEvents,
    nCensored,
    median: medianSurvivalTime(steps),
  };
}

/**
 * First step time at which survival is at or below 0.5. This depends only on
 * the curve, not on the share of subjects with an observed event.
 */
export function medianSurvivalTime(steps: readonly SurvivalStep[]): number | null {
  for (const step of steps) {
    if (step.survival <= 0.5 + MEDIAN_TOLERANCE) return step.time;
  }
  return null;
}

/**
 * Value of the survival step function at time t (right-continuous)
 */
export function survivalAt(curve: SurvivalCurve, t: number): number {
  let value = 1;
  for (const step of curve.steps) {
    if (step.time > t) break;
    value = step.survival;
  }
  return value;
}
