/**
 * Cox Proportional Hazards (Cox PH) fit for a two-group comparison
 * Estimates the log hazard ratio of the comparison group against the
 * reference group from individual survival times.
 *
 * The log partial likelihood uses the Breslow approximation for tied event
 * times and is maximized by Newton-Raphson with step halving. Significance
 * comes from the Wald test, with likelihood-ratio and score tests alongside.
 */

import { type AnalysisConfig, defaultConfig } from "@/lib/config";
import { chiSquarePValue, normalTwoSidedPValue } from "@/lib/distributions";
import { InsufficientGroupsError, NonConvergenceError, SeparationError } from "@/lib/errors";
import { type Logger, defaultLogger } from "@/lib/logger";
import { SubjectCohort, type SubjectRecord } from "@/lib/subjectCohort";

export interface TestStatistic {
  chiSquare: number;
  df: number;
  pValue: number;
}

export interface CoxPHResult {
  referenceGroup: string;
  comparisonGroup: string;
  coefficient: number;
  se: number;
  hazardRatio: number;
  lowerCI: number;
  upperCI: number;
  zScore: number;
  pValue: number;
  waldTest: TestStatistic;
  likelihoodRatioTest: TestStatistic;
  scoreTest: TestStatistic;
  logLikelihood: {
    null: number;
    fitted: number;
  };
  iterations: number;
  nSubjects: number;
  nEvents: number;
}

export interface CoxFitOptions {
  config?: AnalysisConfig;
  logger?: Logger;
}

// Risk-set summary at one distinct event time
interface EventTime {
  time: number;
  atRiskReference: number;
  atRiskComparison: number;
  events: number;
  comparisonEvents: number;
}

const Z_95 = 1.959963984540054;
const MAX_STEP_HALVINGS = 30;

function buildEventTimes(subjects: Array<{ time: number; event: boolean; x: 0 | 1 }>): EventTime[] {
  const sorted = [...subjects].sort((a, b) => a.time - b.time);
  let atRiskReference = sorted.filter(s => s.x === 0).length;
  let atRiskComparison = sorted.length - atRiskReference;
  const eventTimes: EventTime[] = [];

  let i = 0;
  while (i < sorted.length) {
    const time = sorted[i].time;
    let events = 0;
    let comparisonEvents = 0;
    let leavingReference = 0;
    let leavingComparison = 0;
    while (i < sorted.length && sorted[i].time === time) {
      const s = sorted[i];
      if (s.event) {
        events++;
        if (s.x === 1) comparisonEvents++;
      }
      if (s.x === 1) leavingComparison++;
      else leavingReference++;
      i++;
    }
    if (events > 0) {
      eventTimes.push({ time, atRiskReference, atRiskComparison, events, comparisonEvents });
    }
    atRiskReference -= leavingReference;
    atRiskComparison -= leavingComparison;
  }

  return eventTimes;
}

/**
 * Log partial likelihood with its first and second derivatives at beta.
 * With a single 0/1 covariate the risk-set sum is n0 + n1·exp(beta).
 */
function partialLikelihood(eventTimes: EventTime[], beta: number) {
  const expBeta = Math.exp(beta);
  let logLik = 0;
  let score = 0;
  let information = 0;

  for (const t of eventTimes) {
    const denominator = t.atRiskReference + t.atRiskComparison * expBeta;
    const w = (t.atRiskComparison * expBeta) / denominator;
    logLik += beta * t.comparisonEvents - t.events * Math.log(denominator);
    score += t.comparisonEvents - t.events * w;
    information += t.events * w * (1 - w);
  }

  return { logLik, score, information };
}

/**
 * The partial likelihood has a finite maximum only if some event time with
 * both groups at risk has a comparison-group event and some other has a
 * reference-group event.
 */
function assertNotSeparated(eventTimes: EventTime[], referenceGroup: string, comparisonGroup: string): void {
  const referenceEvents = eventTimes.reduce((sum, t) => sum + t.events - t.comparisonEvents, 0);
  const comparisonEvents = eventTimes.reduce((sum, t) => sum + t.comparisonEvents, 0);
  if (referenceEvents === 0 || comparisonEvents === 0) {
    const empty = referenceEvents === 0 ? referenceGroup : comparisonGroup;
    throw new SeparationError(`Group "${empty}" has no events; the hazard ratio is unbounded`);
  }

  const shared = eventTimes.filter(t => t.atRiskReference > 0 && t.atRiskComparison > 0);
  const pushesUp = shared.some(t => t.comparisonEvents > 0);
  const pushesDown = shared.some(t => t.comparisonEvents < t.events);
  if (!pushesUp || !pushesDown) {
    throw new SeparationError(
      `Events of "${referenceGroup}" and "${comparisonGroup}" never compete within a shared risk set; the hazard ratio is unbounded`
    );
  }
}

/**
 * Fit a Cox PH model with membership of `comparisonGroup` (vs `referenceGroup`)
 * as the only covariate. Subjects with any other label are ignored.
 */
export function fitCoxPH(
  subjects: SubjectCohort | readonly SubjectRecord[],
  labels: ReadonlyMap<string, string>,
  referenceGroup: string,
  comparisonGroup: string,
  options: CoxFitOptions = {}
): CoxPHResult {
  const { config = defaultConfig, logger = defaultLogger } = options;
  const records = subjects instanceof SubjectCohort ? subjects.records : subjects;

  const coded: Array<{ time: number; event: boolean; x: 0 | 1 }> = [];
  for (const r of records) {
    const label = labels.get(r.id);
    if (label === referenceGroup) coded.push({ time: r.time, event: r.event, x: 0 });
    else if (label === comparisonGroup) coded.push({ time: r.time, event: r.event, x: 1 });
  }

  const nComparison = coded.filter(s => s.x === 1).length;
  const present = (nComparison > 0 ? 1 : 0) + (coded.length - nComparison > 0 ? 1 : 0);
  if (present < 2) {
    throw new InsufficientGroupsError(present);
  }

  const eventTimes = buildEventTimes(coded);
  assertNotSeparated(eventTimes, referenceGroup, comparisonGroup);

  const { tolerance, maxIterations } = config.cox;
  const atZero = partialLikelihood(eventTimes, 0);
  let beta = 0;
  let current = atZero;
  let converged = false;
  let iterations = 0;
  let step = 0;

  while (iterations < maxIterations) {
    iterations++;
    step = current.score / current.information;
    let next = partialLikelihood(eventTimes, beta + step);

    // Halve the step while it overshoots and lowers the likelihood
    let halvings = 0;
    while (!(next.logLik >= current.logLik) && halvings < MAX_STEP_HALVINGS) {
      step /= 2;
      next = partialLikelihood(eventTimes, beta + step);
      halvings++;
    }

    beta += step;
    current = next;
    if (Math.abs(step) < tolerance) {
      converged = true;
      break;
    }
  }

  if (!converged) {
    throw new NonConvergenceError(iterations, step);
  }
  logger.debug(`Cox fit ${comparisonGroup} vs ${referenceGroup} converged in ${iterations} iterations`);

  const se = 1 / Math.sqrt(current.information);
  const zScore = beta / se;
  const waldChiSquare = zScore * zScore;
  const lrtChiSquare = Math.max(0, 2 * (current.logLik - atZero.logLik));
  const scoreChiSquare = (atZero.score * atZero.score) / atZero.information;
  const pValue = normalTwoSidedPValue(zScore);

  return {
    referenceGroup,
    comparisonGroup,
    coefficient: beta,
    se,
    hazardRatio: Math.exp(beta),
    lowerCI: Math.exp(beta - Z_95 * se),
    upperCI: Math.exp(beta + Z_95 * se),
    zScore,
    pValue,
    waldTest: { chiSquare: waldChiSquare, df: 1, pValue },
    likelihoodRatioTest: { chiSquare: lrtChiSquare, df: 1, pValue: chiSquarePValue(lrtChiSquare, 1) },
    scoreTest: { chiSquare: scoreChiSquare, df: 1, pValue: chiSquarePValue(scoreChiSquare, 1) },
    logLikelihood: { null: atZero.logLik, fitted: current.logLik },
    iterations,
    nSubjects: coded.length,
    nEvents: eventTimes.reduce((sum, t) => sum + t.events, 0),
  };
}

/**
 * Format hazard ratio with CI for display
 */
export function formatHR(hr: number, lowerCI: number, upperCI: number): string {
  return `${hr.toFixed(2)} (${lowerCI.toFixed(2)}–${upperCI.toFixed(2)})`;
}
