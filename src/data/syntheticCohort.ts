// Seeded synthetic survival data: exponential event times with optional
// exponential censoring and administrative end of follow-up

import { type Logger, silentLogger } from "@/lib/logger";
import { SubjectCohort, type SubjectRecordInput } from "@/lib/subjectCohort";

export type Rng = () => number;

export interface SyntheticGroup {
  label: string;
  n: number;
  /** Constant event hazard per unit time */
  hazard: number;
}

export interface SyntheticCohortOptions {
  seed: number;
  groups: SyntheticGroup[];
  /** Hazard of random censoring; 0 disables it */
  censorHazard?: number;
  /** Subjects still event-free at this time are censored */
  followUp?: number;
  /** Extra covariates per subject; the group label is always stored as "group" */
  covariates?: (rng: Rng, group: SyntheticGroup, index: number) => Record<string, number | string | null>;
}

/**
 * mulberry32: small deterministic PRNG, uniform on [0, 1)
 */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function exponential(rng: Rng, rate: number): number {
  return -Math.log(rng() || Number.MIN_VALUE) / rate;
}

// Box-Muller
export function normal(rng: Rng, mean = 0, sd = 1): number {
  const u = rng() || Number.MIN_VALUE;
  const v = rng();
  return mean + sd * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

export function generateSurvivalRecords(options: SyntheticCohortOptions): SubjectRecordInput[] {
  const { seed, groups, censorHazard = 0, followUp = Infinity, covariates } = options;
  const rng = createRng(seed);
  const records: SubjectRecordInput[] = [];

  groups.forEach(group => {
    for (let i = 0; i < group.n; i++) {
      const eventTime = exponential(rng, group.hazard);
      const censorTime = Math.min(followUp, censorHazard > 0 ? exponential(rng, censorHazard) : Infinity);
      const extra = covariates ? covariates(rng, group, i) : {};
      records.push({
        id: `${group.label}-${i + 1}`,
        time: Math.min(eventTime, censorTime),
        event: eventTime <= censorTime,
        covariates: { ...extra, group: group.label },
      });
    }
  });

  return records;
}

export function syntheticCohort(options: SyntheticCohortOptions, logger: Logger = silentLogger): SubjectCohort {
  return SubjectCohort.fromRecords(generateSurvivalRecords(options), logger);
}
