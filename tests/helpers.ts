import { silentLogger } from "@/lib/logger";
import { SubjectCohort, type SubjectRecord, type SubjectRecordInput } from "@/lib/subjectCohort";

/** [time, event] pairs for one group */
export type Observations = Array<[number, boolean]>;

export function groupInputs(
  group: string,
  observations: Observations,
  covariates: Record<string, number | string> = {}
): SubjectRecordInput[] {
  return observations.map(([time, event], i) => ({
    id: `${group}-${i + 1}`,
    time,
    event,
    covariates: { ...covariates, group },
  }));
}

export function cohortOf(groups: Record<string, Observations>): SubjectCohort {
  const inputs = Object.entries(groups).flatMap(([group, obs]) => groupInputs(group, obs));
  return SubjectCohort.fromRecords(inputs, silentLogger);
}

export function membersOf(cohort: SubjectCohort, group: string): readonly SubjectRecord[] {
  return cohort.records.filter(r => r.covariates.get("group")?.value === group);
}

export function groupLabels(cohort: SubjectCohort): Map<string, string> {
  return cohort.categoricalValues("group");
}
