export * from "@/lib/errors";
export * from "@/lib/logger";
export * from "@/lib/config";
export * from "@/lib/distributions";
export * from "@/lib/subjectCohort";
export * from "@/lib/stratifier";
export * from "@/lib/kaplanMeier";
export * from "@/lib/logRankTest";
export * from "@/lib/coxphAnalysis";
export * from "@/lib/pairwiseComparison";
export * from "@/lib/multipleTesting";
export * from "@/lib/covariateScreening";
export * from "@/lib/batchOrchestrator";
export * from "@/data/syntheticCohort";
