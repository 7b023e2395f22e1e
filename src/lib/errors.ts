/**
 * Error types raised by the survival-analysis engine.
 * Every error carries a `kind` so batch runs can record failures as data.
 */

export type SurvivalErrorKind =
  | "InvalidCohort"
  | "InvalidConfig"
  | "InvalidCovariate"
  | "EmptyCohort"
  | "InsufficientGroups"
  | "DegenerateGroup"
  | "NonConvergence"
  | "Separation";

export class SurvivalAnalysisError extends Error {
  readonly kind: SurvivalErrorKind;

  constructor(kind: SurvivalErrorKind, message: string) {
    super(message);
    this.name = `${kind}Error`;
    this.kind = kind;
  }
}

export class InvalidCohortError extends SurvivalAnalysisError {
  constructor(message: string) {
    super("InvalidCohort", message);
  }
}

export class InvalidConfigError extends SurvivalAnalysisError {
  constructor(message: string) {
    super("InvalidConfig", message);
  }
}

export class InvalidCovariateError extends SurvivalAnalysisError {
  readonly covariate: string;

  constructor(covariate: string, message: string) {
    super("InvalidCovariate", message);
    this.covariate = covariate;
  }
}

export class EmptyCohortError extends SurvivalAnalysisError {
  constructor(message = "Cohort has no eligible subjects") {
    super("EmptyCohort", message);
  }
}

export class InsufficientGroupsError extends SurvivalAnalysisError {
  constructor(found: number, required = 2) {
    super("InsufficientGroups", `Need at least ${required} non-empty groups, found ${found}`);
  }
}

export class NonConvergenceError extends SurvivalAnalysisError {
  readonly iterations: number;

  constructor(iterations: number, lastStep: number) {
    super(
      "NonConvergence",
      `Cox fit did not converge after ${iterations} iterations (last step ${lastStep.toExponential(2)})`
    );
    this.iterations = iterations;
  }
}

export class SeparationError extends SurvivalAnalysisError {
  constructor(message: string) {
    super("Separation", message);
  }
}

export function isSurvivalAnalysisError(error: unknown): error is SurvivalAnalysisError {
  return error instanceof SurvivalAnalysisError;
}
