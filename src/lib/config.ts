import { z } from "zod";
import { InvalidConfigError } from "@/lib/errors";

export const CoxConfigSchema = z.object({
  tolerance: z.number().positive().default(1e-9),
  maxIterations: z.number().int().positive().default(25),
});

export const ScreeningConfigSchema = z.object({
  // |r| at or above this marks a numeric column as a near-duplicate
  duplicateCorrelation: z.number().min(0).max(1).default(0.9999),
});

export const AnalysisConfigSchema = z.object({
  thresholdQuantile: z.number().gt(0).lt(1).default(0.5),
  // A pair below either floor still gets a row, marked unreliable
  minEvents: z.number().int().min(0).default(1),
  minGroupSize: z.number().int().min(1).default(1),
  requireCompleteCrossProduct: z.boolean().default(false),
  cox: CoxConfigSchema.default({}),
  screening: ScreeningConfigSchema.default({}),
});

export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;
export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

export const defaultConfig: AnalysisConfig = AnalysisConfigSchema.parse({});

/**
 * Fill defaults and validate a caller-supplied configuration.
 */
export function resolveConfig(input?: AnalysisConfigInput): AnalysisConfig {
  if (input === undefined) return defaultConfig;

  const parsed = AnalysisConfigSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigError(`Invalid analysis config: ${detail}`);
  }
  return parsed.data;
}
