// src/models/config.ts
import { z } from "zod";

/**
 * Exponential backoff around a single backend invocation.
 * delay(attempt) = min(baseDelayMs * multiplier^(attempt - 1), maxDelayMs)
 */
export const RetryPolicySchema = z
  .object({
    maxAttempts: z.number().int().positive().default(3),
    baseDelayMs: z.number().nonnegative().default(1000),
    multiplier: z.number().min(1).default(2),
    maxDelayMs: z.number().nonnegative().default(30_000),
    // +/- fraction applied to each delay, drawn from a seed-derived RNG
    jitter: z.number().min(0).max(1).default(0),
  })
  .refine((v) => v.maxDelayMs >= v.baseDelayMs, {
    message: "maxDelayMs must be >= baseDelayMs",
    path: ["maxDelayMs"],
  });

export const RunConfigSchema = z.object({
  seed: z.number().int().optional(),

  // tableName -> rows to generate; unlisted tables use defaultRowCount or heuristics
  rowCounts: z.record(z.string(), z.number().int().nonnegative()).default({}),
  defaultRowCount: z.number().int().nonnegative().optional(),

  retry: RetryPolicySchema.default({}),
  backendTimeoutMs: z.number().int().positive().default(60_000),
  maxRepairAttempts: z.number().int().nonnegative().default(3),

  // upper bound on key tuples shown to the backend per generated upstream table
  fkSampleSize: z.number().int().positive().default(20),

  // "assign": core samples FK values itself; "validate": backend values are checked
  foreignKeyMode: z.enum(["assign", "validate"]).default("assign"),

  // what to do with a reference table that has no rows
  emptyReferencePolicy: z.enum(["generate", "fail"]).default("generate"),

  // weight for reference rows that omit one while siblings carry one
  weightBackfill: z.enum(["mean", "one"]).default("mean"),
  inferBooleanWeights: z.boolean().default(true),
});

/**
 * Validate a run configuration and apply defaults.
 */
export function parseRunConfig(input: unknown): z.infer<typeof RunConfigSchema> {
  const result = RunConfigSchema.safeParse(input);
  if (!result.success) {
    throw new Error(`Invalid run configuration: ${result.error.message}`);
  }
  return result.data;
}
