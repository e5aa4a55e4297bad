// src/index.ts
export * from "./errors.js";
export { SchemaModelSchema, literalDefault, isDbGenerated } from "./models/schema.js";
export { RunConfigSchema, RetryPolicySchema, parseRunConfig } from "./models/config.js";

export type * from "./types/schema.js";
export type * from "./types/data.js";
export type * from "./types/config.js";
export type * from "./types/plan.js";
export type * from "./types/backend.js";
export type * from "./types/sink.js";
export type { RNG } from "./types/rng.js";

export { checkSchema, isMandatoryForeignKey } from "./core/schema_check.js";
export { planGeneration, resolveRowCount, buildPlan, DEFAULT_ROWS } from "./core/plan.js";
export {
  buildReferencePool,
  suggestBooleanWeights,
  WeightedSampler,
  ReferenceWeightIndex,
  mergeReferenceData,
  checkReferencePools,
} from "./core/reference_index.js";
export { RunState, TableBatch } from "./core/run_state.js";
export { RetryMachine, runWithRetry, withTimeout, systemClock, type Clock } from "./core/retry.js";
export { coerceValue } from "./core/coerce.js";
export {
  GenerationDriver,
  type DriverOptions,
  type RunResult,
  type ShortfallWarning,
  type TableOutcome,
} from "./core/driver.js";

export { FakerBackend } from "./backends/faker.js";
export { OpenAIBackend, type ChatClient } from "./backends/openai.js";

export {
  parseReferenceCsv,
  parseMultiTableCsv,
  parseReferenceJson,
  loadReferenceDirectory,
} from "./io/reference_loader.js";
export {
  MemorySink,
  CsvDirectorySink,
  JsonDirectorySink,
  writeRunSummary,
  summarizeRun,
} from "./io/sink.js";
export { loadSchemaFile, loadRunConfigFile, parseSchema } from "./io/schema_loader.js";
export { introspectPostgres, readSchema, buildSchemaModel } from "./db/pg_introspect.js";

export { createConsoleLogger, silentLogger, type Logger } from "./util/log.js";
