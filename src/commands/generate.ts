// src/commands/generate.ts
import { Command, InvalidArgumentError } from "commander";
import { loadSchemaFile, loadRunConfigFile } from "../io/schema_loader.js";
import { loadReferenceDirectory } from "../io/reference_loader.js";
import { CsvDirectorySink, JsonDirectorySink, writeRunSummary } from "../io/sink.js";
import { mergeReferenceData } from "../core/reference_index.js";
import { buildPlan } from "../core/plan.js";
import { GenerationDriver } from "../core/driver.js";
import { parseRunConfig } from "../models/config.js";
import { FakerBackend } from "../backends/faker.js";
import { OpenAIBackend } from "../backends/openai.js";
import type { GenerationBackend } from "../types/backend.js";
import type { RunConfig } from "../types/config.js";
import type { SchemaModel } from "../types/schema.js";
import { createConsoleLogger, type Logger } from "../util/log.js";
import { freshSeed } from "../util/rng.js";
import { errorMessage } from "../errors.js";
import { prefixPath } from "../util/helper.js";

export type GenerateOptions = {
  schema: string;
  reference?: string;
  config?: string;
  output?: string;
  format: "csv" | "json";
  backend: "faker" | "openai";
  seed?: number;
  rows: Record<string, number>;
  defaultRows?: number;
  dryRun?: boolean;
  verbose?: boolean;
};

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return n;
}

/** `--rows Account=10` may be given several times. */
function collectRowCount(value: string, previous: Record<string, number>): Record<string, number> {
  const eq = value.lastIndexOf("=");
  if (eq <= 0) {
    throw new InvalidArgumentError("Expected <table>=<count>.");
  }
  return { ...previous, [value.slice(0, eq)]: parseInteger(value.slice(eq + 1)) };
}

function parseChoice<T extends string>(choices: readonly T[]) {
  return (value: string): T => {
    const match = choices.find((c) => c === value);
    if (!match) {
      throw new InvalidArgumentError(`Allowed: ${choices.join(", ")}.`);
    }
    return match;
  };
}

export function generateCmd(): Command {
  const cmd = new Command("generate");

  cmd
    .description("Generate referentially valid rows for every table in a schema")
    .requiredOption("-s, --schema <file>", "Path to schema JSON file")
    .option("-r, --reference <dir>", "Directory of reference data (.csv / .json)")
    .option("-c, --config <file>", "Run configuration JSON file")
    .option(
      "-o, --output <dir>",
      "Output directory (auto-prefixes output/ for relative paths)",
    )
    .option("--format <format>", "csv or json", parseChoice(["csv", "json"] as const), "csv")
    .option(
      "--backend <name>",
      "faker (offline) or openai",
      parseChoice(["faker", "openai"] as const),
      "faker",
    )
    .option("--seed <n>", "Seed for a reproducible run", parseInteger)
    .option("--rows <table=count>", "Rows for one table (repeatable)", collectRowCount, {})
    .option("--default-rows <n>", "Rows for tables without an explicit count", parseInteger)
    .option("--dry-run", "Show plan without generating data")
    .option("-v, --verbose", "Log rejected rows and retries in detail")
    .action(async (options: GenerateOptions) => {
      const logger = createConsoleLogger({ level: options.verbose ? "debug" : "info" });
      try {
        await runGenerate(options, logger);
      } catch (error) {
        console.error("❌ Generation failed:", errorMessage(error));
        process.exit(1);
      }
    });

  return cmd;
}

async function resolveConfig(options: GenerateOptions): Promise<RunConfig> {
  const base = options.config ? await loadRunConfigFile(options.config) : parseRunConfig({});
  return {
    ...base,
    ...(options.seed !== undefined ? { seed: options.seed } : {}),
    ...(options.defaultRows !== undefined ? { defaultRowCount: options.defaultRows } : {}),
    rowCounts: { ...base.rowCounts, ...options.rows },
  };
}

function createBackend(name: GenerateOptions["backend"]): GenerationBackend {
  if (name === "faker") return new FakerBackend();

  const apiKey = process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY is not set (add it to .env or the environment)");
  }
  return new OpenAIBackend({ apiKey, model: process.env.OPENAI_MODEL });
}

function printPlan(schema: SchemaModel, config: RunConfig): void {
  const plan = buildPlan(schema, config);

  console.error("");
  console.error("📋 Generation Plan:");
  console.error(`   Seed: ${plan.seed}`);
  console.error(`   Table order: ${plan.tableOrder.join(" → ")}`);
  console.error("");

  for (const tableName of plan.tableOrder) {
    const tablePlan = plan.tablePlans.get(tableName);
    if (!tablePlan) continue;
    console.error(`   ${tableName}: ${tablePlan.rowCount} rows (${tablePlan.source})`);
  }
  console.error("");
}

export async function runGenerate(options: GenerateOptions, logger: Logger): Promise<void> {
  const output = prefixPath("output", options.output) ?? "output";

  console.error("📄 Loading schema...");
  let schema = await loadSchemaFile(options.schema);
  console.error(`✅ Schema loaded (${schema.tables.length} tables)`);

  const config = await resolveConfig(options);

  if (options.reference) {
    console.error("📄 Loading reference data...");
    const data = await loadReferenceDirectory(options.reference);
    schema = mergeReferenceData(schema, data, config, logger);
    console.error(`✅ Reference data for ${Object.keys(data).length} table(s)`);
  }

  const seeded: RunConfig = { ...config, seed: config.seed ?? freshSeed() };
  printPlan(schema, seeded);

  if (options.dryRun) {
    console.error("🚫 Dry run - skipping generation");
    return;
  }

  const backend = createBackend(options.backend);
  const sink =
    options.format === "json" ? new JsonDirectorySink(output) : new CsvDirectorySink(output);

  console.error(`🎲 Generating data with ${backend.name}...`);
  const driver = new GenerationDriver(schema, { backend, config: seeded, sink, logger });
  const result = await driver.run();

  const summaryPath = await writeRunSummary(output, result, { backend: backend.name });

  let totalRows = 0;
  for (const outcome of result.tables.values()) {
    totalRows += outcome.rows.length;
  }
  console.error(`\n✅ Generated ${totalRows} rows across ${result.tables.size} tables`);
  if (result.warnings.length > 0) {
    console.error(`⚠️  ${result.warnings.length} table(s) came up short; see ${summaryPath}`);
  } else {
    console.error(`✅ Summary written to ${summaryPath}`);
  }
}
