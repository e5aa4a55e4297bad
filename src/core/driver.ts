// src/core/driver.ts
import type { SchemaModel, TableSchema } from "../types/schema.js";
import type { GeneratedRow } from "../types/data.js";
import type { RunConfig, RunConfigInput } from "../types/config.js";
import type { GenerationBackend, RejectionCounts } from "../types/backend.js";
import type { OutputSink } from "../types/sink.js";
import type { RNG } from "../types/rng.js";
import { parseRunConfig } from "../models/config.js";
import { literalDefault } from "../models/schema.js";
import { coerceValue } from "./coerce.js";
import { InvalidReferenceDataError } from "../errors.js";
import { silentLogger, type Logger } from "../util/log.js";
import { createRng } from "../util/rng.js";
import { extractTuple, tupleKey } from "../util/keys.js";
import { buildPlan } from "./plan.js";
import { ReferenceWeightIndex, checkReferencePools } from "./reference_index.js";
import { RunState } from "./run_state.js";
import { runWithRetry, withTimeout, systemClock, type Clock } from "./retry.js";
import { buildRequest, type RequestContext } from "./request.js";
import {
  countRejections,
  outputColumns,
  parseBackendRows,
  validateRows,
} from "./validate_rows.js";

export type ShortfallWarning = {
  type: "shortfall";
  table: string;
  requested: number;
  produced: number;
  rejections: RejectionCounts;
};

export type TableOutcome = {
  rows: GeneratedRow[];
  requested: number;
  source: "reference" | "generated";
};

export type RunResult = {
  status: "completed" | "aborted";
  seed: number;
  order: string[];
  tables: Map<string, TableOutcome>;
  warnings: ShortfallWarning[];
  durationMs: number;
};

export type DriverOptions = {
  backend: GenerationBackend;
  config?: RunConfigInput;
  sink?: OutputSink;
  logger?: Logger;
  clock?: Clock;
  /** Checked between tables; an aborted run keeps what was committed. */
  signal?: AbortSignal;
};

/**
 * Runs one generation: plan, then table by table request, validate, repair
 * and commit.
 */
export class GenerationDriver {
  readonly config: RunConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly schema: SchemaModel,
    private readonly options: DriverOptions,
  ) {
    this.config = parseRunConfig(options.config ?? {});
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
  }

  async run(): Promise<RunResult> {
    const started = this.clock.now();
    const { schema, config, logger } = this;

    const index = ReferenceWeightIndex.fromSchema(schema);
    const plan = buildPlan(schema, config);
    checkReferencePools(schema, config.emptyReferencePolicy);

    const rng = createRng(plan.seed);
    const backoffRng = createRng(`${plan.seed}:backoff`);
    const state = new RunState(schema);
    const tables = new Map(schema.tables.map((t) => [t.name, t]));

    const result: RunResult = {
      status: "completed",
      seed: plan.seed,
      order: plan.tableOrder,
      tables: new Map(),
      warnings: [],
      durationMs: 0,
    };

    logger.info(`Seed ${plan.seed}; order: ${plan.tableOrder.join(" → ")}`);

    for (const name of plan.tableOrder) {
      if (this.options.signal?.aborted) {
        logger.warn(`Run aborted before ${name}`);
        result.status = "aborted";
        break;
      }

      const table = tables.get(name);
      const tablePlan = plan.tablePlans.get(name);
      if (!table || !tablePlan) continue;

      let rows: GeneratedRow[];
      if (tablePlan.source === "reference") {
        rows = this.emitReference(table, state);
      } else {
        logger.info(`🎲 ${name}: generating ${tablePlan.rowCount} row(s)`);
        rows = await this.generateTable(table, tablePlan.rowCount, {
          state,
          index,
          rng,
          backoffRng,
          warnings: result.warnings,
        });
      }

      result.tables.set(name, {
        rows,
        requested: tablePlan.rowCount,
        source: tablePlan.source,
      });
      logger.info(`✅ ${name}: committed ${rows.length} row(s)`);

      await this.options.sink?.writeTable(name, rows, outputColumns(table));
    }

    result.durationMs = this.clock.now() - started;
    return result;
  }

  /**
   * Reference tables are emitted as supplied. Missing identity values are
   * minted; other missing columns take their literal default or null. A row
   * left without a key or a NOT NULL value is invalid reference data.
   */
  private emitReference(table: TableSchema, state: RunState): GeneratedRow[] {
    const supplied = (table.referencePool?.entries ?? []).map((e) => e.values);
    state.observeIdentity(table.name, supplied);

    const rows = supplied.map((values) => {
      const row: GeneratedRow = {};
      for (const column of table.columns) {
        if (column.isComputed) continue;
        const value = values[column.name];
        if (value !== undefined) {
          row[column.name] = value;
        } else if (column.isIdentity) {
          row[column.name] = state.nextIdentity(table.name, column.name);
        } else {
          const fallback = coerceValue(column, literalDefault(column));
          row[column.name] = fallback.ok ? fallback.value : null;
        }
      }
      return row;
    });

    const keyColumns = new Set(table.primaryKey);
    rows.forEach((row, i) => {
      for (const column of table.columns) {
        if (column.isComputed || row[column.name] !== null) continue;
        if (keyColumns.has(column.name) || !column.isNullable) {
          throw new InvalidReferenceDataError(
            table.name,
            `row ${i + 1} has no value for required column ${column.name}`,
          );
        }
      }
    });

    if (table.primaryKey.length > 0) {
      const seen = new Set<string>();
      rows.forEach((row, i) => {
        const key = tupleKey(extractTuple(row, table.primaryKey));
        if (seen.has(key)) {
          throw new InvalidReferenceDataError(
            table.name,
            `row ${i + 1} repeats primary key ${key}`,
          );
        }
        seen.add(key);
      });
    }

    state.commit(table.name, rows);
    return rows;
  }

  private async generateTable(
    table: TableSchema,
    requested: number,
    run: {
      state: RunState;
      index: ReferenceWeightIndex;
      rng: RNG;
      backoffRng: RNG;
      warnings: ShortfallWarning[];
    },
  ): Promise<GeneratedRow[]> {
    const { config, logger } = this;
    const { backend } = this.options;
    const batch = run.state.begin(table);
    const rejections: RejectionCounts = {};

    const ctx: RequestContext = {
      table,
      batch,
      state: run.state,
      index: run.index,
      rng: run.rng,
      config,
    };

    for (
      let round = 0;
      round <= config.maxRepairAttempts && batch.size < requested;
      round++
    ) {
      const shortfall = requested - batch.size;
      if (round > 0) {
        logger.info(
          `🔧 ${table.name}: repair round ${round}, ${shortfall} row(s) short (${formatCounts(rejections)})`,
        );
      }

      const request = buildRequest(ctx, shortfall, round, rejections);

      const rawRows = await runWithRetry(
        async () => {
          const body = await withTimeout(table.name, config.backendTimeoutMs, (signal) =>
            backend.generate(request, { signal }),
          );
          return parseBackendRows(table, body, config.foreignKeyMode);
        },
        config.retry,
        {
          label: table.name,
          clock: this.clock,
          rng: run.backoffRng,
          onRetry: (d) =>
            logger.warn(
              `${table.name}: attempt ${d.attempt} failed (${d.error.message}); retrying in ${d.delayMs}ms`,
            ),
        },
      );

      const { rejections: rejected } = validateRows(
        {
          table,
          batch,
          state: run.state,
          rng: run.rng,
          mode: config.foreignKeyMode,
          assignments: request.assignments,
          wanted: shortfall,
        },
        rawRows,
      );
      countRejections(rejections, rejected);

      for (const r of rejected) {
        logger.debug(`${table.name}: row ${r.index + 1} rejected (${r.reason}): ${r.detail}`);
      }
    }

    if (batch.size < requested) {
      const warning: ShortfallWarning = {
        type: "shortfall",
        table: table.name,
        requested,
        produced: batch.size,
        rejections: { ...rejections },
      };
      run.warnings.push(warning);
      logger.warn(
        `${table.name}: produced ${batch.size} of ${requested} row(s) (${formatCounts(rejections)})`,
      );
    }

    return batch.commit();
  }
}

function formatCounts(counts: RejectionCounts): string {
  const parts = Object.entries(counts).map(([reason, n]) => `${reason}: ${n}`);
  return parts.length > 0 ? parts.join(", ") : "no rejections";
}
