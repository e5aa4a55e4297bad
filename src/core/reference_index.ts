// src/core/reference_index.ts
import type { SchemaModel, TableSchema, ReferencePool } from "../types/schema.js";
import type { GeneratedRow, RawReferenceRow, ReferenceDataSet } from "../types/data.js";
import type { RunConfig } from "../types/config.js";
import type { RNG } from "../types/rng.js";
import type { Logger } from "../util/log.js";
import { silentLogger } from "../util/log.js";
import { tupleKey, extractTuple } from "../util/keys.js";
import {
  EmptyReferencePoolError,
  InvalidReferenceDataError,
} from "../errors.js";
import { coerceValue } from "./coerce.js";
import { isMandatoryForeignKey } from "./schema_check.js";

export type WeightBackfill = RunConfig["weightBackfill"];

export type PoolOptions = {
  weightBackfill: WeightBackfill;
  inferBooleanWeights: boolean;
};

const POSITIVE_WORDS = new Set(["yes", "y", "true", "t", "1", "active", "enabled"]);
const NEGATIVE_WORDS = new Set(["no", "n", "false", "f", "0", "inactive", "disabled"]);

/** Split a raw row into its values and its weight-ish field, if any. */
function splitWeight(row: RawReferenceRow): {
  values: RawReferenceRow;
  weight: unknown;
} {
  const values: RawReferenceRow = {};
  const found: { weight?: unknown; frequency?: unknown } = {};

  for (const [key, value] of Object.entries(row)) {
    const lower = key.toLowerCase();
    if (lower === "weight" || lower === "frequency") {
      found[lower] = value;
    } else {
      values[key] = value;
    }
  }

  return { values, weight: found.weight ?? found.frequency };
}

function parseWeight(table: string, index: number, raw: unknown): number | undefined {
  if (raw === undefined || raw === null || raw === "") return undefined;

  let value: number;
  if (typeof raw === "number") {
    value = raw;
  } else if (typeof raw === "string") {
    const text = raw.trim();
    value = Number(text.endsWith("%") ? text.slice(0, -1) : text);
  } else {
    value = Number.NaN;
  }

  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidReferenceDataError(
      table,
      `row ${index + 1} has invalid weight ${JSON.stringify(raw)}`,
    );
  }
  return value;
}

/**
 * For a two-row yes/no style lookup without weights, favour the positive row.
 * Returns undefined when the rows do not look boolean.
 */
export function suggestBooleanWeights(
  rows: RawReferenceRow[],
): [number, number] | undefined {
  if (rows.length !== 2) return undefined;

  const words = rows.map((row) =>
    Object.values(row).map((v) => String(v).trim().toLowerCase()),
  );
  const positive = words.findIndex((vals) => vals.some((v) => POSITIVE_WORDS.has(v)));
  const negative = words.findIndex((vals) => vals.some((v) => NEGATIVE_WORDS.has(v)));

  if (positive === -1 || negative === -1 || positive === negative) return undefined;
  return positive === 0 ? [0.7, 0.3] : [0.3, 0.7];
}

/**
 * Build the weighted pool for one reference table. Values are coerced to the
 * column types when a table definition is supplied.
 */
export function buildReferencePool(
  tableName: string,
  rows: RawReferenceRow[],
  options: PoolOptions,
  table?: TableSchema,
): ReferencePool {
  const split = rows.map(splitWeight);
  const given = split.map((r, i) => parseWeight(tableName, i, r.weight));
  const specified = given.filter((w): w is number => w !== undefined);

  let weights: number[];
  let weighted = specified.length > 0;

  if (specified.length === 0) {
    const suggested = options.inferBooleanWeights
      ? suggestBooleanWeights(split.map((r) => r.values))
      : undefined;
    weighted = suggested !== undefined;
    weights = suggested ?? rows.map(() => 1);
  } else {
    const fill =
      options.weightBackfill === "mean"
        ? specified.reduce((sum, w) => sum + w, 0) / specified.length
        : 1;
    weights = given.map((w) => w ?? fill);
  }

  if (rows.length > 0 && weights.reduce((sum, w) => sum + w, 0) <= 0) {
    throw new InvalidReferenceDataError(tableName, "weights sum to zero");
  }

  const entries = split.map((r, i) => ({
    values: table ? coerceRow(table, i, r.values) : plainRow(r.values),
    weight: weights[i] ?? 1,
  }));

  return { entries, weighted };
}

function coerceRow(table: TableSchema, index: number, raw: RawReferenceRow): GeneratedRow {
  const row: GeneratedRow = {};
  const byLower = new Map(Object.entries(raw).map(([k, v]) => [k.toLowerCase(), v]));

  for (const column of table.columns) {
    if (!byLower.has(column.name.toLowerCase())) continue;
    const result = coerceValue(column, blankToNull(byLower.get(column.name.toLowerCase())));
    if (!result.ok) {
      throw new InvalidReferenceDataError(
        table.name,
        `row ${index + 1}, column ${column.name}: ${result.reason}`,
      );
    }
    row[column.name] = result.value;
  }

  return row;
}

function plainRow(raw: RawReferenceRow): GeneratedRow {
  const row: GeneratedRow = {};
  for (const [key, value] of Object.entries(raw)) {
    row[key] =
      value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean"
        ? value
        : value === undefined
          ? null
          : String(value);
  }
  return row;
}

/** CSV gives "" for empty cells; treat those as missing values. */
function blankToNull(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? null : value;
}

/**
 * Draws reference rows with replacement, proportionally to their weights.
 */
export class WeightedSampler {
  private readonly cumulative: number[];
  readonly total: number;

  constructor(private readonly entries: ReferencePool["entries"]) {
    let running = 0;
    this.cumulative = entries.map((e) => (running += e.weight));
    this.total = running;
  }

  get size(): number {
    return this.entries.length;
  }

  get rows(): GeneratedRow[] {
    return this.entries.map((e) => e.values);
  }

  get weights(): number[] {
    return this.entries.map((e) => e.weight);
  }

  /** Normalised probability of each entry. */
  probabilities(): number[] {
    return this.entries.map((e) => (this.total > 0 ? e.weight / this.total : 0));
  }

  sample(rng: RNG): GeneratedRow {
    const entry = this.entries[this.sampleIndex(rng)];
    if (!entry) throw new Error("Sampler index out of range");
    return entry.values;
  }

  /** Position of a weighted draw, for callers that keep rows aligned with the pool. */
  sampleIndex(rng: RNG): number {
    if (this.entries.length === 0 || this.total <= 0) {
      throw new Error("Cannot sample from an empty reference pool");
    }

    const u = rng() * this.total;

    // first cumulative weight strictly greater than u; skips zero-weight rows
    let lo = 0;
    let hi = this.cumulative.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if ((this.cumulative[mid] ?? 0) > u) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }

    return lo;
  }
}

/**
 * Read-only lookup of reference pools for one run.
 */
export class ReferenceWeightIndex {
  private readonly keyCache = new Map<string, Set<string>>();

  private constructor(private readonly samplers: Map<string, WeightedSampler>) {}

  static fromSchema(schema: SchemaModel): ReferenceWeightIndex {
    const samplers = new Map<string, WeightedSampler>();
    for (const table of schema.tables) {
      if (table.referencePool && table.referencePool.entries.length > 0) {
        samplers.set(table.name, new WeightedSampler(table.referencePool.entries));
      }
    }
    return new ReferenceWeightIndex(samplers);
  }

  has(table: string): boolean {
    return this.samplers.has(table);
  }

  get(table: string): WeightedSampler | undefined {
    return this.samplers.get(table);
  }

  sample(table: string, rng: RNG): GeneratedRow {
    const sampler = this.samplers.get(table);
    if (!sampler) throw new Error(`No reference pool for ${table}`);
    return sampler.sample(rng);
  }

  /** Key tuples present in a reference table for the given columns. */
  keySet(table: string, columns: readonly string[]): Set<string> {
    const cacheKey = `${table}::${columns.join(",")}`;
    const cached = this.keyCache.get(cacheKey);
    if (cached) return cached;

    const keys = new Set(
      (this.samplers.get(table)?.rows ?? []).map((row) => tupleKey(extractTuple(row, columns))),
    );
    this.keyCache.set(cacheKey, keys);
    return keys;
  }
}

/**
 * Attach reference data to the schema IR. Returns a new schema; the input is
 * left untouched. Table names match case-insensitively.
 */
export function mergeReferenceData(
  schema: SchemaModel,
  data: ReferenceDataSet,
  options: PoolOptions,
  logger: Logger = silentLogger,
): SchemaModel {
  const byLower = new Map(schema.tables.map((t) => [t.name.toLowerCase(), t.name]));
  const pools = new Map<string, RawReferenceRow[]>();

  for (const [name, rows] of Object.entries(data)) {
    const tableName = byLower.get(name.toLowerCase());
    if (!tableName) {
      logger.warn(`Reference data for unknown table "${name}" skipped`);
      continue;
    }
    pools.set(tableName, rows);
  }

  return {
    ...schema,
    tables: schema.tables.map((table) => {
      const rows = pools.get(table.name);
      if (!rows) return table;
      return {
        ...table,
        isReferenceTable: true,
        referencePool: buildReferencePool(table.name, rows, options, table),
      };
    }),
  };
}

/**
 * Fail fast when a supplied pool has no usable key for a foreign key that
 * targets it, or when an empty reference table backs a mandatory foreign key
 * and there is no generation fallback.
 */
export function checkReferencePools(
  schema: SchemaModel,
  policy: RunConfig["emptyReferencePolicy"],
): void {
  for (const table of schema.tables) {
    const entries = table.referencePool?.entries ?? [];
    if (entries.length === 0) continue;
    const minted = new Set(table.columns.filter((c) => c.isIdentity).map((c) => c.name));

    for (const other of schema.tables) {
      for (const fk of other.foreignKeys) {
        if (fk.refTable !== table.name) continue;
        const usable = entries.some((entry) =>
          fk.refColumns.every((col) => minted.has(col) || entry.values[col] != null),
        );
        if (!usable) {
          throw new InvalidReferenceDataError(
            table.name,
            `no row has a value for (${fk.refColumns.join(", ")}) referenced by ${fk.constraintName}`,
          );
        }
      }
    }
  }

  if (policy === "generate") return;

  for (const table of schema.tables) {
    const empty =
      table.isReferenceTable && (table.referencePool?.entries.length ?? 0) === 0;
    if (!empty) continue;

    const referencedBy = schema.tables
      .filter((other) =>
        other.foreignKeys.some(
          (fk) =>
            fk.refTable === table.name &&
            other.name !== table.name &&
            isMandatoryForeignKey(other, fk.columns),
        ),
      )
      .map((other) => other.name);

    if (referencedBy.length > 0) {
      throw new EmptyReferencePoolError(table.name, referencedBy);
    }
  }
}
