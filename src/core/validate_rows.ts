// src/core/validate_rows.ts
import { z } from "zod";
import type { TableSchema, ColumnSchema, ForeignKey } from "../types/schema.js";
import type { CellValue, GeneratedRow } from "../types/data.js";
import type { RNG } from "../types/rng.js";
import type { RejectionReason, RejectionCounts } from "../types/backend.js";
import type { RunConfig } from "../types/config.js";
import type { RunState, TableBatch } from "./run_state.js";
import { literalDefault } from "../models/schema.js";
import { BackendResponseError } from "../errors.js";
import { coerceValue } from "./coerce.js";
import { isSelfReference } from "./request.js";
import { isMandatoryForeignKey } from "./schema_check.js";
import { extractTuple, hasNull, tupleKey } from "../util/keys.js";
import { randomBool, randomPick } from "../util/rng.js";

// Chance that a nullable self-reference is left empty in assign mode.
export const SELF_REFERENCE_NULL_RATE = 0.3;

const RawRowSchema = z.record(z.string(), z.unknown());

export const BackendRowsSchema = z.union([
  z.array(RawRowSchema),
  z.object({ rows: z.array(RawRowSchema) }).transform((v) => v.rows),
]);

export type RawRow = z.infer<typeof RawRowSchema>;

export type RowRejection = {
  index: number;
  reason: RejectionReason;
  column?: string;
  detail: string;
};

export type ValidationResult = {
  accepted: GeneratedRow[];
  rejections: RowRejection[];
};

/** Columns that appear in output rows, in table order. */
export function outputColumns(table: TableSchema): string[] {
  return table.columns.filter((c) => !c.isComputed).map((c) => c.name);
}

/**
 * Columns every response row must name: not identity, not computed, not
 * nullable and without a literal default. FK columns filled by the core are
 * exempt.
 */
export function requiredColumns(table: TableSchema, assigned: ReadonlySet<string>): string[] {
  return table.columns
    .filter(
      (c) =>
        !c.isIdentity &&
        !c.isComputed &&
        !c.isNullable &&
        literalDefault(c) === undefined &&
        !assigned.has(c.name),
    )
    .map((c) => c.name);
}

/** FK columns the core overwrites in assign mode (self-references included). */
export function assignedColumns(
  table: TableSchema,
  mode: RunConfig["foreignKeyMode"],
): Set<string> {
  if (mode !== "assign") return new Set();
  return new Set(table.foreignKeys.flatMap((fk) => fk.columns));
}

/**
 * Check the shape of a backend response. Throws BackendResponseError (which
 * is retried) when it is not a list of objects or a row omits a required key.
 */
export function parseBackendRows(
  table: TableSchema,
  raw: unknown,
  mode: RunConfig["foreignKeyMode"],
): RawRow[] {
  const result = BackendRowsSchema.safeParse(raw);
  if (!result.success) {
    throw new BackendResponseError(
      `Malformed response for ${table.name}: ${result.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ")}`,
    );
  }

  const required = requiredColumns(table, assignedColumns(table, mode));
  result.data.forEach((row, i) => {
    const missing = required.filter((col) => !Object.hasOwn(row, col));
    if (missing.length > 0) {
      throw new BackendResponseError(
        `Malformed response for ${table.name}: row ${i + 1} is missing ${missing.join(", ")}`,
      );
    }
  });

  return result.data;
}

export type ValidationContext = {
  table: TableSchema;
  batch: TableBatch;
  state: RunState;
  rng: RNG;
  mode: RunConfig["foreignKeyMode"];
  /** Position-aligned with the response rows. */
  assignments: readonly GeneratedRow[];
  /** Rows still needed; anything past this is discarded. */
  wanted: number;
};

class Rejected {
  constructor(
    readonly reason: RejectionReason,
    readonly detail: string,
    readonly column?: string,
  ) {}
}

/**
 * Coerce and check response rows, accepting valid ones into the batch.
 * Identity values are minted here; FK values are assigned or checked
 * depending on the mode.
 */
export function validateRows(ctx: ValidationContext, rows: readonly RawRow[]): ValidationResult {
  const { table, batch } = ctx;
  const accepted: GeneratedRow[] = [];
  const rejections: RowRejection[] = [];

  rows.slice(0, ctx.wanted).forEach((raw, index) => {
    const outcome = checkRow(ctx, raw, ctx.assignments[index]);
    if (outcome instanceof Rejected) {
      rejections.push({
        index,
        reason: outcome.reason,
        detail: outcome.detail,
        ...(outcome.column !== undefined ? { column: outcome.column } : {}),
      });
      return;
    }

    for (const column of table.columns) {
      if (column.isIdentity && !column.isComputed) {
        outcome[column.name] = ctx.state.nextIdentity(table.name, column.name);
      }
    }
    batch.accept(outcome);
    accepted.push(outcome);
  });

  return { accepted, rejections };
}

function checkRow(
  ctx: ValidationContext,
  raw: RawRow,
  assignment: GeneratedRow | undefined,
): GeneratedRow | Rejected {
  const { table, mode } = ctx;
  const assigned = assignedColumns(table, mode);
  const row: GeneratedRow = {};

  for (const column of table.columns) {
    if (column.isComputed) continue;
    if (column.isIdentity) {
      row[column.name] = null;
      continue;
    }

    if (assigned.has(column.name)) {
      row[column.name] = assignment?.[column.name] ?? null;
      continue;
    }

    const value = resolveValue(column, raw);
    if (value instanceof Rejected) return value;
    row[column.name] = value;
  }

  for (const fk of table.foreignKeys) {
    if (!isSelfReference(table, fk)) continue;
    const outcome = resolveSelfReference(ctx, fk, row);
    if (outcome instanceof Rejected) return outcome;
  }

  for (const column of table.columns) {
    if (column.isIdentity || column.isComputed) continue;
    if (row[column.name] === null && !column.isNullable) {
      return new Rejected("null_violation", `${column.name} is null`, column.name);
    }
  }

  if (mode === "validate") {
    for (const fk of table.foreignKeys) {
      if (isSelfReference(table, fk)) continue;
      const tuple = extractTuple(row, fk.columns);
      if (hasNull(tuple)) continue;
      if (!ctx.state.keySet(fk.refTable, fk.refColumns).has(tupleKey(tuple))) {
        return new Rejected(
          "dangling_foreign_key",
          `${fk.constraintName}: ${tupleKey(tuple)} not found in ${fk.refTable}`,
        );
      }
    }
  }

  const pk = table.primaryKey;
  const pkMinted = pk.some((name) => table.columns.find((c) => c.name === name)?.isIdentity);
  if (pk.length > 0 && !pkMinted) {
    const tuple = extractTuple(row, pk);
    if (hasNull(tuple)) {
      return new Rejected("null_violation", `primary key ${pk.join(", ")} is null`);
    }
    if (ctx.batch.hasKey(tupleKey(tuple))) {
      return new Rejected("duplicate_key", `primary key ${tupleKey(tuple)} already used`);
    }
  }

  // NULLs never collide in a unique constraint
  for (const unique of table.uniques) {
    const tuple = extractTuple(row, unique.columns);
    if (hasNull(tuple)) continue;
    if (ctx.batch.hasUniqueKey(unique.columns, tupleKey(tuple))) {
      return new Rejected(
        "duplicate_key",
        `unique (${unique.columns.join(", ")}) ${tupleKey(tuple)} already used`,
      );
    }
  }

  return row;
}

function resolveValue(column: ColumnSchema, raw: RawRow): CellValue | Rejected {
  if (!Object.hasOwn(raw, column.name)) {
    const fallback = literalDefault(column);
    if (fallback === undefined) return null;
    const coerced = coerceValue(column, fallback);
    return coerced.ok ? coerced.value : null;
  }

  const coerced = coerceValue(column, raw[column.name]);
  if (!coerced.ok) {
    return new Rejected("type_mismatch", `${column.name}: ${coerced.reason}`, column.name);
  }
  return coerced.value;
}

/**
 * Self-references may only point at rows accepted before this one.
 */
function resolveSelfReference(
  ctx: ValidationContext,
  fk: ForeignKey,
  row: GeneratedRow,
): Rejected | undefined {
  const { table, batch, rng } = ctx;
  const nullable = !isMandatoryForeignKey(table, fk.columns);

  if (ctx.mode === "assign") {
    const clear = () => fk.columns.forEach((col) => (row[col] = null));

    if (nullable && randomBool(rng, SELF_REFERENCE_NULL_RATE)) {
      clear();
      return undefined;
    }

    const earlier = batch.earlierRows();
    if (earlier.length === 0) {
      if (nullable) {
        clear();
        return undefined;
      }
      return new Rejected(
        "dangling_foreign_key",
        `${fk.constraintName}: no earlier row to reference`,
      );
    }

    const target = randomPick(rng, earlier);
    fk.columns.forEach((col, k) => {
      const refCol = fk.refColumns[k];
      row[col] = refCol === undefined ? null : (target[refCol] ?? null);
    });
    return undefined;
  }

  const tuple = extractTuple(row, fk.columns);
  if (hasNull(tuple)) return undefined;
  if (!batch.keySet(fk.refColumns).has(tupleKey(tuple))) {
    return new Rejected(
      "dangling_foreign_key",
      `${fk.constraintName}: ${tupleKey(tuple)} is not an earlier row of ${table.name}`,
    );
  }
  return undefined;
}

export function countRejections(
  into: RejectionCounts,
  rejections: readonly RowRejection[],
): RejectionCounts {
  for (const r of rejections) {
    into[r.reason] = (into[r.reason] ?? 0) + 1;
  }
  return into;
}
