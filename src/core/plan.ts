// src/core/plan.ts
import type { SchemaModel, TableSchema } from "../types/schema.js";
import type { RunConfig } from "../types/config.js";
import type { TablePlan, GenerationPlan } from "../types/plan.js";
import { toposort, buildFkEdges, compareNames } from "../util/toposort.js";
import { freshSeed } from "../util/rng.js";
import { checkSchema } from "./schema_check.js";

export const DEFAULT_ROWS = {
  emptyReference: 5,
  junction: 25,
  data: 50,
} as const;

/**
 * A table whose rows come from supplied reference data.
 */
export function hasReferenceRows(table: TableSchema): boolean {
  return (table.referencePool?.entries.length ?? 0) > 0;
}

export function isReferenceTable(table: TableSchema): boolean {
  return table.isReferenceTable || hasReferenceRows(table);
}

/**
 * Order tables so that every FK target precedes the tables referencing it.
 * Ties go to reference tables first, then to the lower table name.
 *
 * @throws CyclicDependencyError when two or more tables form a cycle
 */
export function planGeneration(schema: SchemaModel): string[] {
  const reference = new Set(
    schema.tables.filter(isReferenceTable).map((t) => t.name),
  );

  const compare = (a: string, b: string): number => {
    const refA = reference.has(a);
    if (refA !== reference.has(b)) return refA ? -1 : 1;
    return compareNames(a, b);
  };

  return toposort(
    schema.tables.map((t) => t.name),
    buildFkEdges(schema.tables),
    compare,
  );
}

/**
 * Rows to produce for a table. Reference tables are emitted as supplied;
 * otherwise an explicit count, then the configured default, then a
 * shape-based guess.
 */
export function resolveRowCount(table: TableSchema, config: RunConfig): number {
  if (hasReferenceRows(table)) {
    return table.referencePool?.entries.length ?? 0;
  }

  const explicit = config.rowCounts[table.name];
  if (explicit !== undefined) return explicit;

  if (config.defaultRowCount !== undefined) return config.defaultRowCount;

  if (table.isReferenceTable) return DEFAULT_ROWS.emptyReference;

  // Junction tables (mostly FK columns) get fewer rows
  const fkColumns = table.foreignKeys.reduce((n, fk) => n + fk.columns.length, 0);
  if (fkColumns > 0 && fkColumns >= table.columns.length / 2) {
    return DEFAULT_ROWS.junction;
  }

  return DEFAULT_ROWS.data;
}

/**
 * Build a generation plan from schema and run configuration.
 */
export function buildPlan(schema: SchemaModel, config: RunConfig): GenerationPlan {
  checkSchema(schema);

  const seed = config.seed ?? freshSeed();
  const tableOrder = planGeneration(schema);
  const tablePlans = new Map<string, TablePlan>();

  for (const table of schema.tables) {
    tablePlans.set(table.name, {
      table: table.name,
      source: hasReferenceRows(table) ? "reference" : "generated",
      rowCount: resolveRowCount(table, config),
    });
  }

  return { seed, tableOrder, tablePlans };
}
