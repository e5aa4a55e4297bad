// src/core/request.ts
import type { TableSchema, ForeignKey } from "../types/schema.js";
import type { GeneratedRow } from "../types/data.js";
import type { RNG } from "../types/rng.js";
import type {
  ForeignKeyContext,
  GenerationRequest,
  KeyCandidate,
  RejectionCounts,
} from "../types/backend.js";
import type { RunConfig } from "../types/config.js";
import type { ReferenceWeightIndex } from "./reference_index.js";
import type { RunState, TableBatch } from "./run_state.js";
import { deriveSeed, pickN, randomPick } from "../util/rng.js";
import { extractTuple, hasNull, tupleKey } from "../util/keys.js";

export type RequestContext = {
  table: TableSchema;
  batch: TableBatch;
  state: RunState;
  index: ReferenceWeightIndex;
  rng: RNG;
  config: Pick<RunConfig, "fkSampleSize" | "foreignKeyMode">;
};

export function isSelfReference(table: TableSchema, fk: ForeignKey): boolean {
  return fk.refTable === table.name;
}

function distinctKeys(rows: readonly GeneratedRow[], columns: readonly string[]): KeyCandidate[] {
  const seen = new Set<string>();
  const out: KeyCandidate[] = [];
  for (const row of rows) {
    const key = extractTuple(row, columns);
    if (hasNull(key)) continue;
    const id = tupleKey(key);
    if (seen.has(id)) continue;
    seen.add(id);
    out.push({ key });
  }
  return out;
}

/**
 * Describe what each foreign key may point at. Reference pools are shown in
 * full with their weights; generated tables as a sample of their keys.
 */
export function buildForeignKeyContexts(ctx: RequestContext): ForeignKeyContext[] {
  const { table, batch, state, index, rng, config } = ctx;

  return table.foreignKeys.map((fk): ForeignKeyContext => {
    const base = {
      constraintName: fk.constraintName,
      columns: fk.columns,
      refTable: fk.refTable,
      refColumns: fk.refColumns,
    };

    if (isSelfReference(table, fk)) {
      const candidates = distinctKeys(batch.earlierRows(), fk.refColumns);
      return { ...base, source: "self", candidates, available: candidates.length };
    }

    const sampler = index.get(fk.refTable);
    if (sampler) {
      const rows = state.rows(fk.refTable);
      const candidates = sampler.weights.map((weight, i) => {
        const row = rows[i] ?? {};
        return { key: extractTuple(row, fk.refColumns), weight, row };
      });
      return { ...base, source: "reference", candidates, available: candidates.length };
    }

    const keys = distinctKeys(state.rows(fk.refTable), fk.refColumns);
    return {
      ...base,
      source: "generated",
      candidates: pickN(rng, keys, config.fkSampleSize),
      available: keys.length,
    };
  });
}

/**
 * Pre-sample one upstream row per requested row and foreign key. Reference
 * tables are drawn by weight, generated tables uniformly. Self-references are
 * left to validation, which knows which rows came earlier.
 */
export function sampleAssignments(ctx: RequestContext, rowCount: number): GeneratedRow[] {
  const { table, state, index, rng, config } = ctx;
  if (config.foreignKeyMode !== "assign") return [];

  const foreignKeys = table.foreignKeys.filter((fk) => !isSelfReference(table, fk));
  const assignments: GeneratedRow[] = [];

  for (let i = 0; i < rowCount; i++) {
    const assignment: GeneratedRow = {};

    for (const fk of foreignKeys) {
      const upstream = state.rows(fk.refTable);
      if (upstream.length === 0) continue;

      const sampler = index.get(fk.refTable);
      const source = sampler
        ? upstream[sampler.sampleIndex(rng)]
        : randomPick(rng, upstream);
      if (!source) continue;

      fk.columns.forEach((col, k) => {
        const refCol = fk.refColumns[k];
        assignment[col] = refCol === undefined ? null : (source[refCol] ?? null);
      });
    }

    assignments.push(assignment);
  }

  return assignments;
}

export function buildRequest(
  ctx: RequestContext,
  rowCount: number,
  repairRound: number,
  rejections: RejectionCounts,
): GenerationRequest {
  const seed = deriveSeed(ctx.rng);
  const foreignKeys = buildForeignKeyContexts(ctx);
  const assignments = sampleAssignments(ctx, rowCount);

  return {
    table: ctx.table,
    rowCount,
    keyOffset: ctx.batch.size,
    seed,
    repairRound,
    foreignKeys,
    assignments,
    rejections: { ...rejections },
  };
}
