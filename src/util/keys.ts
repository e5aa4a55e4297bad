// src/util/keys.ts
import type { CellValue, GeneratedRow } from "../types/data.js";

/**
 * Stable string form of a key tuple, used for set membership.
 */
export function tupleKey(values: readonly CellValue[]): string {
  return JSON.stringify(values);
}

export function extractTuple(row: GeneratedRow, columns: readonly string[]): CellValue[] {
  return columns.map((col) => row[col] ?? null);
}

export function hasNull(values: readonly CellValue[]): boolean {
  return values.some((v) => v === null);
}
