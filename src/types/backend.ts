// src/types/backend.ts
import type { TableSchema } from "./schema.js";
import type { CellValue, GeneratedRow } from "./data.js";

export type RejectionReason =
  | "null_violation"
  | "type_mismatch"
  | "duplicate_key"
  | "dangling_foreign_key";

export type RejectionCounts = Partial<Record<RejectionReason, number>>;

/** One key the referencing rows may point at, in `refColumns` order. */
export type KeyCandidate = {
  key: CellValue[];
  weight?: number;
  // full row of a reference table, so a backend can see labels next to codes
  row?: GeneratedRow;
};

export type ForeignKeyContext = {
  constraintName: string;
  columns: string[];
  refTable: string;
  refColumns: string[];
  source: "reference" | "generated" | "self";
  candidates: KeyCandidate[];
  // distinct keys available upstream; candidates may be a sample of them
  available: number;
};

export type GenerationRequest = {
  table: TableSchema;
  rowCount: number;
  keyOffset: number;
  seed: number;
  repairRound: number;
  foreignKeys: ForeignKeyContext[];
  /** Per requested row: FK column -> value chosen by the core. Empty when FKs are validated instead. */
  assignments: GeneratedRow[];
  /** Reasons earlier rows of this table were rejected, for repair rounds. */
  rejections: RejectionCounts;
};

export interface GenerationBackend {
  readonly name: string;
  /** Resolve to the raw, untrusted response body (parsed JSON). */
  generate(request: GenerationRequest, options: { signal: AbortSignal }): Promise<unknown>;
}
