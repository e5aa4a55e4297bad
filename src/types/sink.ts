// src/types/sink.ts
import type { GeneratedRow } from "./data.js";

export interface OutputSink {
  /** Called once per table, in generation order, after its rows are committed. */
  writeTable(table: string, rows: readonly GeneratedRow[], columns: readonly string[]): Promise<void>;
}
