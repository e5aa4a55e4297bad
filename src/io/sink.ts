// src/io/sink.ts
import { join } from "node:path";
import Papa from "papaparse";
import type { GeneratedRow } from "../types/data.js";
import type { OutputSink } from "../types/sink.js";
import type { RunResult } from "../core/driver.js";
import { writeFile, writeJsonFile } from "../util/fs.js";

/** Keeps written tables in memory, in write order. */
export class MemorySink implements OutputSink {
  readonly tables = new Map<string, { rows: GeneratedRow[]; columns: string[] }>();

  async writeTable(
    table: string,
    rows: readonly GeneratedRow[],
    columns: readonly string[],
  ): Promise<void> {
    this.tables.set(table, { rows: [...rows], columns: [...columns] });
  }

  get order(): string[] {
    return [...this.tables.keys()];
  }
}

/** One `<table>.csv` per table; nulls become empty cells. */
export class CsvDirectorySink implements OutputSink {
  readonly written: string[] = [];

  constructor(private readonly dir: string) {}

  async writeTable(
    table: string,
    rows: readonly GeneratedRow[],
    columns: readonly string[],
  ): Promise<void> {
    const csv = Papa.unparse(
      {
        fields: [...columns],
        data: rows.map((row) => columns.map((col) => row[col] ?? null)),
      },
      { newline: "\n" },
    );
    const path = join(this.dir, `${table}.csv`);
    await writeFile(path, `${csv}\n`);
    this.written.push(path);
  }
}

/** One `<table>.json` per table holding an array of row objects. */
export class JsonDirectorySink implements OutputSink {
  readonly written: string[] = [];

  constructor(private readonly dir: string) {}

  async writeTable(
    table: string,
    rows: readonly GeneratedRow[],
    columns: readonly string[],
  ): Promise<void> {
    const ordered = rows.map((row) =>
      Object.fromEntries(columns.map((col) => [col, row[col] ?? null])),
    );
    const path = join(this.dir, `${table}.json`);
    await writeJsonFile(path, ordered);
    this.written.push(path);
  }
}

export type RunSummary = {
  seed: number;
  status: RunResult["status"];
  backend: string;
  generatedAt: string;
  durationMs: number;
  order: string[];
  tables: Record<string, { rows: number; requested: number; source: "reference" | "generated" }>;
  warnings: RunResult["warnings"];
};

export function summarizeRun(
  result: RunResult,
  meta: { backend: string; generatedAt?: Date },
): RunSummary {
  const tables: RunSummary["tables"] = {};
  for (const [name, outcome] of result.tables) {
    tables[name] = {
      rows: outcome.rows.length,
      requested: outcome.requested,
      source: outcome.source,
    };
  }

  return {
    seed: result.seed,
    status: result.status,
    backend: meta.backend,
    generatedAt: (meta.generatedAt ?? new Date()).toISOString(),
    durationMs: result.durationMs,
    order: result.order,
    tables,
    warnings: result.warnings,
  };
}

/**
 * Write `summary.json` next to the table files.
 */
export async function writeRunSummary(
  dir: string,
  result: RunResult,
  meta: { backend: string; generatedAt?: Date },
): Promise<string> {
  const path = join(dir, "summary.json");
  await writeJsonFile(path, summarizeRun(result, meta));
  return path;
}
