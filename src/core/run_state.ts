// src/core/run_state.ts
import type { SchemaModel, TableSchema } from "../types/schema.js";
import type { GeneratedData, GeneratedRow } from "../types/data.js";
import { tupleKey, extractTuple, hasNull } from "../util/keys.js";

/**
 * Keys and rows committed during one run. Only the driver writes to it;
 * a new instance is created for every run.
 */
export class RunState {
  private readonly committed = new Map<string, GeneratedRow[]>();
  private readonly primaryKeys = new Map<string, Set<string>>();
  private readonly keyCache = new Map<string, Set<string>>();
  private readonly identity = new Map<string, number>();
  private readonly tables: Map<string, TableSchema>;

  constructor(schema: SchemaModel) {
    this.tables = new Map(schema.tables.map((t) => [t.name, t]));
  }

  rows(table: string): readonly GeneratedRow[] {
    return this.committed.get(table) ?? [];
  }

  isCommitted(table: string): boolean {
    return this.committed.has(table);
  }

  hasPrimaryKey(table: string, key: string): boolean {
    return this.primaryKeys.get(table)?.has(key) ?? false;
  }

  /** Committed key tuples of a table for the given columns. */
  keySet(table: string, columns: readonly string[]): Set<string> {
    const cacheKey = `${table}::${columns.join(",")}`;
    const cached = this.keyCache.get(cacheKey);
    if (cached) return cached;

    const keys = new Set<string>();
    for (const row of this.rows(table)) {
      const tuple = extractTuple(row, columns);
      if (!hasNull(tuple)) keys.add(tupleKey(tuple));
    }
    this.keyCache.set(cacheKey, keys);
    return keys;
  }

  /** Next value of an identity column; counters start after the highest value seen. */
  nextIdentity(table: string, column: string): number {
    const key = `${table}.${column}`;
    const next = (this.identity.get(key) ?? 0) + 1;
    this.identity.set(key, next);
    return next;
  }

  /** Raise identity counters past any explicit values in `rows`. */
  observeIdentity(table: string, rows: readonly GeneratedRow[]): void {
    const schema = this.tables.get(table);
    if (!schema) return;

    for (const column of schema.columns) {
      if (!column.isIdentity) continue;
      const key = `${table}.${column.name}`;
      let max = this.identity.get(key) ?? 0;
      for (const row of rows) {
        const value = row[column.name];
        if (typeof value === "number" && value > max) max = value;
      }
      this.identity.set(key, max);
    }
  }

  begin(table: TableSchema): TableBatch {
    return new TableBatch(table, this);
  }

  commit(table: string, rows: readonly GeneratedRow[]): void {
    const schema = this.tables.get(table);
    const stored = [...(this.committed.get(table) ?? []), ...rows];
    this.committed.set(table, stored);

    if (schema && schema.primaryKey.length > 0) {
      const keys = this.primaryKeys.get(table) ?? new Set<string>();
      for (const row of rows) {
        keys.add(tupleKey(extractTuple(row, schema.primaryKey)));
      }
      this.primaryKeys.set(table, keys);
    }

    this.observeIdentity(table, rows);

    for (const cacheKey of [...this.keyCache.keys()]) {
      if (cacheKey.startsWith(`${table}::`)) this.keyCache.delete(cacheKey);
    }
  }

  /** Snapshot of everything committed so far, in commit order. */
  snapshot(): GeneratedData {
    return new Map([...this.committed].map(([name, rows]) => [name, [...rows]]));
  }
}

/**
 * Rows accepted for one table but not yet committed. Tracks primary and
 * unique keys so duplicates are caught within the batch and across repair
 * rounds.
 */
export class TableBatch {
  readonly rows: GeneratedRow[] = [];
  private readonly keys = new Set<string>();
  private readonly uniqueKeys = new Map<string, Set<string>>();

  constructor(
    readonly table: TableSchema,
    private readonly state: RunState,
  ) {}

  get size(): number {
    return this.rows.length;
  }

  hasKey(key: string): boolean {
    return this.keys.has(key) || this.state.hasPrimaryKey(this.table.name, key);
  }

  /** Whether a unique tuple is already taken here or by a committed row. */
  hasUniqueKey(columns: readonly string[], key: string): boolean {
    return (
      (this.uniqueKeys.get(columns.join(","))?.has(key) ?? false) ||
      this.state.keySet(this.table.name, columns).has(key)
    );
  }

  /** Key tuples of accepted rows for the given columns, for self-references. */
  keySet(columns: readonly string[]): Set<string> {
    const keys = new Set<string>();
    for (const row of [...this.state.rows(this.table.name), ...this.rows]) {
      const tuple = extractTuple(row, columns);
      if (!hasNull(tuple)) keys.add(tupleKey(tuple));
    }
    return keys;
  }

  /** Rows a self-reference may point at: committed earlier or accepted earlier here. */
  earlierRows(): GeneratedRow[] {
    return [...this.state.rows(this.table.name), ...this.rows];
  }

  accept(row: GeneratedRow): void {
    this.rows.push(row);
    if (this.table.primaryKey.length > 0) {
      this.keys.add(tupleKey(extractTuple(row, this.table.primaryKey)));
    }
    for (const unique of this.table.uniques) {
      const tuple = extractTuple(row, unique.columns);
      if (hasNull(tuple)) continue;
      const name = unique.columns.join(",");
      const taken = this.uniqueKeys.get(name) ?? new Set<string>();
      taken.add(tupleKey(tuple));
      this.uniqueKeys.set(name, taken);
    }
  }

  commit(): GeneratedRow[] {
    this.state.commit(this.table.name, this.rows);
    return this.rows;
  }
}
