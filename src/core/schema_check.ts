// src/core/schema_check.ts
import type { SchemaModel, TableSchema } from "../types/schema.js";
import { SchemaIntegrityError, type SchemaIssue } from "../errors.js";

/**
 * Verify the schema graph is well-formed before any planning happens.
 * Collects every issue instead of stopping at the first one.
 */
export function checkSchema(schema: SchemaModel): void {
  const issues: SchemaIssue[] = [];
  const tables = new Map<string, TableSchema>();

  for (const table of schema.tables) {
    if (tables.has(table.name)) {
      issues.push({ table: table.name, message: "duplicate table name" });
      continue;
    }
    tables.set(table.name, table);
  }

  for (const table of tables.values()) {
    const columns = new Set(table.columns.map((c) => c.name));

    if (columns.size !== table.columns.length) {
      issues.push({ table: table.name, message: "duplicate column name" });
    }

    for (const col of table.primaryKey) {
      if (!columns.has(col)) {
        issues.push({
          table: table.name,
          constraint: "primary key",
          message: `unknown column ${col}`,
        });
      }
    }

    for (const fk of table.foreignKeys) {
      const issue = (message: string) =>
        issues.push({ table: table.name, constraint: fk.constraintName, message });

      for (const col of fk.columns) {
        if (!columns.has(col)) issue(`unknown column ${col}`);
      }

      if (fk.columns.length !== fk.refColumns.length) {
        issue(
          `${fk.columns.length} column(s) reference ${fk.refColumns.length} column(s) of ${fk.refTable}`,
        );
      }

      const ref = tables.get(fk.refTable);
      if (!ref) {
        issue(`references unknown table ${fk.refTable}`);
        continue;
      }

      const refColumns = new Set(ref.columns.map((c) => c.name));
      for (const col of fk.refColumns) {
        if (!refColumns.has(col)) issue(`references unknown column ${fk.refTable}.${col}`);
      }
    }
  }

  if (issues.length > 0) {
    throw new SchemaIntegrityError(issues);
  }
}

/**
 * A foreign key is mandatory when none of its columns may be null.
 */
export function isMandatoryForeignKey(
  table: TableSchema,
  fkColumns: readonly string[],
): boolean {
  return fkColumns.every((name) => {
    const col = table.columns.find((c) => c.name === name);
    return col !== undefined && !col.isNullable;
  });
}
