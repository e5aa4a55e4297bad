// src/models/schema.ts
import { z } from "zod";

export const DataTypeSchema = z.enum([
  "string",
  "integer",
  "decimal",
  "boolean",
  "datetime",
]);

export const ColumnSchema = z.object({
  name: z.string().min(1),
  dataType: DataTypeSchema,
  length: z.number().int().positive().optional(),
  precision: z.number().int().positive().optional(),
  scale: z.number().int().nonnegative().optional(),
  isNullable: z.boolean().default(true),
  defaultValue: z.string().nullable().default(null),
  isIdentity: z.boolean().default(false),
  isComputed: z.boolean().default(false),
  sqlType: z.string().optional(),
});

export const ReferentialActionSchema = z.enum([
  "NO ACTION",
  "CASCADE",
  "SET NULL",
  "SET DEFAULT",
  "RESTRICT",
]);

export const ForeignKeySchema = z.object({
  constraintName: z.string(),
  columns: z.array(z.string()).min(1),
  refTable: z.string(),
  refColumns: z.array(z.string()).min(1),
  onDelete: ReferentialActionSchema.optional(),
  onUpdate: ReferentialActionSchema.optional(),
});

export const UniqueSchema = z.object({
  columns: z.array(z.string()).min(1),
  constraintName: z.string().optional(),
});

export const CheckSchema = z.object({
  name: z.string(),
  expression: z.string(), // opaque predicate, only the backend reads it
});

export const CellValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);

export const RowSchema = z.record(z.string(), CellValueSchema);

export const ReferencePoolSchema = z.object({
  entries: z.array(
    z.object({
      values: RowSchema,
      weight: z.number().nonnegative(),
    }),
  ),
  weighted: z.boolean(),
});

export const TableSchema = z.object({
  name: z.string().min(1),
  columns: z.array(ColumnSchema).min(1),
  primaryKey: z.array(z.string()).default([]),
  foreignKeys: z.array(ForeignKeySchema).default([]),
  uniques: z.array(UniqueSchema).default([]),
  checks: z.array(CheckSchema).default([]),
  isReferenceTable: z.boolean().default(false),
  referencePool: ReferencePoolSchema.optional(),
});

export const SchemaModelSchema = z.object({
  name: z.string().default("default"),
  tables: z.array(TableSchema),
});

/** Defaults that are plain literals, e.g. `0`, `((1))`, `'active'`, `N'x'`, `NULL`. */
const LITERAL_DEFAULT = /^(?:-?\d+(?:\.\d+)?|N?'(?:[^']|'')*'|NULL|TRUE|FALSE)$/i;

/** Strip the redundant parentheses SQL Server wraps defaults in: `((0))` -> `0`. */
function unwrapDefault(expr: string): string {
  let out = expr.trim();
  while (out.startsWith("(") && out.endsWith(")")) {
    out = out.slice(1, -1).trim();
  }
  return out;
}

/**
 * Resolve a column default to a literal value, or `undefined` when the
 * default is an expression the database evaluates (GETDATE(), nextval(...)).
 */
export function literalDefault(col: {
  defaultValue: string | null;
}): string | number | boolean | null | undefined {
  if (col.defaultValue == null) return undefined;
  const expr = unwrapDefault(col.defaultValue);
  if (!LITERAL_DEFAULT.test(expr)) return undefined;

  const upper = expr.toUpperCase();
  if (upper === "NULL") return null;
  if (upper === "TRUE") return true;
  if (upper === "FALSE") return false;
  if (expr.endsWith("'")) {
    const start = expr.indexOf("'");
    return expr.slice(start + 1, -1).replace(/''/g, "'");
  }
  return Number(expr);
}

/** Check if the database produces the value itself (identity, computed). */
export function isDbGenerated(col: {
  isIdentity: boolean;
  isComputed: boolean;
}): boolean {
  return col.isIdentity || col.isComputed;
}
