// src/db/pg_introspect.ts
import pg from "pg";
import { z } from "zod";
import { ReferentialActionSchema } from "../models/schema.js";
import type { ColumnSchema, DataType, SchemaModel, TableSchema } from "../types/schema.js";

const { Client } = pg;

/** The slice of a pg client this module uses; rows are validated here. */
export interface Queryable {
  query(sql: string, params?: unknown[]): Promise<unknown[]>;
}

const intOrNull = z
  .union([z.number(), z.string()])
  .nullable()
  .transform((v) => (v === null ? null : Number(v)));

const TableRow = z.object({ table_name: z.string() });

const ColumnRow = z.object({
  table_name: z.string(),
  column_name: z.string(),
  udt_name: z.string(),
  is_nullable: z.enum(["YES", "NO"]),
  column_default: z.string().nullable(),
  character_maximum_length: intOrNull,
  numeric_precision: intOrNull,
  numeric_scale: intOrNull,
  is_identity: z.enum(["YES", "NO"]),
  is_generated: z.string(),
});

const KeyRow = z.object({
  table_name: z.string(),
  constraint_name: z.string(),
  column_name: z.string(),
  ordinal_position: z.coerce.number(),
});

const ForeignKeyRow = KeyRow.extend({
  foreign_table_name: z.string(),
  foreign_column_name: z.string(),
  update_rule: ReferentialActionSchema,
  delete_rule: ReferentialActionSchema,
});

const CheckRow = z.object({
  table_name: z.string(),
  constraint_name: z.string(),
  definition: z.string(),
});

const EnumRow = z.object({
  enum_type: z.string(),
  enum_value: z.string(),
});

export type CatalogRows = {
  tables: z.infer<typeof TableRow>[];
  columns: z.infer<typeof ColumnRow>[];
  primaryKeys: z.infer<typeof KeyRow>[];
  foreignKeys: z.infer<typeof ForeignKeyRow>[];
  uniques: z.infer<typeof KeyRow>[];
  checks: z.infer<typeof CheckRow>[];
  enums: z.infer<typeof EnumRow>[];
};

const INTEGER_TYPES = new Set(["int2", "int4", "int8"]);
const DECIMAL_TYPES = new Set(["numeric", "float4", "float8", "money"]);
const DATETIME_TYPES = new Set(["date", "time", "timetz", "timestamp", "timestamptz"]);

export function mapPgType(udtName: string): DataType {
  if (INTEGER_TYPES.has(udtName)) return "integer";
  if (DECIMAL_TYPES.has(udtName)) return "decimal";
  if (udtName === "bool") return "boolean";
  if (DATETIME_TYPES.has(udtName)) return "datetime";
  return "string";
}

function groupBy<T>(rows: readonly T[], key: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const k = key(row);
    const list = groups.get(k) ?? [];
    list.push(row);
    groups.set(k, list);
  }
  return groups;
}

function byPosition<T extends { ordinal_position: number }>(rows: T[]): T[] {
  return [...rows].sort((a, b) => a.ordinal_position - b.ordinal_position);
}

function toColumn(r: z.infer<typeof ColumnRow>): ColumnSchema {
  const dataType = mapPgType(r.udt_name);
  const serial = r.column_default?.startsWith("nextval(") ?? false;
  const identity = r.is_identity === "YES" || serial;

  return {
    name: r.column_name,
    dataType,
    ...(r.character_maximum_length !== null ? { length: r.character_maximum_length } : {}),
    ...(r.udt_name === "numeric" && r.numeric_precision !== null
      ? { precision: r.numeric_precision, scale: r.numeric_scale ?? 0 }
      : {}),
    isNullable: r.is_nullable === "YES",
    defaultValue: identity ? null : r.column_default,
    isIdentity: identity,
    isComputed: r.is_generated === "ALWAYS",
    sqlType: r.udt_name,
  };
}

/**
 * Map catalog query results to the schema model. Enum columns get an
 * `IN (...)` check so backends know the allowed labels.
 */
export function buildSchemaModel(rows: CatalogRows, name = "public"): SchemaModel {
  const enums = new Map<string, string[]>();
  for (const r of rows.enums) {
    enums.set(r.enum_type, [...(enums.get(r.enum_type) ?? []), r.enum_value]);
  }

  const columns = groupBy(rows.columns, (r) => r.table_name);
  const pks = groupBy(rows.primaryKeys, (r) => r.table_name);
  const fks = groupBy(rows.foreignKeys, (r) => `${r.table_name}::${r.constraint_name}`);
  const uniques = groupBy(rows.uniques, (r) => `${r.table_name}::${r.constraint_name}`);
  const checks = groupBy(rows.checks, (r) => r.table_name);

  const tables = rows.tables.map(({ table_name }): TableSchema => {
    const cols = columns.get(table_name) ?? [];

    const enumChecks = cols.flatMap((c) => {
      const labels = enums.get(c.udt_name);
      if (!labels) return [];
      const list = labels.map((l) => `'${l.replace(/'/g, "''")}'`).join(", ");
      return [{ name: `${table_name}_${c.column_name}_enum`, expression: `${c.column_name} IN (${list})` }];
    });

    return {
      name: table_name,
      columns: cols.map(toColumn),
      primaryKey: byPosition(pks.get(table_name) ?? []).map((r) => r.column_name),
      foreignKeys: [...fks.values()]
        .filter((group) => group[0]?.table_name === table_name)
        .map((group) => {
          const ordered = byPosition(group);
          const first = ordered[0];
          return {
            constraintName: first?.constraint_name ?? "",
            columns: ordered.map((r) => r.column_name),
            refTable: first?.foreign_table_name ?? "",
            refColumns: ordered.map((r) => r.foreign_column_name),
            ...(first ? { onDelete: first.delete_rule, onUpdate: first.update_rule } : {}),
          };
        }),
      uniques: [...uniques.values()]
        .filter((group) => group[0]?.table_name === table_name)
        .map((group) => ({
          columns: byPosition(group).map((r) => r.column_name),
          constraintName: group[0]?.constraint_name,
        })),
      checks: [
        ...(checks.get(table_name) ?? []).map((c) => ({
          name: c.constraint_name,
          expression: c.definition.replace(/^CHECK\s*/i, ""),
        })),
        ...enumChecks,
      ],
      isReferenceTable: false,
    };
  });

  return { name, tables };
}

const KEY_COLUMNS_SQL = (constraintType: string) => `
  SELECT
    tc.table_name,
    tc.constraint_name,
    kcu.column_name,
    kcu.ordinal_position
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON tc.constraint_name = kcu.constraint_name
   AND tc.table_schema = kcu.table_schema
  WHERE tc.table_schema = $1
    AND tc.constraint_type = '${constraintType}'
  ORDER BY tc.table_name, tc.constraint_name, kcu.ordinal_position;
`;

async function select<T extends z.ZodTypeAny>(
  db: Queryable,
  schema: T,
  sql: string,
  params: unknown[],
): Promise<z.infer<T>[]> {
  const result = z.array(schema).safeParse(await db.query(sql, params));
  if (!result.success) {
    throw new Error(`Unexpected catalog rows: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Read tables, columns, keys, checks and enums of one database schema.
 */
export async function readSchema(db: Queryable, schemaName = "public"): Promise<SchemaModel> {
  const params = [schemaName];

  const tables = await select(db, TableRow, `
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = $1
      AND table_type = 'BASE TABLE'
    ORDER BY table_name;
  `, params);

  const columns = await select(db, ColumnRow, `
    SELECT
      c.table_name,
      c.column_name,
      c.udt_name,
      c.is_nullable,
      c.column_default,
      c.character_maximum_length,
      c.numeric_precision,
      c.numeric_scale,
      c.is_identity,
      c.is_generated
    FROM information_schema.columns c
    WHERE c.table_schema = $1
    ORDER BY c.table_name, c.ordinal_position;
  `, params);

  const primaryKeys = await select(db, KeyRow, KEY_COLUMNS_SQL("PRIMARY KEY"), params);
  const uniques = await select(db, KeyRow, KEY_COLUMNS_SQL("UNIQUE"), params);

  const foreignKeys = await select(db, ForeignKeyRow, `
    SELECT
      tc.constraint_name,
      tc.table_name,
      kcu.column_name,
      kcu.ordinal_position,
      kcu2.table_name AS foreign_table_name,
      kcu2.column_name AS foreign_column_name,
      rc.update_rule,
      rc.delete_rule
    FROM information_schema.table_constraints tc
    JOIN information_schema.key_column_usage kcu
      ON tc.constraint_name = kcu.constraint_name
     AND tc.table_schema = kcu.table_schema
    JOIN information_schema.referential_constraints rc
      ON tc.constraint_name = rc.constraint_name
     AND tc.table_schema = rc.constraint_schema
    JOIN information_schema.key_column_usage kcu2
      ON rc.unique_constraint_name = kcu2.constraint_name
     AND rc.unique_constraint_schema = kcu2.constraint_schema
     AND kcu.position_in_unique_constraint = kcu2.ordinal_position
    WHERE tc.table_schema = $1
      AND tc.constraint_type = 'FOREIGN KEY'
    ORDER BY tc.table_name, tc.constraint_name, kcu.ordinal_position;
  `, params);

  const checks = await select(db, CheckRow, `
    SELECT
      rel.relname AS table_name,
      con.conname AS constraint_name,
      pg_get_constraintdef(con.oid) AS definition
    FROM pg_constraint con
    JOIN pg_class rel ON rel.oid = con.conrelid
    JOIN pg_namespace nsp ON nsp.oid = rel.relnamespace
    WHERE nsp.nspname = $1
      AND con.contype = 'c'
    ORDER BY rel.relname, con.conname;
  `, params);

  const enums = await select(db, EnumRow, `
    SELECT
      t.typname AS enum_type,
      e.enumlabel AS enum_value
    FROM pg_type t
    JOIN pg_enum e ON t.oid = e.enumtypid
    ORDER BY t.typname, e.enumsortorder;
  `, []);

  return buildSchemaModel(
    { tables, columns, primaryKeys, foreignKeys, uniques, checks, enums },
    schemaName,
  );
}

export async function introspectPostgres(
  connectionString: string,
  schemaName = "public",
): Promise<SchemaModel> {
  const client = new Client({ connectionString });
  await client.connect();

  try {
    return await readSchema(
      { query: async (sql, params) => (await client.query(sql, params)).rows },
      schemaName,
    );
  } finally {
    await client.end();
  }
}
