import { describe, it, expect } from "vitest";
import { mapPgType, readSchema, type Queryable } from "../db/pg_introspect.js";
import { parseChecks } from "../util/constraints.js";

const column = (
  table_name: string,
  column_name: string,
  udt_name: string,
  extra: Record<string, unknown> = {},
) => ({
  table_name,
  column_name,
  udt_name,
  is_nullable: "YES",
  column_default: null,
  character_maximum_length: null,
  numeric_precision: null,
  numeric_scale: null,
  is_identity: "NO",
  is_generated: "NEVER",
  ...extra,
});

const catalog: Array<[string, unknown[]]> = [
  ["information_schema.tables", [{ table_name: "customer" }, { table_name: "orders" }]],
  [
    "information_schema.columns",
    [
      column("customer", "id", "int4", {
        is_nullable: "NO",
        column_default: "nextval('customer_id_seq'::regclass)",
      }),
      column("customer", "email", "varchar", { character_maximum_length: 120 }),
      column("customer", "tier", "tier", { is_nullable: "NO", column_default: "'basic'::tier" }),
      column("customer", "credit", "numeric", { numeric_precision: "10", numeric_scale: 2 }),
      column("orders", "id", "int8", { is_nullable: "NO", is_identity: "YES" }),
      column("orders", "customer_id", "int4", { is_nullable: "NO" }),
      column("orders", "total", "numeric", { numeric_precision: 12, numeric_scale: 2 }),
      column("orders", "total_tax", "numeric", { is_generated: "ALWAYS" }),
      column("orders", "placed_at", "timestamptz"),
    ],
  ],
  [
    "'PRIMARY KEY'",
    [
      { table_name: "customer", constraint_name: "customer_pkey", column_name: "id", ordinal_position: 1 },
      { table_name: "orders", constraint_name: "orders_pkey", column_name: "id", ordinal_position: "1" },
    ],
  ],
  [
    "'UNIQUE'",
    [{ table_name: "customer", constraint_name: "customer_email_key", column_name: "email", ordinal_position: 1 }],
  ],
  [
    "'FOREIGN KEY'",
    [
      {
        table_name: "orders",
        constraint_name: "orders_customer_id_fkey",
        column_name: "customer_id",
        ordinal_position: 1,
        foreign_table_name: "customer",
        foreign_column_name: "id",
        update_rule: "NO ACTION",
        delete_rule: "CASCADE",
      },
    ],
  ],
  [
    "pg_get_constraintdef",
    [{ table_name: "orders", constraint_name: "orders_total_check", definition: "CHECK ((total >= (0)::numeric))" }],
  ],
  [
    "pg_enum",
    [
      { enum_type: "tier", enum_value: "basic" },
      { enum_type: "tier", enum_value: "gold" },
    ],
  ],
];

class FakeCatalog implements Queryable {
  readonly params: unknown[][] = [];

  constructor(private readonly answers: Array<[string, unknown[]]>) {}

  async query(sql: string, params: unknown[] = []): Promise<unknown[]> {
    this.params.push(params);
    return this.answers.find(([marker]) => sql.includes(marker))?.[1] ?? [];
  }
}

describe("mapPgType", () => {
  it("maps catalog type names onto logical types", () => {
    expect(["int8", "numeric", "bool", "timestamptz", "uuid", "tier"].map(mapPgType)).toEqual([
      "integer",
      "decimal",
      "boolean",
      "datetime",
      "string",
      "string",
    ]);
  });
});

describe("readSchema", () => {
  it("builds the schema model from catalog rows", async () => {
    const db = new FakeCatalog(catalog);

    const schema = await readSchema(db, "shop");
    const [customer, orders] = schema.tables;

    expect(schema.name).toBe("shop");
    expect(db.params[0]).toEqual(["shop"]);
    expect(customer?.columns).toEqual([
      {
        name: "id",
        dataType: "integer",
        isNullable: false,
        defaultValue: null,
        isIdentity: true,
        isComputed: false,
        sqlType: "int4",
      },
      {
        name: "email",
        dataType: "string",
        length: 120,
        isNullable: true,
        defaultValue: null,
        isIdentity: false,
        isComputed: false,
        sqlType: "varchar",
      },
      {
        name: "tier",
        dataType: "string",
        isNullable: false,
        defaultValue: "'basic'::tier",
        isIdentity: false,
        isComputed: false,
        sqlType: "tier",
      },
      {
        name: "credit",
        dataType: "decimal",
        precision: 10,
        scale: 2,
        isNullable: true,
        defaultValue: null,
        isIdentity: false,
        isComputed: false,
        sqlType: "numeric",
      },
    ]);
    expect(customer?.primaryKey).toEqual(["id"]);
    expect(customer?.uniques).toEqual([{ columns: ["email"], constraintName: "customer_email_key" }]);
    expect(customer?.checks).toEqual([
      { name: "customer_tier_enum", expression: "tier IN ('basic', 'gold')" },
    ]);

    expect(orders?.columns.map((c) => [c.name, c.dataType, c.isIdentity, c.isComputed])).toEqual([
      ["id", "integer", true, false],
      ["customer_id", "integer", false, false],
      ["total", "decimal", false, false],
      ["total_tax", "decimal", false, true],
      ["placed_at", "datetime", false, false],
    ]);
    expect(orders?.foreignKeys).toEqual([
      {
        constraintName: "orders_customer_id_fkey",
        columns: ["customer_id"],
        refTable: "customer",
        refColumns: ["id"],
        onDelete: "CASCADE",
        onUpdate: "NO ACTION",
      },
    ]);
    expect(orders?.checks).toEqual([{ name: "orders_total_check", expression: "((total >= (0)::numeric))" }]);
  });

  it("produces checks the constraint parser understands", async () => {
    const schema = await readSchema(new FakeCatalog(catalog));
    const checks = schema.tables.flatMap((t) => t.checks.map((c) => c.expression));

    const parsed = parseChecks(checks);

    expect(parsed.ranges).toEqual([{ column: "total", min: 0, minInclusive: true }]);
    expect(parsed.choices).toEqual([{ column: "tier", values: ["basic", "gold"] }]);
  });

  it("rejects catalog rows of an unexpected shape", async () => {
    const db = new FakeCatalog([["information_schema.tables", [{ table_name: 5 }]]]);

    await expect(readSchema(db)).rejects.toThrow("Unexpected catalog rows");
  });
});
