import { describe, it, expect } from "vitest";
import { buildForeignKeyContexts, buildRequest, sampleAssignments, type RequestContext } from "../core/request.js";
import { ReferenceWeightIndex, mergeReferenceData } from "../core/reference_index.js";
import { RunState } from "../core/run_state.js";
import { createRng } from "../util/rng.js";
import { schemaOf } from "./helpers.js";

const schema = mergeReferenceData(
  schemaOf({
    tables: [
      {
        name: "Status",
        columns: [{ name: "code", dataType: "string", isNullable: false }],
        primaryKey: ["code"],
      },
      {
        name: "Customer",
        columns: [{ name: "id", dataType: "integer", isNullable: false }],
        primaryKey: ["id"],
      },
      {
        name: "Order",
        columns: [
          { name: "id", dataType: "integer", isNullable: false },
          { name: "status_code", dataType: "string", isNullable: false },
          { name: "customer_id", dataType: "integer", isNullable: false },
          { name: "parent_id", dataType: "integer" },
        ],
        primaryKey: ["id"],
        foreignKeys: [
          { constraintName: "fk_status", columns: ["status_code"], refTable: "Status", refColumns: ["code"] },
          { constraintName: "fk_customer", columns: ["customer_id"], refTable: "Customer", refColumns: ["id"] },
          { constraintName: "fk_parent", columns: ["parent_id"], refTable: "Order", refColumns: ["id"] },
        ],
      },
    ],
  }),
  { Status: [{ code: "A", weight: 3 }, { code: "B", weight: 1 }] },
  { weightBackfill: "mean", inferBooleanWeights: true },
);

const customerIds = Array.from({ length: 30 }, (_, i) => i + 1);

function context(mode: "assign" | "validate"): RequestContext {
  const state = new RunState(schema);
  state.commit("Status", [{ code: "A" }, { code: "B" }]);
  state.commit("Customer", customerIds.map((id) => ({ id })));
  const order = schema.tables.find((t) => t.name === "Order");
  if (!order) throw new Error("missing table");

  return {
    table: order,
    batch: state.begin(order),
    state,
    index: ReferenceWeightIndex.fromSchema(schema),
    rng: createRng(8),
    config: { fkSampleSize: 20, foreignKeyMode: mode },
  };
}

describe("buildForeignKeyContexts", () => {
  it("shows reference pools with weights and samples generated keys", () => {
    const [status, customer, parent] = buildForeignKeyContexts(context("assign"));

    expect(status).toMatchObject({
      source: "reference",
      available: 2,
      candidates: [
        { key: ["A"], weight: 3, row: { code: "A" } },
        { key: ["B"], weight: 1, row: { code: "B" } },
      ],
    });
    expect(customer?.source).toBe("generated");
    expect(customer?.available).toBe(30);
    expect(customer?.candidates).toHaveLength(20);
    expect(new Set(customer?.candidates.map((c) => c.key[0])).size).toBe(20);
    expect(parent).toMatchObject({ source: "self", candidates: [], available: 0 });
  });
});

describe("sampleAssignments", () => {
  it("draws every non-self foreign key from committed rows", () => {
    const assignments = sampleAssignments(context("assign"), 200);

    expect(assignments).toHaveLength(200);
    for (const a of assignments) {
      expect(Object.keys(a).sort()).toEqual(["customer_id", "status_code"]);
      expect(["A", "B"]).toContain(a.status_code);
      expect(customerIds).toContain(a.customer_id);
    }
    expect(assignments.filter((a) => a.status_code === "A").length).toBeGreaterThan(100);
  });

  it("leaves foreign keys to the backend in validate mode", () => {
    expect(sampleAssignments(context("validate"), 5)).toEqual([]);
  });
});

describe("buildRequest", () => {
  it("is reproducible for the same random stream", () => {
    const first = buildRequest(context("assign"), 4, 0, {});
    const second = buildRequest(context("assign"), 4, 0, {});

    expect(second.seed).toBe(first.seed);
    expect(second.assignments).toEqual(first.assignments);
    expect(first).toMatchObject({ rowCount: 4, keyOffset: 0, repairRound: 0, rejections: {} });
  });
});
