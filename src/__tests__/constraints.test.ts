import { describe, it, expect } from "vitest";
import {
  applyRangeBounds,
  fixRelationalConstraints,
  parseCheckConstraint,
  parseChecks,
} from "../util/constraints.js";
import type { GeneratedRow } from "../types/data.js";

describe("parseCheckConstraint", () => {
  it("reads ranges joined by AND", () => {
    expect(parseCheckConstraint("(quantity >= 1 AND quantity <= 90)").ranges).toEqual([
      { column: "quantity", min: 1, minInclusive: true, max: 90, maxInclusive: true },
    ]);
  });

  it("unwraps bracketed identifiers and parenthesised literals", () => {
    expect(parseCheckConstraint("([price]>(0))").ranges).toEqual([
      { column: "price", min: 0, minInclusive: false },
    ]);
  });

  it("reads comparisons between columns", () => {
    expect(parseCheckConstraint("(reserved <= on_hand)").relational).toEqual([
      { leftColumn: "reserved", operator: "<=", rightColumn: "on_hand" },
    ]);
    expect(parseCheckConstraint("ship_date != order_date").relational).toEqual([
      { leftColumn: "ship_date", operator: "<>", rightColumn: "order_date" },
    ]);
  });

  it("reads allowed values from IN lists and ANY arrays", () => {
    expect(parseCheckConstraint("status IN ('A', 'B', 'O''Neil')").choices).toEqual([
      { column: "status", values: ["A", "B", "O'Neil"] },
    ]);
    expect(
      parseCheckConstraint(
        "((channel)::text = ANY ((ARRAY['web'::character varying, 'store'::character varying])::text[]))",
      ).choices,
    ).toEqual([{ column: "channel", values: ["web", "store"] }]);
  });

  it("ignores expressions it does not understand", () => {
    const parsed = parseCheckConstraint("(name LIKE 'A%' OR name IS NULL)");

    expect(parsed).toEqual({
      ranges: [],
      relational: [],
      choices: [],
      raw: "(name LIKE 'A%' OR name IS NULL)",
    });
  });
});

describe("parseChecks", () => {
  it("merges bounds on the same column from separate checks", () => {
    const merged = parseChecks(["(age >= 18)", "(age < 65)"]);

    expect(merged.ranges).toEqual([
      { column: "age", min: 18, minInclusive: true, max: 65, maxInclusive: false },
    ]);
    expect(merged.raw).toBe("(age >= 18) AND (age < 65)");
  });
});

describe("applyRangeBounds", () => {
  const { ranges } = parseChecks(["age >= 18", "age < 65", "discount > 100", "score <= -5"]);

  it("narrows the default range", () => {
    expect(applyRangeBounds("AGE", ranges, 1, 100)).toEqual({ min: 18, max: 64 });
    expect(applyRangeBounds("other", ranges, 1, 100)).toEqual({ min: 1, max: 100 });
  });

  it("moves the range when a one-sided bound lies outside it", () => {
    expect(applyRangeBounds("discount", ranges, 1, 50)).toEqual({ min: 101, max: 150 });
    expect(applyRangeBounds("score", ranges, 1, 50)).toEqual({ min: -54, max: -5 });
  });
});

describe("fixRelationalConstraints", () => {
  it("moves the left column until each comparison holds", () => {
    const row: GeneratedRow = { reserved: 9, on_hand: 4, start: 10, finish: 3, a: 1, b: 1 };

    fixRelationalConstraints(row, [
      { leftColumn: "reserved", operator: "<=", rightColumn: "on_hand" },
      { leftColumn: "finish", operator: ">", rightColumn: "start" },
      { leftColumn: "a", operator: "<>", rightColumn: "b" },
    ]);

    expect(row).toEqual({ reserved: 4, on_hand: 4, start: 10, finish: 11, a: 2, b: 1 });
  });

  it("leaves non-numeric values alone", () => {
    const row: GeneratedRow = { reserved: null, on_hand: 4 };

    fixRelationalConstraints(row, [{ leftColumn: "reserved", operator: "<", rightColumn: "on_hand" }]);

    expect(row).toEqual({ reserved: null, on_hand: 4 });
  });
});
