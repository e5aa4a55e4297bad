// src/util/constraints.ts
import type { CellValue, GeneratedRow } from "../types/data.js";

export type RangeBound = {
  column: string;
  min?: number;
  max?: number;
  minInclusive?: boolean;
  maxInclusive?: boolean;
};

export type RelationalOperator = "<=" | ">=" | "<" | ">" | "=" | "<>";

export type RelationalConstraint = {
  leftColumn: string;
  operator: RelationalOperator;
  rightColumn: string;
};

/** `status IN ('A', 'B')`: the column may only hold one of these values. */
export type AllowedValues = {
  column: string;
  values: string[];
};

export type ParsedCheckConstraint = {
  ranges: RangeBound[];
  relational: RelationalConstraint[];
  choices: AllowedValues[];
  raw: string;
};

const RANGE = /^([a-z_][a-z0-9_]*)\s*(>=|<=|>|<|=)\s*(-?\d+(?:\.\d+)?)$/i;
const RELATIONAL = /^([a-z_][a-z0-9_]*)\s*(<=|>=|<>|!=|<|>|=)\s*([a-z_][a-z0-9_]*)$/i;
const IN_LIST = /^([a-z_][a-z0-9_]*)\s+IN\s*\((.*)\)$/i;
const ANY_ARRAY = /^([a-z_][a-z0-9_]*)\s*=\s*ANY\s*\(+\s*ARRAY\s*\[(.*)\]\s*\)+$/i;
const QUOTED = /N?'((?:[^']|'')*)'/g;

function quotedValues(list: string): string[] {
  return [...list.matchAll(QUOTED)].map((m) => (m[1] ?? "").replace(/''/g, "'"));
}

function toOperator(op: string): RelationalOperator | undefined {
  switch (op) {
    case "<=":
    case ">=":
    case "<":
    case ">":
    case "=":
    case "<>":
      return op;
    case "!=":
      return "<>";
    default:
      return undefined;
  }
}

/**
 * Reduce bracketed identifiers, casts and parenthesised literals the way
 * database catalogs print them: `([Age]>=(0))` -> `Age>=0`,
 * `((qty)::integer > 0)` -> `qty > 0`.
 */
function normalize(expression: string): string {
  let expr = expression
    .replace(/\[([a-z_][a-z0-9_ ]*)\]/gi, "$1")
    .replace(/"([^"]+)"/g, "$1")
    .replace(/\((-?\d+(?:\.\d+)?)\)/g, "$1")
    .replace(/::[a-z_]+(?:\s+(?:precision|varying))?(?:\[\])?/gi, "")
    .replace(/(?<![a-z0-9_])\(([a-z_][a-z0-9_]*)\)/gi, "$1")
    .trim();

  while (expr.startsWith("(") && expr.endsWith(")") && balanced(expr.slice(1, -1))) {
    expr = expr.slice(1, -1).trim();
  }
  return expr;
}

function balanced(expr: string): boolean {
  let depth = 0;
  for (const char of expr) {
    if (char === "(") depth++;
    if (char === ")") depth--;
    if (depth < 0) return false;
  }
  return depth === 0;
}

/**
 * Pull numeric ranges, column comparisons and allowed-value lists out of a
 * check expression. Anything else (OR, LIKE, functions) is ignored.
 *
 * - `(quantity >= 1 AND quantity <= 90)`
 * - `([price]>(0))`
 * - `(reserved <= on_hand)`
 * - `status IN ('A', 'I')`
 */
export function parseCheckConstraint(expression: string): ParsedCheckConstraint {
  const ranges: RangeBound[] = [];
  const relational: RelationalConstraint[] = [];
  const choices: AllowedValues[] = [];

  for (const part of splitByAnd(normalize(expression))) {
    const trimmed = normalize(part);

    const list = trimmed.match(IN_LIST) ?? trimmed.match(ANY_ARRAY);
    if (list) {
      const [, column, items] = list;
      const values = quotedValues(items ?? "");
      if (column !== undefined && values.length > 0) choices.push({ column, values });
      continue;
    }

    const range = trimmed.match(RANGE);
    if (range) {
      const [, column, operator, text] = range;
      if (column === undefined || text === undefined) continue;
      const value = parseFloat(text);

      let bound = ranges.find((r) => r.column === column);
      if (!bound) {
        bound = { column };
        ranges.push(bound);
      }

      switch (operator) {
        case ">=":
          bound.min = value;
          bound.minInclusive = true;
          break;
        case ">":
          bound.min = value;
          bound.minInclusive = false;
          break;
        case "<=":
          bound.max = value;
          bound.maxInclusive = true;
          break;
        case "<":
          bound.max = value;
          bound.maxInclusive = false;
          break;
        case "=":
          bound.min = value;
          bound.max = value;
          bound.minInclusive = true;
          bound.maxInclusive = true;
          break;
      }
      continue;
    }

    const rel = trimmed.match(RELATIONAL);
    if (rel) {
      const [, leftColumn, op, rightColumn] = rel;
      const operator = toOperator(op ?? "");
      if (leftColumn === undefined || rightColumn === undefined || !operator) continue;
      relational.push({ leftColumn, operator, rightColumn });
    }
  }

  return { ranges, relational, choices, raw: expression };
}

/** Parse several checks and merge what they say about each column. */
export function parseChecks(expressions: readonly string[]): ParsedCheckConstraint {
  const parsed = expressions.map(parseCheckConstraint);
  const ranges: RangeBound[] = [];

  for (const bound of parsed.flatMap((p) => p.ranges)) {
    const existing = ranges.find((r) => r.column === bound.column);
    if (existing) {
      Object.assign(existing, bound);
    } else {
      ranges.push({ ...bound });
    }
  }

  return {
    ranges,
    relational: parsed.flatMap((p) => p.relational),
    choices: parsed.flatMap((p) => p.choices),
    raw: expressions.join(" AND "),
  };
}

/**
 * Split expression by AND, respecting parentheses.
 */
function splitByAnd(expr: string): string[] {
  const parts: string[] = [];
  let current = "";
  let depth = 0;
  let i = 0;

  while (i < expr.length) {
    const char = expr.charAt(i);

    if (char === "(") {
      depth++;
      current += char;
    } else if (char === ")") {
      depth--;
      current += char;
    } else if (depth === 0 && /^\s+AND\s+/i.test(expr.slice(i))) {
      parts.push(current.trim());
      current = "";
      i += (expr.slice(i).match(/^\s+AND\s+/i)?.[0].length ?? 1) - 1;
    } else {
      current += char;
    }
    i++;
  }

  if (current.trim()) {
    parts.push(current.trim());
  }

  return parts;
}

/**
 * Narrow a default [min, max] range to what the column's checks allow.
 * `step` is the smallest increment, used to turn strict bounds inclusive.
 */
export function applyRangeBounds(
  column: string,
  bounds: RangeBound[],
  defaultMin: number,
  defaultMax: number,
  step = 1,
): { min: number; max: number } {
  const bound = bounds.find((b) => b.column.toLowerCase() === column.toLowerCase());
  if (!bound) {
    return { min: defaultMin, max: defaultMax };
  }

  let min = defaultMin;
  let max = defaultMax;

  if (bound.min !== undefined) {
    min = Math.max(min, bound.minInclusive ? bound.min : bound.min + step);
  }

  if (bound.max !== undefined) {
    max = Math.min(max, bound.maxInclusive ? bound.max : bound.max - step);
  }

  // a one-sided bound outside the default range moves the whole range
  if (min > max) {
    const width = defaultMax - defaultMin;
    if (bound.max === undefined) max = min + width;
    else if (bound.min === undefined) min = max - width;
    else max = min;
  }

  return { min, max };
}

function compare(left: number, op: RelationalOperator, right: number): boolean {
  switch (op) {
    case "<=":
      return left <= right;
    case ">=":
      return left >= right;
    case "<":
      return left < right;
    case ">":
      return left > right;
    case "=":
      return left === right;
    case "<>":
      return left !== right;
  }
}

function numeric(value: CellValue | undefined): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/**
 * Adjust the left-hand column so numeric comparisons between columns hold,
 * e.g. `reserved <= on_hand`.
 */
export function fixRelationalConstraints(
  row: GeneratedRow,
  constraints: readonly RelationalConstraint[],
  step = 1,
): void {
  for (const constraint of constraints) {
    const left = numeric(row[constraint.leftColumn]);
    const right = numeric(row[constraint.rightColumn]);
    if (left === undefined || right === undefined) continue;
    if (compare(left, constraint.operator, right)) continue;

    switch (constraint.operator) {
      case "<=":
      case ">=":
      case "=":
        row[constraint.leftColumn] = right;
        break;
      case "<":
        row[constraint.leftColumn] = right - step;
        break;
      case ">":
      case "<>":
        row[constraint.leftColumn] = right + step;
        break;
    }
  }
}
