// src/core/coerce.ts
import type { ColumnSchema } from "../types/schema.js";
import type { CellValue } from "../types/data.js";

export type Coerced =
  | { ok: true; value: CellValue }
  | { ok: false; reason: string };

const TRUE_WORDS = new Set(["true", "t", "yes", "y", "1"]);
const FALSE_WORDS = new Set(["false", "f", "no", "n", "0"]);

const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const TIME_TEXT = /^\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;

const fail = (reason: string): Coerced => ({ ok: false, reason });
const ok = (value: CellValue): Coerced => ({ ok: true, value });

/**
 * Convert an untrusted value into the column's logical type.
 * `null`/`undefined` pass through as null; nullability is checked by callers.
 */
export function coerceValue(column: ColumnSchema, raw: unknown): Coerced {
  if (raw === null || raw === undefined) return ok(null);

  switch (column.dataType) {
    case "integer":
      return coerceInteger(raw);
    case "decimal":
      return coerceDecimal(column, raw);
    case "boolean":
      return coerceBoolean(raw);
    case "datetime":
      return coerceDatetime(raw);
    case "string":
      return coerceString(column, raw);
  }
}

function coerceInteger(raw: unknown): Coerced {
  if (typeof raw === "number") {
    return Number.isSafeInteger(raw) ? ok(raw) : fail(`${raw} is not an integer`);
  }
  if (typeof raw === "string" && INTEGER_TEXT.test(raw.trim())) {
    const value = Number(raw.trim());
    if (Number.isSafeInteger(value)) return ok(value);
  }
  return fail(`${JSON.stringify(raw)} is not an integer`);
}

function coerceDecimal(column: ColumnSchema, raw: unknown): Coerced {
  let value: number;
  if (typeof raw === "number") {
    value = raw;
  } else if (typeof raw === "string" && DECIMAL_TEXT.test(raw.trim())) {
    value = Number(raw.trim());
  } else {
    return fail(`${JSON.stringify(raw)} is not a number`);
  }

  if (!Number.isFinite(value)) return fail(`${value} is not finite`);

  if (column.scale !== undefined) {
    const factor = 10 ** column.scale;
    value = Math.round(value * factor) / factor;
  }

  if (column.precision !== undefined) {
    const integerDigits = column.precision - (column.scale ?? 0);
    if (Math.abs(value) >= 10 ** integerDigits) {
      return fail(
        `${value} exceeds precision ${column.precision},${column.scale ?? 0}`,
      );
    }
  }

  return ok(value);
}

function coerceBoolean(raw: unknown): Coerced {
  if (typeof raw === "boolean") return ok(raw);
  const word = String(raw).trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return ok(true);
  if (FALSE_WORDS.has(word)) return ok(false);
  return fail(`${JSON.stringify(raw)} is not a boolean`);
}

function coerceDatetime(raw: unknown): Coerced {
  if (typeof raw !== "string") {
    return fail(`${JSON.stringify(raw)} is not a date/time string`);
  }
  const text = raw.trim();
  if (TIME_TEXT.test(text) || !Number.isNaN(Date.parse(text))) {
    return ok(text);
  }
  return fail(`${JSON.stringify(raw)} is not a date/time`);
}

function coerceString(column: ColumnSchema, raw: unknown): Coerced {
  if (typeof raw === "object") {
    return fail("objects are not valid string values");
  }
  const value = String(raw);
  if (column.length !== undefined && value.length > column.length) {
    return fail(`length ${value.length} exceeds ${column.length}`);
  }
  return ok(value);
}
