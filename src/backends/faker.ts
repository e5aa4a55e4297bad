// src/backends/faker.ts
import { Faker, en } from "@faker-js/faker";
import type { GenerationBackend, GenerationRequest, ForeignKeyContext } from "../types/backend.js";
import type { ColumnSchema, TableSchema } from "../types/schema.js";
import type { CellValue, GeneratedRow } from "../types/data.js";
import type { RNG } from "../types/rng.js";
import { createRng, randomBool, randomInt, randomPick } from "../util/rng.js";
import {
  applyRangeBounds,
  fixRelationalConstraints,
  parseChecks,
  type ParsedCheckConstraint,
} from "../util/constraints.js";

// Dates are drawn relative to a fixed day so that a seed always gives the same rows.
const REF_DATE = new Date("2025-01-01T00:00:00.000Z");

const NULL_RATE = 0.05;

/**
 * Offline backend: fills rows with faker values. Seeded per request, so the
 * same request always gets the same rows.
 */
export class FakerBackend implements GenerationBackend {
  readonly name = "faker";

  async generate(request: GenerationRequest): Promise<unknown> {
    return { rows: generateRows(request) };
  }
}

export function generateRows(request: GenerationRequest): GeneratedRow[] {
  const { table, rowCount, keyOffset, assignments, foreignKeys } = request;

  const faker = new Faker({ locale: [en] });
  faker.seed(request.seed);
  const rng = createRng(request.seed);

  const checks = parseChecks(table.checks.map((c) => c.expression));
  const fkColumns = new Map<string, ForeignKeyContext>();
  for (const fk of foreignKeys) {
    for (const col of fk.columns) fkColumns.set(col, fk);
  }

  const rows: GeneratedRow[] = [];
  for (let i = 0; i < rowCount; i++) {
    const row: GeneratedRow = {};
    const assignment = assignments[i] ?? {};
    const picked = new Map<ForeignKeyContext, GeneratedRow>();

    for (const column of table.columns) {
      if (column.isIdentity || column.isComputed) continue;

      const assigned = assignment[column.name];
      if (assigned !== undefined) {
        row[column.name] = assigned;
        continue;
      }

      const fk = fkColumns.get(column.name);
      if (fk) {
        row[column.name] = pickForeignKey(rng, fk, column, picked);
        continue;
      }

      row[column.name] = valueFor(faker, rng, table, column, keyOffset + i, checks);
    }

    fixRelationalConstraints(row, checks.relational);
    rows.push(row);
  }

  return rows;
}

/** Choose a candidate key once per FK and row, so composite keys stay together. */
function pickForeignKey(
  rng: RNG,
  fk: ForeignKeyContext,
  column: ColumnSchema,
  picked: Map<ForeignKeyContext, GeneratedRow>,
): CellValue {
  const existing = picked.get(fk);
  if (existing) return existing[column.name] ?? null;

  const chosen: GeneratedRow = {};
  const leaveEmpty = column.isNullable && fk.source === "self" && randomBool(rng, 0.3);
  if (fk.candidates.length > 0 && !leaveEmpty) {
    const candidate = randomPick(rng, fk.candidates);
    fk.columns.forEach((col, k) => {
      chosen[col] = candidate.key[k] ?? null;
    });
  }
  picked.set(fk, chosen);
  return chosen[column.name] ?? null;
}

function isSinglePrimaryKey(table: TableSchema, column: ColumnSchema): boolean {
  return table.primaryKey.length === 1 && table.primaryKey[0] === column.name;
}

function valueFor(
  faker: Faker,
  rng: RNG,
  table: TableSchema,
  column: ColumnSchema,
  rowIndex: number,
  checks: ParsedCheckConstraint,
): CellValue {
  const { ranges } = checks;
  const isPk = table.primaryKey.includes(column.name);

  if (column.isNullable && !isPk && randomBool(rng, NULL_RATE)) {
    return null;
  }

  const sqlType = (column.sqlType ?? "").toLowerCase();

  switch (column.dataType) {
    case "integer": {
      if (isSinglePrimaryKey(table, column)) return rowIndex + 1;
      const max = sqlType.includes("tinyint")
        ? 255
        : sqlType.includes("smallint") || sqlType === "int2"
          ? 1000
          : sqlType.includes("bigint") || sqlType === "int8"
            ? 1_000_000
            : 100_000;
      const range = applyRangeBounds(column.name, ranges, 1, max);
      return randomInt(rng, Math.ceil(range.min), Math.floor(range.max));
    }

    case "decimal": {
      const scale = column.scale ?? 2;
      const step = 1 / 10 ** scale;
      const ceiling =
        column.precision !== undefined ? 10 ** (column.precision - scale) - step : 10_000;
      const range = applyRangeBounds(column.name, ranges, 0, Math.min(ceiling, 10_000), step);
      const value = range.min + rng() * (range.max - range.min);
      return Math.round(value * 10 ** scale) / 10 ** scale;
    }

    case "boolean":
      return randomBool(rng, 0.5);

    case "datetime": {
      const date = faker.date.recent({ days: 90, refDate: REF_DATE });
      const iso = date.toISOString();
      if (sqlType === "date") return iso.slice(0, 10);
      if (sqlType.startsWith("time") && !sqlType.startsWith("timestamp")) return iso.slice(11, 19);
      return iso;
    }

    case "string": {
      const allowed = checks.choices.find((c) => c.column.toLowerCase() === column.name.toLowerCase());
      if (allowed) return randomPick(rng, allowed.values);
      if (sqlType.includes("uuid") || sqlType.includes("uniqueidentifier")) {
        return faker.string.uuid();
      }
      const text = isSinglePrimaryKey(table, column)
        ? String(rowIndex + 1)
        : generateTextByPattern(faker, rng, column.name);
      return column.length !== undefined ? text.slice(0, column.length) : text;
    }
  }
}

function generateTextByPattern(faker: Faker, rng: RNG, colName: string): string {
  const name = colName.toLowerCase();
  const patterns: Array<[RegExp, () => string]> = [
    [/email/, () => faker.internet.email()],
    [/(^|_)first_?name|\bfname\b|given_?name/, () => faker.person.firstName()],
    [/(^|_)last_?name|\blname\b|surname|family_?name/, () => faker.person.lastName()],
    [/user_?name|login|handle/, () => faker.internet.username()],
    [/(^|_)name$|^name/, () => faker.person.fullName()],
    [/phone|mobile|cell|tel/, () => faker.phone.number()],
    [/address|addr/, () => faker.location.streetAddress()],
    [/city|town/, () => faker.location.city()],
    [/country|nation/, () => faker.location.countryCode()],
    [/zip|postal|postcode/, () => faker.location.zipCode()],
    [/url|website|link|href/, () => faker.internet.url()],
    [/description|desc|bio|about|summary|note/, () => faker.lorem.sentence()],
    [/title|headline|subject/, () => faker.lorem.words(randomInt(rng, 2, 5))],
    [/company|organisation|organization|employer/, () => faker.company.name()],
    [/currency|ccy/, () => faker.finance.currencyCode()],
    [/code|sku/, () => faker.string.alphanumeric({ length: 8, casing: "upper" })],
  ];

  for (const [regex, generator] of patterns) {
    if (regex.test(name)) {
      return generator();
    }
  }

  return generateGenericText(faker, rng);
}

function generateGenericText(faker: Faker, rng: RNG): string {
  switch (randomInt(rng, 1, 4)) {
    case 1:
      return faker.lorem.word();
    case 2:
      return faker.lorem.words(randomInt(rng, 2, 4));
    case 3:
      return faker.lorem.slug();
    default:
      return faker.string.alphanumeric({ length: randomInt(rng, 6, 12) });
  }
}
