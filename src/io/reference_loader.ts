// src/io/reference_loader.ts
import { readdir, readFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import Papa from "papaparse";
import type { RawReferenceRow, ReferenceDataSet } from "../types/data.js";

const SECTION = /^#\s*(.+?)\s*$/;

/** `[dbo].[Status]`, `[dbo.Status]` or `dbo.Status` -> `Status`. */
export function tableNameFrom(spec: string): string {
  const cleaned = spec.replace(/[[\]]/g, "").trim();
  const dot = cleaned.lastIndexOf(".");
  return (dot === -1 ? cleaned : cleaned.slice(dot + 1)).trim();
}

function cleanHeader(header: string): string {
  return header.trim().replace(/^\[(.*)\]$/, "$1").trim();
}

/**
 * Parse one CSV table with a header row. Values are trimmed; type coercion
 * happens later against the schema.
 */
export function parseReferenceCsv(text: string): RawReferenceRow[] {
  const parsed = Papa.parse<Record<string, string>>(text.trim(), {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
    transformHeader: cleanHeader,
    transform: (value) => value.trim(),
  });

  const fatal = parsed.errors.find((e) => e.type !== "FieldMismatch");
  if (fatal) {
    throw new Error(`CSV parse error (row ${fatal.row ?? "?"}): ${fatal.message}`);
  }

  const width = parsed.meta.fields?.length ?? 0;
  return parsed.data.filter((row) => Object.keys(row).length === width);
}

/** True when the text uses `# [Schema.Table]` section headers. */
export function isMultiTableCsv(text: string): boolean {
  return text.split(/\r?\n/).some((line) => SECTION.test(line.trim()));
}

/**
 * Parse the multi-table format:
 *
 *   # [dbo.Status]
 *   code,label
 *   A,Active
 *
 *   # [dbo.Country]
 *   ...
 *
 * Rows with a different number of fields than the header are skipped.
 */
export function parseMultiTableCsv(text: string): ReferenceDataSet {
  const tables: ReferenceDataSet = {};
  let current: { name: string; lines: string[] } | undefined;

  const flush = () => {
    if (!current) return;
    const rows = current.lines.length > 0 ? parseSection(current.lines) : [];
    tables[current.name] = [...(tables[current.name] ?? []), ...rows];
  };

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === "") continue;

    const section = trimmed.match(SECTION);
    if (section?.[1] !== undefined) {
      flush();
      current = { name: tableNameFrom(section[1]), lines: [] };
      continue;
    }

    current?.lines.push(trimmed);
  }
  flush();

  return tables;
}

function parseSection(lines: string[]): RawReferenceRow[] {
  const parsed = Papa.parse<string[]>(lines.join("\n"), {
    header: false,
    skipEmptyLines: true,
    transform: (value) => value.trim(),
  });

  const [header, ...body] = parsed.data;
  if (!header) return [];
  const columns = header.map(cleanHeader);

  return body
    .filter((values) => values.length === columns.length)
    .map((values) => Object.fromEntries(columns.map((col, i) => [col, values[i] ?? ""])));
}

function isRowArray(value: unknown): value is RawReferenceRow[] {
  return (
    Array.isArray(value) &&
    value.every((row) => typeof row === "object" && row !== null && !Array.isArray(row))
  );
}

/**
 * JSON reference data: either an array of rows for one table, or an object
 * mapping table names to row arrays.
 */
export function parseReferenceJson(text: string, fallbackName: string): ReferenceDataSet {
  const data: unknown = JSON.parse(text);

  if (isRowArray(data)) {
    return { [fallbackName]: data };
  }

  if (typeof data === "object" && data !== null && !Array.isArray(data)) {
    const tables: ReferenceDataSet = {};
    for (const [name, rows] of Object.entries(data)) {
      if (!isRowArray(rows)) {
        throw new Error(`Reference data for ${name} must be an array of objects`);
      }
      tables[tableNameFrom(name)] = rows;
    }
    return tables;
  }

  throw new Error("Reference JSON must be an array of rows or an object of table -> rows");
}

/**
 * Load every .csv and .json file in a directory. Later files add rows to
 * tables an earlier file already named.
 */
export async function loadReferenceDirectory(dir: string): Promise<ReferenceDataSet> {
  const entries = (await readdir(dir, { withFileTypes: true }))
    .filter((e) => e.isFile())
    .map((e) => e.name)
    .sort();

  const result: ReferenceDataSet = {};
  const add = (set: ReferenceDataSet) => {
    for (const [name, rows] of Object.entries(set)) {
      result[name] = [...(result[name] ?? []), ...rows];
    }
  };

  for (const file of entries) {
    const ext = extname(file).toLowerCase();
    if (ext !== ".csv" && ext !== ".json") continue;

    const text = await readFile(join(dir, file), "utf-8");
    const name = tableNameFrom(basename(file, extname(file)));

    if (ext === ".json") {
      add(parseReferenceJson(text, name));
    } else if (isMultiTableCsv(text)) {
      add(parseMultiTableCsv(text));
    } else {
      add({ [name]: parseReferenceCsv(text) });
    }
  }

  return result;
}
