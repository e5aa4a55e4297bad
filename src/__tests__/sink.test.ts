import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CsvDirectorySink, JsonDirectorySink, summarizeRun, writeRunSummary } from "../io/sink.js";
import type { RunResult, TableOutcome } from "../core/driver.js";

const rows = [
  { id: 1, name: "Smith, Jane", active: true, note: null },
  { id: 2, name: 'Say "hi"', active: false, note: "x" },
];

const result: RunResult = {
  status: "completed",
  seed: 42,
  order: ["Status", "Customer"],
  tables: new Map<string, TableOutcome>([
    ["Status", { rows: [{ code: "A" }], requested: 1, source: "reference" }],
    ["Customer", { rows, requested: 3, source: "generated" }],
  ]),
  warnings: [
    { type: "shortfall", table: "Customer", requested: 3, produced: 2, rejections: { duplicate_key: 1 } },
  ],
  durationMs: 12,
};

describe("output sinks", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "rowforge-out-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes one quoted CSV per table in column order", async () => {
    const sink = new CsvDirectorySink(join(dir, "csv"));

    await sink.writeTable("Customer", rows, ["id", "name", "active", "note"]);

    expect(sink.written).toEqual([join(dir, "csv", "Customer.csv")]);
    expect(await readFile(join(dir, "csv", "Customer.csv"), "utf-8")).toBe(
      'id,name,active,note\n1,"Smith, Jane",true,\n2,"Say ""hi""",false,x\n',
    );
  });

  it("writes JSON rows with only the output columns", async () => {
    const sink = new JsonDirectorySink(dir);

    await sink.writeTable("Customer", rows, ["name", "id"]);

    expect(JSON.parse(await readFile(join(dir, "Customer.json"), "utf-8"))).toEqual([
      { name: "Smith, Jane", id: 1 },
      { name: 'Say "hi"', id: 2 },
    ]);
  });

  it("writes a run summary", async () => {
    const path = await writeRunSummary(dir, result, {
      backend: "faker",
      generatedAt: new Date("2025-03-01T10:00:00.000Z"),
    });

    expect(path).toBe(join(dir, "summary.json"));
    expect(JSON.parse(await readFile(path, "utf-8"))).toEqual({
      seed: 42,
      status: "completed",
      backend: "faker",
      generatedAt: "2025-03-01T10:00:00.000Z",
      durationMs: 12,
      order: ["Status", "Customer"],
      tables: {
        Status: { rows: 1, requested: 1, source: "reference" },
        Customer: { rows: 2, requested: 3, source: "generated" },
      },
      warnings: [
        { type: "shortfall", table: "Customer", requested: 3, produced: 2, rejections: { duplicate_key: 1 } },
      ],
    });
  });
});

describe("summarizeRun", () => {
  it("stamps the current time when none is given", () => {
    const summary = summarizeRun(result, { backend: "openai" });

    expect(Number.isNaN(Date.parse(summary.generatedAt))).toBe(false);
    expect(summary.backend).toBe("openai");
  });
});
