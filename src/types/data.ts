// src/types/data.ts

export type CellValue = string | number | boolean | null;

export type GeneratedRow = Record<string, CellValue>;

/** Table name -> committed rows, in generation order. */
export type GeneratedData = Map<string, GeneratedRow[]>;

/** Raw, untyped row as it comes out of a CSV/JSON reference file. */
export type RawReferenceRow = Record<string, unknown>;

/** Table name -> raw reference rows. */
export type ReferenceDataSet = Record<string, RawReferenceRow[]>;
