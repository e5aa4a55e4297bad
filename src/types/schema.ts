// src/types/schema.ts
import { z } from "zod";
import {
  SchemaModelSchema,
  TableSchema as TableSchemaVal,
  ColumnSchema as ColumnSchemaVal,
  ForeignKeySchema as ForeignKeySchemaVal,
  ReferencePoolSchema as ReferencePoolSchemaVal,
  DataTypeSchema,
} from "../models/schema.js";

export type SchemaModel = z.infer<typeof SchemaModelSchema>;
export type TableSchema = z.infer<typeof TableSchemaVal>;
export type ColumnSchema = z.infer<typeof ColumnSchemaVal>;
export type ForeignKey = z.infer<typeof ForeignKeySchemaVal>;
export type ReferencePool = z.infer<typeof ReferencePoolSchemaVal>;
export type DataType = z.infer<typeof DataTypeSchema>;

/** Input form of the schema (defaults not yet applied), as written in JSON files. */
export type SchemaModelInput = z.input<typeof SchemaModelSchema>;
