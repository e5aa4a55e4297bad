// src/io/schema_loader.ts
import { SchemaModelSchema } from "../models/schema.js";
import { parseRunConfig } from "../models/config.js";
import type { SchemaModel } from "../types/schema.js";
import type { RunConfig } from "../types/config.js";
import { readJsonFile } from "../util/fs.js";

/**
 * Validate an untrusted schema document.
 */
export function parseSchema(raw: unknown): SchemaModel {
  const result = SchemaModelSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid schema: ${result.error.message}`);
  }
  return result.data;
}

export async function loadSchemaFile(path: string): Promise<SchemaModel> {
  return parseSchema(await readJsonFile(path));
}

export async function loadRunConfigFile(path: string): Promise<RunConfig> {
  return parseRunConfig(await readJsonFile(path));
}
