// src/util/fs.ts
import { readFile, writeFile as fsWriteFile, mkdir } from "fs/promises";
import { dirname } from "path";

/**
 * Read and parse a JSON file. The result is unvalidated.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, "utf-8");
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new Error(`${filePath} is not valid JSON`, { cause: error });
  }
}

/**
 * Write content to a file, creating directories if needed.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await fsWriteFile(filePath, content, "utf-8");
}

/**
 * Write JSON to a file with pretty formatting.
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`);
}
