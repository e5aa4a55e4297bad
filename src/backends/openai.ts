// src/backends/openai.ts
import OpenAI, { APIError, APIUserAbortError } from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import type { GenerationBackend, GenerationRequest } from "../types/backend.js";
import type { TableSchema } from "../types/schema.js";
import {
  BackendResponseError,
  BackendTimeoutError,
  BackendTransportError,
  errorMessage,
} from "../errors.js";

export const DEFAULT_MODEL = "gpt-4o";

export type ChatCompletionLike = {
  choices: Array<{ message: { content: string | null } }>;
};

/** The one call the backend makes; the openai client satisfies it. */
export interface ChatClient {
  create(
    body: ChatCompletionCreateParamsNonStreaming,
    options: { signal: AbortSignal },
  ): Promise<ChatCompletionLike>;
}

export type OpenAIBackendOptions = {
  apiKey?: string;
  model?: string;
  temperature?: number;
  client?: ChatClient;
};

const SYSTEM_PROMPT =
  "You generate synthetic rows for relational database tables. " +
  'Reply with a single JSON object of the form {"rows": [ ... ]} and nothing else.';

function describeTable(table: TableSchema): string {
  const columns = table.columns
    .filter((c) => !c.isComputed && !c.isIdentity)
    .map((c) => {
      const type = c.sqlType ?? c.dataType;
      const size =
        c.length !== undefined
          ? `(${c.length})`
          : c.precision !== undefined
            ? `(${c.precision},${c.scale ?? 0})`
            : "";
      const flags = [c.isNullable ? "NULL" : "NOT NULL"];
      if (c.defaultValue !== null) flags.push(`DEFAULT ${c.defaultValue}`);
      return `  - ${c.name}: ${type}${c.sqlType ? "" : size} ${flags.join(" ")}`;
    });

  const lines = [`Table ${table.name}`, "Columns:", ...columns];
  if (table.primaryKey.length > 0) lines.push(`Primary key: (${table.primaryKey.join(", ")})`);
  for (const u of table.uniques) lines.push(`Unique: (${u.columns.join(", ")})`);
  for (const c of table.checks) lines.push(`Check ${c.name}: ${c.expression}`);
  return lines.join("\n");
}

/**
 * User prompt for one request.
 */
export function buildPrompt(request: GenerationRequest): string {
  const { table, rowCount, keyOffset, foreignKeys, assignments, rejections } = request;
  const parts = [describeTable(table)];

  const omitted = table.columns.filter((c) => c.isIdentity || c.isComputed).map((c) => c.name);
  if (omitted.length > 0) {
    parts.push(`Do not include these database-generated columns: ${omitted.join(", ")}.`);
  }

  for (const fk of foreignKeys) {
    const shown = fk.candidates
      .map((c) => JSON.stringify(c.weight !== undefined ? { key: c.key, weight: c.weight } : c.key))
      .join(", ");
    parts.push(
      `Foreign key ${fk.constraintName}: (${fk.columns.join(", ")}) references ` +
        `${fk.refTable}(${fk.refColumns.join(", ")}). ` +
        (fk.source === "self"
          ? "Only rows that already exist may be referenced"
          : `Allowed keys (${fk.candidates.length} of ${fk.available})`) +
        `: [${shown}]`,
    );
  }

  if (assignments.length > 0) {
    parts.push(
      "Use exactly these foreign-key values, one object per row in order:\n" +
        assignments.map((a) => JSON.stringify(a)).join("\n"),
    );
  }

  if (keyOffset > 0) {
    parts.push(`${keyOffset} row(s) already exist; number any sequential keys from ${keyOffset + 1}.`);
  }

  const reasons = Object.entries(rejections);
  if (reasons.length > 0) {
    parts.push(
      `Earlier rows were rejected (${reasons.map(([r, n]) => `${r}: ${n}`).join(", ")}); avoid repeating these problems.`,
    );
  }

  parts.push(
    `Generate exactly ${rowCount} row(s). Every object must use the column names above as keys.`,
  );

  return parts.join("\n\n");
}

/** Drop a ```json fence around the reply, if the model added one. */
export function stripCodeFence(text: string): string {
  const match = text.trim().match(/^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/);
  return match?.[1] !== undefined ? match[1].trim() : text.trim();
}

/** SDK client with its own retries off; the driver does the retrying. */
export function createOpenAIClient(apiKey?: string): OpenAI {
  return new OpenAI({ apiKey, maxRetries: 0 });
}

function defaultClient(apiKey: string | undefined): ChatClient {
  const openai = createOpenAIClient(apiKey);
  return {
    create: (body, options) => openai.chat.completions.create(body, options),
  };
}

/**
 * Backend that asks an OpenAI chat model for rows.
 */
export class OpenAIBackend implements GenerationBackend {
  readonly name = "openai";
  private readonly client: ChatClient;
  private readonly model: string;
  private readonly temperature: number;

  constructor(options: OpenAIBackendOptions = {}) {
    this.client = options.client ?? defaultClient(options.apiKey);
    this.model = options.model ?? DEFAULT_MODEL;
    this.temperature = options.temperature ?? 0.3;
  }

  async generate(
    request: GenerationRequest,
    options: { signal: AbortSignal },
  ): Promise<unknown> {
    const table = request.table.name;
    let completion: ChatCompletionLike;

    try {
      completion = await this.client.create(
        {
          model: this.model,
          temperature: this.temperature,
          seed: request.seed,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: buildPrompt(request) },
          ],
        },
        { signal: options.signal },
      );
    } catch (error) {
      throw mapClientError(table, error, options.signal);
    }

    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new BackendResponseError(`Empty completion for ${table}`);
    }

    try {
      return JSON.parse(stripCodeFence(content));
    } catch (error) {
      throw new BackendResponseError(`Completion for ${table} is not valid JSON`, {
        cause: error,
      });
    }
  }
}

function mapClientError(table: string, error: unknown, signal: AbortSignal): Error {
  if (error instanceof APIUserAbortError || signal.aborted) {
    return new BackendTimeoutError(table, undefined, { cause: error });
  }

  if (error instanceof APIError) {
    const status = error.status;
    if (status === undefined || status === 408 || status === 429 || status >= 500) {
      return new BackendTransportError(
        `OpenAI request for ${table} failed${status ? ` (${status})` : ""}: ${error.message}`,
        { cause: error },
      );
    }
    // other 4xx (bad key, bad model) will not get better on retry
    return new Error(`OpenAI rejected the request for ${table} (${status}): ${error.message}`, {
      cause: error,
    });
  }

  return new BackendTransportError(`OpenAI request for ${table} failed: ${errorMessage(error)}`, {
    cause: error,
  });
}
