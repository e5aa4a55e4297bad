// src/errors.ts

export type ErrorKind = "structural" | "backend" | "row";

export abstract class GenerationError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ---------- Structural (fatal before generation) ----------

export type SchemaIssue = {
  table: string;
  constraint?: string;
  message: string;
};

export class SchemaIntegrityError extends GenerationError {
  readonly kind = "structural";

  constructor(readonly issues: SchemaIssue[]) {
    super(
      `Schema is not well-formed:\n${issues
        .map((i) => `  - ${i.table}${i.constraint ? ` (${i.constraint})` : ""}: ${i.message}`)
        .join("\n")}`,
    );
  }
}

export class CyclicDependencyError extends GenerationError {
  readonly kind = "structural";

  /** Every table that sits on a foreign-key cycle, sorted. */
  readonly tables: string[];

  constructor(readonly cycles: string[][]) {
    const tables = cycles.flat().sort();
    super(`Circular dependency detected involving tables: ${tables.join(", ")}`);
    this.tables = tables;
  }
}

export class EmptyReferencePoolError extends GenerationError {
  readonly kind = "structural";

  constructor(
    readonly table: string,
    readonly referencedBy: string[],
  ) {
    super(
      `Reference table ${table} has no rows but is required by mandatory foreign keys from: ${referencedBy.join(", ")}`,
    );
  }
}

export class InvalidReferenceDataError extends GenerationError {
  readonly kind = "structural";

  constructor(
    readonly table: string,
    message: string,
  ) {
    super(`Reference data for ${table}: ${message}`);
  }
}

// ---------- Backend invocation (retryable) ----------

export abstract class BackendError extends GenerationError {
  readonly kind = "backend";
}

export class BackendTimeoutError extends BackendError {
  constructor(
    readonly table: string,
    readonly timeoutMs?: number,
    options?: { cause?: unknown },
  ) {
    super(
      `Backend call for ${table} timed out${timeoutMs !== undefined ? ` after ${timeoutMs}ms` : ""}`,
      options,
    );
  }
}

export class BackendTransportError extends BackendError {}

export class BackendResponseError extends BackendError {}

export function isRetryable(error: unknown): error is BackendError {
  return error instanceof BackendError;
}

// ---------- Fatal for the run once retries are exhausted ----------

export class TableGenerationError extends GenerationError {
  readonly kind = "backend";

  constructor(
    readonly table: string,
    readonly attempts: number,
    cause: unknown,
  ) {
    super(
      `Generation of ${table} failed after ${attempts} attempt(s): ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
