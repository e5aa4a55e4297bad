import { SchemaModelSchema } from "../models/schema.js";
import type { SchemaModel, SchemaModelInput } from "../types/schema.js";
import type { GenerationBackend, GenerationRequest } from "../types/backend.js";
import type { Clock } from "../core/retry.js";

export function schemaOf(input: SchemaModelInput): SchemaModel {
  return SchemaModelSchema.parse(input);
}

type Step = (request: GenerationRequest) => unknown;

/** Step that answers with a fixed body. */
export const reply =
  (body: unknown): Step =>
  () =>
    body;

/** Step that fails the call. */
export const fail =
  (error: Error): Step =>
  () => {
    throw error;
  };

/**
 * Backend that replays scripted steps per table, one per call. Once a
 * table's script runs out it answers with an empty list.
 */
export class ScriptedBackend implements GenerationBackend {
  readonly name = "scripted";
  readonly requests: GenerationRequest[] = [];
  private readonly scripts: Map<string, Step[]>;

  constructor(scripts: Record<string, Step[]>) {
    this.scripts = new Map(Object.entries(scripts));
  }

  async generate(request: GenerationRequest): Promise<unknown> {
    this.requests.push(request);
    const step = this.scripts.get(request.table.name)?.shift();
    return step ? step(request) : [];
  }

  requestsFor(table: string): GenerationRequest[] {
    return this.requests.filter((r) => r.table.name === table);
  }
}

/** Clock whose sleeps return immediately and are recorded. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private time = 0;

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}
