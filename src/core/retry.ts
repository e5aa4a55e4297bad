// src/core/retry.ts
import { setTimeout as delay } from "node:timers/promises";
import type { RetryPolicy } from "../types/config.js";
import type { RNG } from "../types/rng.js";
import {
  BackendTimeoutError,
  TableGenerationError,
  isRetryable,
  type BackendError,
} from "../errors.js";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};

export type RetryDecision =
  | { action: "retry"; attempt: number; delayMs: number; error: BackendError }
  | { action: "fail"; attempts: number; error: unknown };

/**
 * Attempt counter and backoff schedule for one backend invocation.
 *
 *   attempt 1 fails -> wait base
 *   attempt 2 fails -> wait base * multiplier
 *   ...
 *   attempt maxAttempts fails -> fail
 */
export class RetryMachine {
  private current = 1;

  constructor(
    private readonly policy: RetryPolicy,
    private readonly rng?: RNG,
  ) {}

  get attempt(): number {
    return this.current;
  }

  /** Backoff after the given failed attempt, before jitter. */
  delayFor(attempt: number): number {
    const { baseDelayMs, multiplier, maxDelayMs } = this.policy;
    return Math.min(baseDelayMs * multiplier ** (attempt - 1), maxDelayMs);
  }

  onFailure(error: unknown): RetryDecision {
    if (!isRetryable(error) || this.current >= this.policy.maxAttempts) {
      return { action: "fail", attempts: this.current, error };
    }

    const attempt = this.current;
    this.current += 1;
    return { action: "retry", attempt, delayMs: this.jittered(this.delayFor(attempt)), error };
  }

  private jittered(delay: number): number {
    const { jitter } = this.policy;
    if (jitter === 0 || !this.rng) return delay;
    const factor = 1 + jitter * (2 * this.rng() - 1);
    return Math.max(0, Math.round(delay * factor));
  }
}

export type RetryOptions = {
  /** Table name used in the error raised once attempts run out. */
  label: string;
  clock?: Clock;
  rng?: RNG;
  onRetry?: (decision: Extract<RetryDecision, { action: "retry" }>) => void;
};

/**
 * Run `op` until it succeeds or the policy gives up. Backend errors that
 * exhaust the attempts become a TableGenerationError; anything else is
 * rethrown as is.
 */
export async function runWithRetry<T>(
  op: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  const machine = new RetryMachine(policy, options.rng);
  const clock = options.clock ?? systemClock;

  for (;;) {
    try {
      return await op(machine.attempt);
    } catch (error) {
      const decision = machine.onFailure(error);
      if (decision.action === "fail") {
        if (isRetryable(decision.error)) {
          throw new TableGenerationError(options.label, decision.attempts, decision.error);
        }
        throw decision.error;
      }
      options.onRetry?.(decision);
      await clock.sleep(decision.delayMs);
    }
  }
}

/**
 * Give `fn` an AbortSignal that fires after `timeoutMs` and reject with
 * BackendTimeoutError when it does.
 */
export async function withTimeout<T>(
  table: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new BackendTimeoutError(table, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
