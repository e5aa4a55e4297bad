import { describe, it, expect, vi, afterEach } from "vitest";
import { RetryMachine, runWithRetry, withTimeout } from "../core/retry.js";
import { RetryPolicySchema } from "../models/config.js";
import {
  BackendResponseError,
  BackendTimeoutError,
  BackendTransportError,
  TableGenerationError,
} from "../errors.js";
import { FakeClock } from "./helpers.js";

const policy = RetryPolicySchema.parse({});

describe("RetryMachine", () => {
  it("doubles the delay up to the cap", () => {
    const machine = new RetryMachine(RetryPolicySchema.parse({ maxDelayMs: 5000 }));

    expect([1, 2, 3, 4, 5].map((a) => machine.delayFor(a))).toEqual([1000, 2000, 4000, 5000, 5000]);
  });

  it("retries backend errors until attempts run out", () => {
    const machine = new RetryMachine(policy);
    const error = new BackendTransportError("connection reset");

    expect(machine.onFailure(error)).toEqual({ action: "retry", attempt: 1, delayMs: 1000, error });
    expect(machine.onFailure(error)).toEqual({ action: "retry", attempt: 2, delayMs: 2000, error });
    expect(machine.onFailure(error)).toEqual({ action: "fail", attempts: 3, error });
  });

  it("gives up at once on anything that is not a backend error", () => {
    const error = new TypeError("bad input");

    expect(new RetryMachine(policy).onFailure(error)).toEqual({ action: "fail", attempts: 1, error });
  });

  it("keeps jittered delays within the configured band", () => {
    const jittered = RetryPolicySchema.parse({ jitter: 0.5, maxAttempts: 50 });
    const machine = new RetryMachine(jittered, () => 0.999);
    const low = new RetryMachine(jittered, () => 0);

    const high = machine.onFailure(new BackendTransportError("x"));
    const bottom = low.onFailure(new BackendTransportError("x"));

    expect(high).toMatchObject({ action: "retry", delayMs: 1499 });
    expect(bottom).toMatchObject({ action: "retry", delayMs: 500 });
  });
});

describe("runWithRetry", () => {
  it("sleeps between attempts and returns the first success", async () => {
    const clock = new FakeClock();
    const attempts: number[] = [];
    const retried: number[] = [];

    const value = await runWithRetry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw new BackendResponseError("not JSON");
        return "rows";
      },
      policy,
      { label: "Customer", clock, onRetry: (d) => retried.push(d.attempt) },
    );

    expect(value).toBe("rows");
    expect(attempts).toEqual([1, 2, 3]);
    expect(retried).toEqual([1, 2]);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it("wraps an exhausted backend error in a TableGenerationError", async () => {
    const clock = new FakeClock();
    const cause = new BackendTimeoutError("Customer", 60_000);

    const error = await runWithRetry(
      async () => {
        throw cause;
      },
      policy,
      { label: "Customer", clock },
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TableGenerationError);
    expect(error).toMatchObject({
      table: "Customer",
      attempts: 3,
      cause,
      message: "Generation of Customer failed after 3 attempt(s): Backend call for Customer timed out after 60000ms",
    });
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it("rethrows other errors unchanged without sleeping", async () => {
    const clock = new FakeClock();
    const bug = new RangeError("boom");

    await expect(
      runWithRetry(
        async () => {
          throw bug;
        },
        policy,
        { label: "Customer", clock },
      ),
    ).rejects.toBe(bug);
    expect(clock.sleeps).toEqual([]);
  });
});

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the call's value when it finishes in time", async () => {
    await expect(withTimeout("Customer", 1000, async () => 42)).resolves.toBe(42);
  });

  it("aborts the call and rejects with a timeout error", async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;

    const pending = withTimeout("Customer", 500, (signal) => {
      seen = signal;
      return new Promise<never>(() => {});
    });
    const outcome = pending.catch((e: unknown) => e);

    await vi.advanceTimersByTimeAsync(500);

    const error = await outcome;
    expect(error).toBeInstanceOf(BackendTimeoutError);
    expect(error).toMatchObject({ message: "Backend call for Customer timed out after 500ms" });
    expect(seen?.aborted).toBe(true);
  });
});
