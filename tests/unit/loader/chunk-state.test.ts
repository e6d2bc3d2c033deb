/**
 * Tests for the per-chunk write state machine
 */

import { describe, test, expect } from "vitest";
import {
  InvalidChunkTransitionError,
  isTerminal,
  transitionChunk,
  type ChunkRetryPolicy,
  type ChunkState,
} from "../../../src/loader/chunk-state.js";
import {
  PermanentStoreFault,
  TransientStoreFault,
  isTransientStoreFault,
} from "../../../src/graph/errors.js";

const policy: ChunkRetryPolicy = {
  maxAttempts: 3,
  isRetryable: isTransientStoreFault,
  delayFor: (attempt) => 100 * Math.pow(2, attempt),
};

const counters = { nodes: 2, relationships: 1, properties: 4 };

describe("transitionChunk", () => {
  test("pending starts the first attempt", () => {
    const next = transitionChunk({ status: "pending", chunkIndex: 3 }, { type: "start" }, policy);

    expect(next).toEqual({ status: "attempting", chunkIndex: 3, attempt: 0 });
  });

  test("a successful attempt commits with its counters", () => {
    const next = transitionChunk(
      { status: "attempting", chunkIndex: 0, attempt: 1 },
      { type: "succeeded", counters },
      policy
    );

    expect(next).toEqual({ status: "committed", chunkIndex: 0, attempts: 2, counters });
  });

  test("a transient failure with budget left schedules a retry", () => {
    const error = new TransientStoreFault("unavailable", "ServiceUnavailable");

    const next = transitionChunk(
      { status: "attempting", chunkIndex: 0, attempt: 1 },
      { type: "failed", error },
      policy
    );

    expect(next).toEqual({
      status: "retrying",
      chunkIndex: 0,
      attempt: 1,
      delayMs: 200,
      error,
    });
  });

  test("a transient failure on the last attempt fails the chunk", () => {
    const error = new TransientStoreFault("unavailable");

    const next = transitionChunk(
      { status: "attempting", chunkIndex: 5, attempt: 2 },
      { type: "failed", error },
      policy
    );

    expect(next).toEqual({ status: "failed", chunkIndex: 5, attempts: 3, error });
  });

  test("a permanent failure fails the chunk immediately", () => {
    const error = new PermanentStoreFault("syntax error", "Neo.ClientError.Statement.SyntaxError");

    const next = transitionChunk(
      { status: "attempting", chunkIndex: 0, attempt: 0 },
      { type: "failed", error },
      policy
    );

    expect(next).toEqual({ status: "failed", chunkIndex: 0, attempts: 1, error });
  });

  test("elapsed backoff starts the next attempt", () => {
    const next = transitionChunk(
      {
        status: "retrying",
        chunkIndex: 0,
        attempt: 0,
        delayMs: 100,
        error: new TransientStoreFault("x"),
      },
      { type: "backoff-elapsed" },
      policy
    );

    expect(next).toEqual({ status: "attempting", chunkIndex: 0, attempt: 1 });
  });

  test("with a single attempt allowed, transient failures are not retried", () => {
    const error = new TransientStoreFault("x");

    const next = transitionChunk(
      { status: "attempting", chunkIndex: 0, attempt: 0 },
      { type: "failed", error },
      { ...policy, maxAttempts: 1 }
    );

    expect(next.status).toBe("failed");
  });

  test.each<[ChunkState, "start" | "backoff-elapsed"]>([
    [{ status: "pending", chunkIndex: 0 }, "backoff-elapsed"],
    [{ status: "attempting", chunkIndex: 0, attempt: 0 }, "start"],
    [{ status: "committed", chunkIndex: 0, attempts: 1, counters }, "start"],
    [{ status: "failed", chunkIndex: 0, attempts: 1, error: new Error("x") }, "backoff-elapsed"],
  ])("rejects invalid events (%o, %s)", (state, type) => {
    expect(() => transitionChunk(state, { type }, policy)).toThrow(InvalidChunkTransitionError);
  });

  test("names the state and event in the error", () => {
    expect(() =>
      transitionChunk({ status: "pending", chunkIndex: 0 }, { type: "succeeded", counters }, policy)
    ).toThrow("Chunk cannot handle 'succeeded' while pending");
  });
});

describe("isTerminal", () => {
  test("only committed and failed are terminal", () => {
    expect(isTerminal({ status: "pending", chunkIndex: 0 })).toBe(false);
    expect(isTerminal({ status: "attempting", chunkIndex: 0, attempt: 0 })).toBe(false);
    expect(isTerminal({ status: "committed", chunkIndex: 0, attempts: 1, counters })).toBe(true);
    expect(
      isTerminal({ status: "failed", chunkIndex: 0, attempts: 1, error: new Error("x") })
    ).toBe(true);
  });
});
