/**
 * Per-chunk write state machine
 *
 * ```
 *   pending ──start──▶ attempting ──succeeded──▶ committed
 *                        │    ▲
 *                 failed │    │ backoff-elapsed
 *                        ▼    │
 *                       retrying
 *                        │
 *   (not retryable, or budget spent)
 *                        ▼
 *                      failed
 * ```
 *
 * {@link transitionChunk} is pure: it never touches the store or the clock. The
 * batch loader performs the write and the wait, then feeds the outcome back in as
 * an event.
 *
 * @module loader/chunk-state
 */

import { PipelineError } from "../graph/errors.js";
import type { EffectCounters } from "./types.js";

export type ChunkState =
  | { status: "pending"; chunkIndex: number }
  | { status: "attempting"; chunkIndex: number; attempt: number }
  | { status: "retrying"; chunkIndex: number; attempt: number; delayMs: number; error: Error }
  | { status: "committed"; chunkIndex: number; attempts: number; counters: EffectCounters }
  | { status: "failed"; chunkIndex: number; attempts: number; error: Error };

export type ChunkStatus = ChunkState["status"];

export type ChunkEvent =
  | { type: "start" }
  | { type: "succeeded"; counters: EffectCounters }
  | { type: "failed"; error: Error }
  | { type: "backoff-elapsed" };

/**
 * Retry rules the state machine applies to a failed attempt
 */
export interface ChunkRetryPolicy {
  /** Attempts allowed per chunk, at least 1 */
  maxAttempts: number;
  /** Whether a failure may be retried */
  isRetryable: (error: Error) => boolean;
  /** Wait before the retry that follows failed attempt `attempt` (0-based) */
  delayFor: (attempt: number, error: Error) => number;
}

/**
 * Raised when an event arrives in a state that does not accept it
 */
export class InvalidChunkTransitionError extends PipelineError {
  constructor(
    public readonly from: ChunkStatus,
    public readonly event: ChunkEvent["type"]
  ) {
    super(`Chunk cannot handle '${event}' while ${from}`, "INVALID_CHUNK_TRANSITION");
    this.name = "InvalidChunkTransitionError";
  }
}

/**
 * Whether a state ends the chunk's life
 */
export function isTerminal(
  state: ChunkState
): state is Extract<ChunkState, { status: "committed" | "failed" }> {
  return state.status === "committed" || state.status === "failed";
}

/**
 * Compute the next state of a chunk
 *
 * @throws {InvalidChunkTransitionError} If `event` is not valid in `state`
 */
export function transitionChunk(
  state: ChunkState,
  event: ChunkEvent,
  policy: ChunkRetryPolicy
): ChunkState {
  const { chunkIndex } = state;

  switch (state.status) {
    case "pending":
      if (event.type === "start") {
        return { status: "attempting", chunkIndex, attempt: 0 };
      }
      break;

    case "attempting": {
      const attempts = state.attempt + 1;
      if (event.type === "succeeded") {
        return { status: "committed", chunkIndex, attempts, counters: event.counters };
      }
      if (event.type === "failed") {
        if (!policy.isRetryable(event.error) || attempts >= policy.maxAttempts) {
          return { status: "failed", chunkIndex, attempts, error: event.error };
        }
        return {
          status: "retrying",
          chunkIndex,
          attempt: state.attempt,
          delayMs: policy.delayFor(state.attempt, event.error),
          error: event.error,
        };
      }
      break;
    }

    case "retrying":
      if (event.type === "backoff-elapsed") {
        return { status: "attempting", chunkIndex, attempt: state.attempt + 1 };
      }
      break;

    case "committed":
    case "failed":
      break;
  }

  throw new InvalidChunkTransitionError(state.status, event.type);
}
