/**
 * Chunked, retrying batch loader
 *
 * Drives a parameterized write operation into a store in fixed-size chunks, one
 * chunk at a time and in list order, over a single session held for the whole load.
 * Each chunk runs through the state machine in `chunk-state.ts`; a chunk that ends
 * `failed` aborts the load and later chunks are never attempted.
 *
 * @module loader/batch-loader
 */

import type pino from "pino";
import {
  LoadFailedError,
  ConfigurationError,
  describeCounters,
  isTransientStoreFault,
} from "../graph/errors.js";
import { getComponentLogger } from "../logging/index.js";
import { createExponentialBackoff, sleep as defaultSleep } from "../utils/retry.js";
import {
  transitionChunk,
  type ChunkRetryPolicy,
  type ChunkState,
  type ChunkEvent,
} from "./chunk-state.js";
import {
  DEFAULT_BATCH_LOADER_CONFIG,
  addCounters,
  emptyCounters,
  type BatchLoaderConfig,
  type BatchLoaderOptions,
  type BatchRecord,
  type BatchWriteSession,
  type BatchWriteTarget,
  type ChunkProgress,
  type EffectCounters,
  type WriteOperation,
} from "./types.js";

const DEFAULT_MAX_DELAY_MS = 60_000;

/**
 * Split records into consecutive windows of `chunkSize`; the last may be shorter
 *
 * @example
 * ```typescript
 * [...chunkRecords(["a", "b", "c", "d", "e"], 2)];
 * // [["a", "b"], ["c", "d"], ["e"]]
 * ```
 */
export function* chunkRecords<R>(
  records: readonly R[],
  chunkSize: number
): Generator<readonly R[]> {
  for (let start = 0; start < records.length; start += chunkSize) {
    yield records.slice(start, start + chunkSize);
  }
}

/**
 * Number of chunks `chunkRecords` yields for `total` records
 */
export function countChunks(total: number, chunkSize: number): number {
  return Math.ceil(total / chunkSize);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Batch loader
 *
 * @example
 * ```typescript
 * const loader = new BatchLoader(client, { chunkSize: 5000 });
 * const counters = await loader.load(
 *   { name: "items", query: "UNWIND $batch AS row MERGE (:Item {id: row.id})" },
 *   rows
 * );
 * ```
 */
export class BatchLoader {
  private readonly config: BatchLoaderConfig;
  private readonly policy: ChunkRetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onChunkCommitted?: (progress: ChunkProgress) => void;
  private logger: pino.Logger = getComponentLogger("loader:batch");

  constructor(
    private readonly target: BatchWriteTarget,
    options: BatchLoaderOptions = {}
  ) {
    this.config = {
      chunkSize: options.chunkSize ?? DEFAULT_BATCH_LOADER_CONFIG.chunkSize,
      maxRetries: options.maxRetries ?? DEFAULT_BATCH_LOADER_CONFIG.maxRetries,
      backoffUnitMs: options.backoffUnitMs ?? DEFAULT_BATCH_LOADER_CONFIG.backoffUnitMs,
    };
    validateConfig(this.config);

    this.policy = {
      maxAttempts: this.config.maxRetries,
      isRetryable: options.isRetryable ?? isTransientStoreFault,
      delayFor: createExponentialBackoff({
        initialDelayMs: this.config.backoffUnitMs,
        maxDelayMs: options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS,
        backoffMultiplier: 2,
      }),
    };
    this.sleep = options.sleep ?? defaultSleep;
    this.onChunkCommitted = options.onChunkCommitted;
  }

  /**
   * Effective settings
   */
  getConfig(): Readonly<BatchLoaderConfig> {
    return this.config;
  }

  /**
   * Load `records` through `operation`
   *
   * @returns Counters summed over every chunk
   * @throws {LoadFailedError} When a chunk fails; earlier chunks stay applied in the store
   */
  async load<R extends BatchRecord>(
    operation: WriteOperation,
    records: readonly R[]
  ): Promise<EffectCounters> {
    const total = records.length;
    const chunkCount = countChunks(total, this.config.chunkSize);
    const startTime = Date.now();

    this.logger.info(
      {
        operation: operation.name,
        rows: total,
        chunks: chunkCount,
        chunkSize: this.config.chunkSize,
        queryPreview: operation.query.substring(0, 150),
      },
      "Batch load started"
    );

    if (total === 0) {
      return emptyCounters();
    }

    let session: BatchWriteSession;
    try {
      session = await this.target.openBatchSession();
    } catch (error) {
      throw new LoadFailedError(operation.name, 0, 0, toError(error));
    }

    let counters = emptyCounters();
    let recordsDone = 0;
    let chunkIndex = 0;

    try {
      for (const chunk of chunkRecords(records, this.config.chunkSize)) {
        const committed = await this.runChunk(session, operation, chunk, chunkIndex);
        counters = addCounters(counters, committed.counters);
        recordsDone += chunk.length;

        this.logger.info(
          {
            operation: operation.name,
            chunkIndex,
            progress: `${recordsDone}/${total}`,
            attempts: committed.attempts,
            nodes: committed.counters.nodes,
            relationships: committed.counters.relationships,
          },
          "Chunk committed"
        );

        this.onChunkCommitted?.({
          operation: operation.name,
          chunkIndex,
          chunkCount,
          recordsDone,
          recordsTotal: total,
          chunk: committed.counters,
          total: counters,
        });

        chunkIndex++;
      }
    } catch (error) {
      this.logger.error(
        {
          operation: operation.name,
          chunkIndex,
          chunkCount,
          appliedBeforeFailure: describeCounters(counters),
          err: error,
        },
        "Batch load failed"
      );
      throw error;
    } finally {
      await this.closeSession(session, operation);
    }

    this.logger.info(
      {
        metric: "loader.batch_ms",
        value: Date.now() - startTime,
        operation: operation.name,
        ...counters,
      },
      "Batch load completed"
    );

    return counters;
  }

  /**
   * Release the session without letting a close failure replace the load's outcome
   */
  private async closeSession(session: BatchWriteSession, operation: WriteOperation): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.logger.warn({ operation: operation.name, err: error }, "Failed to close batch session");
    }
  }

  /**
   * Drive one chunk to a terminal state
   *
   * @throws {LoadFailedError} If the chunk ends `failed`
   */
  private async runChunk(
    session: BatchWriteSession,
    operation: WriteOperation,
    chunk: readonly BatchRecord[],
    chunkIndex: number
  ): Promise<Extract<ChunkState, { status: "committed" }>> {
    let state: ChunkState = { status: "pending", chunkIndex };

    for (;;) {
      switch (state.status) {
        case "pending":
          state = transitionChunk(state, { type: "start" }, this.policy);
          break;

        case "attempting": {
          let event: ChunkEvent;
          try {
            const reported = await session.write(operation, { batch: chunk });
            event = { type: "succeeded", counters: reported };
          } catch (error) {
            event = { type: "failed", error: toError(error) };
          }
          state = transitionChunk(state, event, this.policy);
          break;
        }

        case "retrying":
          this.logger.warn(
            {
              operation: operation.name,
              chunkIndex,
              attempt: state.attempt + 1,
              maxRetries: this.config.maxRetries,
              delayMs: state.delayMs,
              error: state.error.message,
              errorType: state.error.name,
            },
            "Chunk write failed, retrying"
          );
          await this.sleep(state.delayMs);
          state = transitionChunk(state, { type: "backoff-elapsed" }, this.policy);
          break;

        case "committed":
          return state;

        case "failed":
          throw new LoadFailedError(operation.name, chunkIndex, state.attempts, state.error);
      }
    }
  }
}

function validateConfig(config: BatchLoaderConfig): void {
  const issues: string[] = [];
  if (!Number.isInteger(config.chunkSize) || config.chunkSize < 1) {
    issues.push(`chunkSize must be a positive integer, got ${config.chunkSize}`);
  }
  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 1) {
    issues.push(`maxRetries must be a positive integer, got ${config.maxRetries}`);
  }
  if (!Number.isFinite(config.backoffUnitMs) || config.backoffUnitMs < 0) {
    issues.push(`backoffUnitMs must be zero or more, got ${config.backoffUnitMs}`);
  }
  if (issues.length > 0) {
    throw new ConfigurationError("Invalid batch loader configuration", issues);
  }
}
