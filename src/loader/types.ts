/**
 * Batch loader types
 *
 * @module loader/types
 */

import type { RetryConfig } from "../utils/retry.js";

/**
 * Opaque write record. Only the paired write operation knows its shape.
 */
export type BatchRecord = unknown;

/**
 * Accumulated effect of committed writes
 */
export interface EffectCounters {
  /** Nodes created */
  nodes: number;
  /** Relationships created */
  relationships: number;
  /** Properties set */
  properties: number;
}

/**
 * A parameterized write operation
 *
 * The query receives each chunk as its sole parameter, named `batch`:
 *
 * ```cypher
 * UNWIND $batch AS row
 * MERGE (i:Item {id: row.id})
 * ```
 */
export interface WriteOperation {
  /** Human-readable name used in logs and errors */
  name: string;
  /** Query text executed once per chunk */
  query: string;
}

/**
 * Parameters bound to a write operation for one chunk
 */
export interface BatchParameters<R extends BatchRecord = BatchRecord> {
  batch: readonly R[];
}

/**
 * One logical session against the store, held for a whole load
 */
export interface BatchWriteSession {
  /**
   * Execute the operation for one chunk in its own write transaction
   *
   * @returns Counters reported by the store for this chunk
   * @throws {TransientStoreFault} For retryable failures
   * @throws {PermanentStoreFault} For anything else
   */
  write<R extends BatchRecord>(
    operation: WriteOperation,
    parameters: BatchParameters<R>
  ): Promise<EffectCounters>;

  /** Release the session */
  close(): Promise<void>;
}

/**
 * Store that can hand out batch write sessions
 */
export interface BatchWriteTarget {
  openBatchSession(): Promise<BatchWriteSession>;
}

/**
 * Batch loader settings
 */
export interface BatchLoaderConfig {
  /**
   * Records per chunk
   * @default 10000
   */
  chunkSize: number;

  /**
   * Write attempts per chunk before the load fails
   * @default 3
   */
  maxRetries: number;

  /**
   * Backoff time unit in milliseconds; retry n waits `backoffUnitMs * 2^n`
   * @default 1000
   */
  backoffUnitMs: number;
}

/**
 * Batch loader options: configuration plus the hooks tests and callers may replace
 */
export interface BatchLoaderOptions extends Partial<BatchLoaderConfig> {
  /**
   * Decide whether a failed attempt may be retried
   * @default isTransientStoreFault
   */
  isRetryable?: (error: Error) => boolean;

  /**
   * Wait between attempts
   * @default setTimeout-based sleep
   */
  sleep?: (ms: number) => Promise<void>;

  /**
   * Cap for a single backoff delay, in milliseconds
   * @default 60000
   */
  maxDelayMs?: RetryConfig["maxDelayMs"];

  /**
   * Called after every committed chunk
   */
  onChunkCommitted?: (progress: ChunkProgress) => void;
}

/**
 * Progress report for a committed chunk
 */
export interface ChunkProgress {
  operation: string;
  chunkIndex: number;
  chunkCount: number;
  /** Records committed so far, this chunk included */
  recordsDone: number;
  recordsTotal: number;
  /** Counters reported for this chunk */
  chunk: EffectCounters;
  /** Counters accumulated so far, this chunk included */
  total: EffectCounters;
}

/**
 * Default batch loader settings
 */
export const DEFAULT_BATCH_LOADER_CONFIG: BatchLoaderConfig = {
  chunkSize: 10_000,
  maxRetries: 3,
  backoffUnitMs: 1000,
};

/**
 * Fresh zeroed counters
 */
export function emptyCounters(): EffectCounters {
  return { nodes: 0, relationships: 0, properties: 0 };
}

/**
 * Sum two counter sets without mutating either
 */
export function addCounters(a: EffectCounters, b: EffectCounters): EffectCounters {
  return {
    nodes: a.nodes + b.nodes,
    relationships: a.relationships + b.relationships,
    properties: a.properties + b.properties,
  };
}
