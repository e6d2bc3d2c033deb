/**
 * @module graph/errors
 *
 * Error classes for graph construction, bulk export and store loading.
 *
 * Every error carries a `code` for programmatic handling and a `retryable` flag that
 * the batch loader consults when a write attempt fails. Driver errors are mapped into
 * this hierarchy by {@link mapNeo4jError} at the client boundary, so nothing above
 * the client needs to know about neo4j-driver error shapes.
 */

import { Neo4jError } from "neo4j-driver";
import type { EffectCounters } from "../loader/types.js";

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all pipeline errors
 *
 * @example
 * ```typescript
 * throw new PipelineError("Failed to execute query", "QUERY_FAILED", cause, true);
 * ```
 */
export class PipelineError extends Error {
  /**
   * Error code for categorization and handling
   */
  public readonly code: string;

  /**
   * Original error that caused this error (if any)
   *
   * NOTE: Uses 'override' to explicitly shadow ES2022 Error.cause property.
   * This restricts cause to Error instances only.
   */
  public override readonly cause?: Error;

  /**
   * Whether this error is transient and the operation should be retried
   */
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string = "PIPELINE_ERROR",
    cause?: Error,
    retryable: boolean = false
  ) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
    this.cause = cause;
    this.retryable = retryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (cause && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

// =============================================================================
// Input and Format Errors
// =============================================================================

/**
 * A raw event lacks a mandatory identifier
 *
 * Raised by identity assignment and aggregation. Nothing is exported or loaded
 * once this is thrown.
 */
export class MissingRequiredFieldError extends PipelineError {
  /**
   * Name of the missing field (e.g. "item_id")
   */
  public readonly field: string;

  /**
   * Position of the offending event in the input list
   */
  public readonly eventIndex: number;

  constructor(field: string, eventIndex: number, message?: string) {
    super(
      message ?? `Event at index ${eventIndex} is missing required field '${field}'`,
      "MISSING_REQUIRED_FIELD"
    );
    this.name = "MissingRequiredFieldError";
    this.field = field;
    this.eventIndex = eventIndex;
  }
}

/**
 * A value cannot be written to the bulk files so that it reads back unchanged
 *
 * The bulk format has no escaping: `;` separates list elements, tabs separate
 * columns and line breaks separate rows. The lookup index keys identifiers by their
 * string form, so `1` and `"1"` cannot both appear in one table.
 */
export class FormatViolationError extends PipelineError {
  /**
   * The offending values, as written
   */
  public readonly values: readonly string[];

  constructor(values: readonly string[], problem: string = "contain a reserved separator") {
    const preview = values.slice(0, 5).map((v) => JSON.stringify(v)).join(", ");
    super(
      `${values.length} value(s) ${problem} and cannot be exported: ${preview}`,
      "FORMAT_VIOLATION"
    );
    this.name = "FormatViolationError";
    this.values = values;
  }
}

/**
 * An input or bulk file does not have the expected structure
 */
export class BulkFormatError extends PipelineError {
  /**
   * File the problem was found in
   */
  public readonly filePath: string;

  constructor(filePath: string, message: string, cause?: Error) {
    super(`${filePath}: ${message}`, "BULK_FORMAT_ERROR", cause);
    this.name = "BulkFormatError";
    this.filePath = filePath;
  }
}

/**
 * Required configuration is missing or invalid
 */
export class ConfigurationError extends PipelineError {
  /**
   * Individual problems, one per invalid setting
   */
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

// =============================================================================
// Store Errors
// =============================================================================

/**
 * Connection to the graph store could not be established
 *
 * RETRYABLE by default, as connection issues are often transient.
 */
export class StoreConnectionError extends PipelineError {
  constructor(message: string, cause?: Error, retryable: boolean = true) {
    super(message, "CONNECTION_ERROR", cause, retryable);
    this.name = "StoreConnectionError";
  }
}

/**
 * Retryable store failure: service unavailable, session expired, or a failure the
 * store itself classifies as transient
 */
export class TransientStoreFault extends PipelineError {
  /**
   * Store-specific error code, when the driver reported one
   */
  public readonly storeCode?: string;

  constructor(message: string, storeCode?: string, cause?: Error) {
    super(message, "TRANSIENT_STORE_FAULT", cause, true);
    this.name = "TransientStoreFault";
    this.storeCode = storeCode;
  }
}

/**
 * Non-retryable store failure (syntax error, constraint violation, auth failure, ...)
 */
export class PermanentStoreFault extends PipelineError {
  /**
   * Store-specific error code, when the driver reported one
   */
  public readonly storeCode?: string;

  constructor(message: string, storeCode?: string, cause?: Error) {
    super(message, "PERMANENT_STORE_FAULT", cause, false);
    this.name = "PermanentStoreFault";
    this.storeCode = storeCode;
  }
}

/**
 * Terminal failure of a whole batch load
 *
 * Wraps the fault that failed the chunk: a {@link TransientStoreFault} after the
 * retry budget ran out, or the first non-retryable fault. Chunks before
 * `chunkIndex` were committed to the store; the counters they produced are not
 * reported here.
 */
export class LoadFailedError extends PipelineError {
  /**
   * Name of the write operation being loaded
   */
  public readonly operation: string;

  /**
   * Zero-based index of the chunk that failed
   */
  public readonly chunkIndex: number;

  /**
   * Number of write attempts made for the failed chunk
   */
  public readonly attempts: number;

  constructor(operation: string, chunkIndex: number, attempts: number, cause: Error) {
    super(
      `Load '${operation}' failed at chunk ${chunkIndex} after ${attempts} attempt(s): ${cause.message}`,
      "LOAD_FAILED",
      cause,
      false
    );
    this.name = "LoadFailedError";
    this.operation = operation;
    this.chunkIndex = chunkIndex;
    this.attempts = attempts;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Driver error codes that the store reports for retryable conditions
 */
const TRANSIENT_CODES = new Set(["ServiceUnavailable", "SessionExpired"]);

/**
 * Prefix of the server-side transient error classification
 */
const TRANSIENT_CODE_PREFIX = "Neo.TransientError.";

/**
 * Whether an error belongs to the retryable store fault class
 */
export function isTransientStoreFault(error: unknown): boolean {
  return error instanceof TransientStoreFault;
}

/**
 * Whether a store error code denotes a transient condition
 */
export function isTransientStoreCode(code: string): boolean {
  return TRANSIENT_CODES.has(code) || code.startsWith(TRANSIENT_CODE_PREFIX);
}

/**
 * Map a neo4j-driver error into the store fault hierarchy
 *
 * Errors already in the hierarchy pass through unchanged.
 *
 * @example
 * ```typescript
 * try {
 *   await session.executeWrite((tx) => tx.run(query, { batch }));
 * } catch (error) {
 *   throw mapNeo4jError(error instanceof Error ? error : new Error(String(error)));
 * }
 * ```
 */
export function mapNeo4jError(error: Error): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  if (error instanceof Neo4jError) {
    if (isTransientStoreCode(error.code)) {
      return new TransientStoreFault(error.message, error.code, error);
    }
    if (error.code.includes("Security")) {
      return new StoreConnectionError(error.message, error, false);
    }
    return new PermanentStoreFault(error.message, error.code, error);
  }

  return new PermanentStoreFault(error.message, undefined, error);
}

/**
 * Render effect counters for log and error messages
 */
export function describeCounters(counters: EffectCounters): string {
  return `${counters.nodes} nodes, ${counters.relationships} relationships, ${counters.properties} properties`;
}
