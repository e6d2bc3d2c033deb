/**
 * Backoff and retry helpers
 *
 * `Neo4jGraphClient.connect` retries its connectivity check through {@link withRetry}.
 * The batch loader retries chunks in its own state machine and only borrows the
 * delay schedule and {@link sleep} from here.
 *
 * @module utils/retry
 */

import type pino from "pino";

/**
 * Retry settings for establishing a Neo4j connection
 */
export interface RetryConfig {
  /** Retries after the first attempt; 0 tries once */
  maxRetries: number;
  /** Delay before the first retry */
  initialDelayMs: number;
  /** Upper bound on any single delay */
  maxDelayMs: number;
  /** Growth factor between consecutive delays */
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
};

/**
 * Delay in milliseconds before the retry that follows failed attempt `attempt`
 * (0-based)
 */
export type BackoffSchedule = (attempt: number) => number;

/**
 * `initialDelayMs * backoffMultiplier^attempt`, capped at `maxDelayMs`
 *
 * @example
 * ```typescript
 * // The batch loader's chunk schedule: 1s, 2s, 4s, ...
 * const delayFor = createExponentialBackoff({
 *   initialDelayMs: 1000,
 *   maxDelayMs: 60000,
 *   backoffMultiplier: 2,
 * });
 * delayFor(2); // 4000
 * ```
 */
export function createExponentialBackoff(
  config: Pick<RetryConfig, "initialDelayMs" | "maxDelayMs" | "backoffMultiplier">
): BackoffSchedule {
  const { initialDelayMs, maxDelayMs, backoffMultiplier } = config;
  return (attempt) => Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt), maxDelayMs);
}

/**
 * `onRetry` callback that logs each retry as a warning with a 1-based attempt
 */
export function createRetryLogger(
  logger: pino.Logger,
  operation: string,
  maxRetries: number
): (attempt: number, error: Error, delayMs: number) => void {
  return (attempt, error, delayMs) => {
    logger.warn(
      {
        attempt: attempt + 1,
        maxRetries,
        delayMs,
        error: error.message,
        errorType: error.constructor.name,
      },
      `Retrying ${operation}`
    );
  };
}

export interface RetryOptions {
  /** Retries after the first attempt; 0 tries once */
  maxRetries: number;
  delayFor: BackoffSchedule;
  /** @default retry every error */
  shouldRetry?: (error: Error) => boolean;
  /** Called before each wait */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** @default {@link sleep} */
  wait?: (ms: number) => Promise<void>;
}

/**
 * Run `operation` until it resolves, a failure is not retryable, or the retries are
 * spent; then rethrow the last failure. No wait follows the final attempt.
 *
 * @example
 * ```typescript
 * await withRetry(() => driver.verifyConnectivity(), {
 *   maxRetries: config.maxRetries,
 *   delayFor: createExponentialBackoff(config),
 *   shouldRetry: (error) => error instanceof StoreConnectionError,
 * });
 * ```
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxRetries, delayFor, shouldRetry = () => true, onRetry, wait = sleep } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      if (attempt >= maxRetries || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = delayFor(attempt);
      onRetry?.(attempt, error, delayMs);
      await wait(delayMs);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
