/**
 * Secret Redaction Configuration
 *
 * Paths that pino replaces with [REDACTED] before an entry is written. The store
 * credentials travel inside the pipeline configuration, which is logged at debug
 * level when the CLI starts.
 *
 * @module logging/redactors
 */

/**
 * Paths to redact from log objects (pino redaction path syntax)
 */
export const REDACT_PATHS = [
  "env.NEO4J_PASSWORD",
  "config.neo4j.password",
  "neo4j.password",
  "*.password",
  "*.credentials",
  "*.token",
  "*.secret",
];

/**
 * Pino redaction options
 *
 * Keeps the key and replaces the value so entries keep their shape.
 */
export const REDACT_OPTIONS = {
  paths: REDACT_PATHS,
  censor: "[REDACTED]",
  remove: false,
} as const;

/**
 * Flatten an error into a plain object for structured logging
 *
 * Follows `cause` chains and keeps extra own properties such as `code`,
 * `chunkIndex` or `attempts`, which pino's default serializer would drop for
 * nested causes.
 *
 * @example
 * ```typescript
 * logger.error({ err: sanitizeError(error) }, "Load failed");
 * ```
 */
export function sanitizeError(error: Error): Record<string, unknown> {
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    cause: error.cause instanceof Error ? sanitizeError(error.cause) : undefined,
    ...Object.fromEntries(
      Object.entries(error).filter(([key]) => !["name", "message", "stack", "cause"].includes(key))
    ),
  };
}
