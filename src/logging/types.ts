/**
 * Logging Types and Interfaces
 *
 * @module logging/types
 */

/**
 * All log levels, for validation of LOG_LEVEL values
 *
 * Ordered from highest to lowest severity. `silent` suppresses all output and is
 * what the tests use.
 */
export const LOG_LEVELS = ["silent", "fatal", "error", "warn", "info", "debug", "trace"] as const;

/**
 * Log levels supported by the logger
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Log output format
 * - json: one JSON object per line on stderr
 * - pretty: human-readable colorized output (pino-pretty transport)
 */
export type LogFormat = "json" | "pretty";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default "info"
   */
  level: LogLevel;

  /**
   * Log output format
   * @default "json"
   */
  format: LogFormat;

  /**
   * Optional custom output stream
   * @internal - Only used in tests for log capture
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Context bound to every entry written by a component logger
 */
export interface ComponentContext {
  /**
   * Component name, colon-separated for hierarchy (e.g. "loader:batch", "graph:neo4j")
   */
  component: string;

  /**
   * Optional run identifier, set by the CLI so the entries of one pipeline run can be
   * grouped
   */
  runId?: string;
}
