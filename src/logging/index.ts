/**
 * Logging Module - Public API
 *
 * Structured logging built on Pino with secret redaction and component context.
 *
 * ```typescript
 * initializeLogger({ level: "info", format: "json" });
 *
 * const logger = getComponentLogger("export:bulk");
 * logger.info({ outputDir }, "Writing bulk files");
 * logger.error({ err }, "Export failed");
 * ```
 *
 * Environment variables (read by the pipeline configuration, not here):
 * - `LOG_LEVEL`: fatal|error|warn|info|debug|trace|silent, default info
 * - `LOG_FORMAT`: json|pretty, default json
 *
 * @module logging
 */

export * from "./types.js";

export {
  initializeLogger,
  isLoggerInitialized,
  getComponentLogger,
  getRootLogger,
  resetLogger,
} from "./logger-factory.js";

export { REDACT_PATHS, REDACT_OPTIONS, sanitizeError } from "./redactors.js";
