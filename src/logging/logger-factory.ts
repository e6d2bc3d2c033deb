/**
 * Logger Factory
 *
 * Core logging infrastructure using Pino. Handles root logger creation and
 * component-scoped child loggers.
 *
 * Logs go to stderr; stdout is left to the CLI's command output.
 *
 * @module logging/logger-factory
 */

import pino from "pino";
import type { LoggerConfig, ComponentContext } from "./types.js";
import { REDACT_OPTIONS } from "./redactors.js";

/**
 * Singleton root logger instance
 */
let rootLogger: pino.Logger | null = null;

/**
 * Create the root Pino logger with full configuration
 *
 * @internal
 */
function createRootLogger(config: LoggerConfig): pino.Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: config.level,
    redact: REDACT_OPTIONS,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.stream) {
    return pino(pinoOptions, config.stream);
  }

  if (config.format === "pretty") {
    return pino({
      ...pinoOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

/**
 * Initialize the global logger
 *
 * Must be called once at startup before any component logger is requested.
 *
 * @throws Error if the logger is already initialized
 *
 * @example
 * ```typescript
 * initializeLogger({ level: "info", format: "json" });
 * const logger = getComponentLogger("cli");
 * ```
 */
export function initializeLogger(config: LoggerConfig): void {
  if (rootLogger !== null) {
    throw new Error("Logger already initialized. initializeLogger() should only be called once.");
  }

  try {
    rootLogger = createRootLogger(config);
    rootLogger.debug({ level: config.level, format: config.format }, "Logger initialized");
  } catch (error) {
    // pino-pretty missing or the transport failed to start: plain JSON on stderr
    rootLogger = pino(
      {
        level: config.level,
        redact: REDACT_OPTIONS,
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
          level: (label) => ({ level: label }),
        },
      },
      pino.destination(2)
    );

    rootLogger.warn(
      {
        requestedFormat: config.format,
        fallbackFormat: "json",
        error: error instanceof Error ? error.message : String(error),
      },
      "Logger initialization failed, using fallback JSON logger"
    );
  }
}

/**
 * Whether initializeLogger() has been called
 */
export function isLoggerInitialized(): boolean {
  return rootLogger !== null;
}

/**
 * Get the root logger instance
 *
 * @throws Error if the logger is not initialized
 * @internal - Most code should use getComponentLogger() instead
 */
export function getRootLogger(): pino.Logger {
  if (rootLogger === null) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return rootLogger;
}

/**
 * Get a component-scoped logger
 *
 * @param component - Component name (use colon notation for hierarchy)
 * @param runId - Optional pipeline run identifier
 *
 * @example
 * ```typescript
 * const logger = getComponentLogger("loader:batch");
 * logger.info({ chunkIndex: 3, rows: 10000 }, "Chunk committed");
 * // {"level":"info","component":"loader:batch","chunkIndex":3,"rows":10000,...}
 * ```
 */
export function getComponentLogger(component: string, runId?: string): pino.Logger {
  const root = getRootLogger();

  const context: ComponentContext = {
    component,
    ...(runId && { runId }),
  };

  return root.child(context);
}

/**
 * Reset logger (for testing only)
 *
 * @internal
 */
export function resetLogger(): void {
  rootLogger = null;
}
