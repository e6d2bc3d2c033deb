/**
 * Dependency Initialization for CLI
 *
 * Builds the configuration and logger once per invocation and connects the Neo4j
 * client for the commands that need the store.
 */

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import {
  loadPipelineConfig,
  requireNeo4jConfig,
  type PipelineConfig,
} from "../../config/index.js";
import { Neo4jGraphClient, type Neo4jGraphClientOptions } from "../../graph/Neo4jClient.js";
import { initializeLogger, getComponentLogger } from "../../logging/index.js";

/**
 * Everything a command needs besides the store
 */
export interface CliContext {
  config: PipelineConfig;
  logger: Logger;
  runId: string;
}

/**
 * Load configuration from the environment and initialize logging
 *
 * @throws {ConfigurationError} If an environment variable is invalid
 */
export function initializeCli(env: Record<string, string | undefined> = process.env): CliContext {
  const config = loadPipelineConfig(env);

  initializeLogger({
    level: config.logging.level,
    format: config.logging.format,
  });

  const runId = randomUUID();
  const logger = getComponentLogger("cli", runId);
  logger.debug({ loader: config.loader, export: config.export }, "CLI initialized");

  return { config, logger, runId };
}

/**
 * Connect a client using the context's Neo4j settings
 *
 * @throws {ConfigurationError} If NEO4J_URI or NEO4J_PASSWORD is missing
 * @throws {StoreConnectionError} If the server cannot be reached
 */
export async function connectGraphClient(
  context: CliContext,
  options: Neo4jGraphClientOptions = {}
): Promise<Neo4jGraphClient> {
  const client = new Neo4jGraphClient(requireNeo4jConfig(context.config), options);
  await client.connect();
  return client;
}

/**
 * Run `fn` with a connected client, disconnecting afterwards
 *
 * A failed disconnect is logged; the result or error of `fn` is what the caller sees.
 */
export async function withGraphClient<T>(
  context: CliContext,
  fn: (client: Neo4jGraphClient) => Promise<T>,
  options: Neo4jGraphClientOptions = {}
): Promise<T> {
  const client = await connectGraphClient(context, options);
  try {
    return await fn(client);
  } finally {
    try {
      await client.disconnect();
    } catch (error) {
      context.logger.warn({ err: error }, "Failed to disconnect from Neo4j");
    }
  }
}
