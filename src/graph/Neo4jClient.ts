/**
 * Neo4j Graph Client
 *
 * Connection management and query execution against Neo4j, plus the batch session
 * the {@link BatchLoader} writes through.
 *
 * Features:
 * - Connection pooling with neo4j-driver (default: 50 connections)
 * - Connectivity check retried with exponential backoff
 * - Managed read and write transactions, one session per call
 * - Driver errors mapped into the store fault hierarchy at this boundary
 *
 * @module graph/Neo4jClient
 */

import {
  auth,
  driver as neo4jDriver,
  isInt,
  isNode,
  isRelationship,
  type Driver,
  type Session,
} from "neo4j-driver";
import type { Neo4jConfig } from "./types.js";
import {
  StoreConnectionError,
  isTransientStoreFault,
  mapNeo4jError,
  PipelineError,
} from "./errors.js";
import { getComponentLogger } from "../logging/index.js";
import {
  withRetry,
  createExponentialBackoff,
  createRetryLogger,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
} from "../utils/retry.js";
import { BatchLoader } from "../loader/batch-loader.js";
import type {
  BatchLoaderOptions,
  BatchParameters,
  BatchRecord,
  BatchWriteSession,
  BatchWriteTarget,
  EffectCounters,
  WriteOperation,
} from "../loader/types.js";

/**
 * Driver settings the client passes to the factory
 */
export interface DriverSettings {
  maxConnectionPoolSize: number;
  connectionAcquisitionTimeout: number;
  maxTransactionRetryTime: number;
}

/**
 * Creates the underlying driver; replaced in tests
 */
export type DriverFactory = (
  uri: string,
  username: string,
  password: string,
  settings: DriverSettings
) => Driver;

export interface Neo4jGraphClientOptions {
  /** @default neo4j-driver's `driver()` with basic auth */
  createDriver?: DriverFactory;
}

/**
 * Plain query parameters
 */
export type QueryParams = Record<string, unknown>;

/**
 * Store health snapshot from {@link Neo4jGraphClient.preflight}
 */
export interface PreflightResult {
  ok: boolean;
  address?: string;
  agent?: string;
  database?: string;
  latencyMs: number;
  error?: string;
}

const defaultCreateDriver: DriverFactory = (uri, username, password, settings) =>
  neo4jDriver(uri, auth.basic(username, password), settings);

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * The part of a query result that carries update counters
 */
export type CountedResult = {
  summary: { counters: { updates(): { [key: string]: number } } };
};

/**
 * Translate summary counters into the loader's {@link EffectCounters}
 */
export function toEffectCounters(result: CountedResult): EffectCounters {
  const updates = result.summary.counters.updates();
  return {
    nodes: updates["nodesCreated"] ?? 0,
    relationships: updates["relationshipsCreated"] ?? 0,
    properties: updates["propertiesSet"] ?? 0,
  };
}

/**
 * Convert Neo4j values to JavaScript values recursively
 *
 * Integers become numbers; nodes and relationships keep their labels or type and
 * their converted properties.
 */
export function convertNeo4jValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (isInt(value)) {
    return value.toNumber();
  }

  if (typeof value !== "object") {
    return value;
  }

  if (isNode(value)) {
    return { labels: value.labels, properties: convertNeo4jValue(value.properties) };
  }

  if (isRelationship(value)) {
    return { type: value.type, properties: convertNeo4jValue(value.properties) };
  }

  if (Array.isArray(value)) {
    return value.map((v: unknown) => convertNeo4jValue(v));
  }

  const obj: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    obj[k] = convertNeo4jValue(v);
  }
  return obj;
}

/**
 * Neo4j client
 *
 * @example
 * ```typescript
 * const client = new Neo4jGraphClient({
 *   uri: "bolt://localhost:7687",
 *   username: "neo4j",
 *   password: process.env["NEO4J_PASSWORD"] ?? "",
 * });
 * await client.connect();
 *
 * const rows = await client.readQuery("MATCH (i:Item) RETURN count(i) AS items");
 * const counters = await client.executeBatch(
 *   { name: "items", query: "UNWIND $batch AS row MERGE (:Item {id: row.id})" },
 *   [{ id: 0 }, { id: 1 }]
 * );
 *
 * await client.disconnect();
 * ```
 */
export class Neo4jGraphClient implements BatchWriteTarget {
  private driver: Driver | null = null;
  private readonly config: Neo4jConfig;
  private readonly retryConfig: RetryConfig;
  private readonly createDriver: DriverFactory;
  private logger = getComponentLogger("graph:neo4j");

  constructor(config: Neo4jConfig, options: Neo4jGraphClientOptions = {}) {
    this.config = config;
    this.retryConfig = config.retry ?? DEFAULT_RETRY_CONFIG;
    this.createDriver = options.createDriver ?? defaultCreateDriver;
  }

  /**
   * Whether {@link connect} has succeeded and {@link disconnect} has not been called
   */
  isConnected(): boolean {
    return this.driver !== null;
  }

  /**
   * Create the driver and verify the server answers
   *
   * Connectivity failures are retried with exponential backoff.
   *
   * @throws {StoreConnectionError} If the server cannot be reached after all retries
   */
  async connect(): Promise<void> {
    if (this.driver) {
      return;
    }

    const startTime = Date.now();
    const { uri, username, password, database } = this.config;
    this.logger.info({ uri, database }, "Connecting to Neo4j");

    const driver = this.createDriver(uri, username, password, {
      maxConnectionPoolSize: this.config.maxConnectionPoolSize ?? 50,
      connectionAcquisitionTimeout: this.config.connectionAcquisitionTimeout ?? 30000,
      // Chunk retries belong to the batch loader; the driver must not retry underneath it
      maxTransactionRetryTime: 0,
    });

    try {
      const options = {
        maxRetries: this.retryConfig.maxRetries,
        delayFor: createExponentialBackoff(this.retryConfig),
        shouldRetry: (error: Error) => !(error instanceof PipelineError) || error.retryable,
        onRetry: createRetryLogger(this.logger, "Neo4j connection", this.retryConfig.maxRetries),
      };
      await withRetry(async () => {
        try {
          await driver.verifyConnectivity();
        } catch (error) {
          const mapped = mapNeo4jError(toError(error));
          throw mapped.retryable ? new StoreConnectionError(mapped.message, mapped) : mapped;
        }
      }, options);
    } catch (error) {
      this.logger.error(
        {
          metric: "neo4j.connection_ms",
          value: Date.now() - startTime,
          uri: this.config.uri,
          err: error,
        },
        "Failed to connect to Neo4j"
      );

      await driver.close().catch((closeError: unknown) => {
        this.logger.warn({ err: closeError }, "Error closing driver after failed connect");
      });

      if (error instanceof StoreConnectionError) {
        throw error;
      }
      throw new StoreConnectionError(
        `Failed to connect to Neo4j at ${this.config.uri}`,
        toError(error),
        false
      );
    }

    this.driver = driver;
    this.logger.info(
      { metric: "neo4j.connection_ms", value: Date.now() - startTime, uri: this.config.uri },
      "Connected to Neo4j"
    );
  }

  /**
   * Close the driver and release all pooled connections
   */
  async disconnect(): Promise<void> {
    const driver = this.driver;
    if (!driver) {
      return;
    }
    this.driver = null;

    const startTime = Date.now();
    try {
      await driver.close();
      this.logger.info(
        { metric: "neo4j.disconnect_ms", value: Date.now() - startTime },
        "Disconnected from Neo4j"
      );
    } catch (error) {
      this.logger.error({ err: error }, "Error during Neo4j disconnect");
      throw error;
    }
  }

  /**
   * Check if the connection is healthy
   *
   * @returns true if connected and the server is responding
   */
  async healthCheck(): Promise<boolean> {
    if (!this.driver) {
      this.logger.warn("Health check: Driver not connected");
      return false;
    }

    try {
      await this.driver.getServerInfo();
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "Health check: Server not responding");
      return false;
    }
  }

  /**
   * Round-trip a trivial query and report server details
   *
   * Never throws; failures are reported in the result.
   */
  async preflight(): Promise<PreflightResult> {
    const startTime = Date.now();
    try {
      const driver = this.requireDriver();
      const info = await driver.getServerInfo({ database: this.config.database });
      const rows = await this.readQuery("RETURN 1 AS ok");
      return {
        ok: rows[0]?.["ok"] === 1,
        address: info.address,
        agent: info.agent,
        database: this.config.database,
        latencyMs: Date.now() - startTime,
      };
    } catch (error) {
      return {
        ok: false,
        database: this.config.database,
        latencyMs: Date.now() - startTime,
        error: toError(error).message,
      };
    }
  }

  /**
   * Run a query in a read transaction
   *
   * @returns Records as plain objects keyed by column name
   * @throws {TransientStoreFault} For retryable driver failures
   * @throws {PermanentStoreFault} For anything else
   */
  async readQuery(
    cypher: string,
    params: QueryParams = {}
  ): Promise<Array<Record<string, unknown>>> {
    const startTime = Date.now();
    const session = this.openSession();

    try {
      const result = await session.executeRead(async (tx) => tx.run(cypher, params));
      const rows = result.records.map((record) => {
        const row: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(record.toObject())) {
          row[key] = convertNeo4jValue(value);
        }
        return row;
      });

      this.logger.debug(
        { metric: "neo4j.query_ms", value: Date.now() - startTime, recordCount: rows.length },
        "Query executed"
      );
      return rows;
    } catch (error) {
      throw this.queryFailed(error, cypher, startTime);
    } finally {
      await this.closeSession(session);
    }
  }

  /**
   * Run a query in a write transaction
   *
   * @returns Counters from the result summary
   * @throws {TransientStoreFault} For retryable driver failures
   * @throws {PermanentStoreFault} For anything else
   */
  async writeQuery(cypher: string, params: QueryParams = {}): Promise<EffectCounters> {
    const startTime = Date.now();
    const session = this.openSession();

    try {
      const result = await session.executeWrite(async (tx) => tx.run(cypher, params));
      const counters = toEffectCounters(result);
      this.logger.debug(
        { metric: "neo4j.write_ms", value: Date.now() - startTime, ...counters },
        "Write executed"
      );
      return counters;
    } catch (error) {
      throw this.queryFailed(error, cypher, startTime);
    } finally {
      await this.closeSession(session);
    }
  }

  /**
   * Open the session a batch load writes through
   *
   * Each `write` runs one chunk in its own write transaction.
   *
   * @throws {StoreConnectionError} If not connected
   */
  async openBatchSession(): Promise<BatchWriteSession> {
    const session = this.openSession();
    const logger = this.logger;

    return {
      async write<R extends BatchRecord>(
        operation: WriteOperation,
        parameters: BatchParameters<R>
      ): Promise<EffectCounters> {
        try {
          const result = await session.executeWrite(async (tx) =>
            tx.run(operation.query, { batch: parameters.batch })
          );
          return toEffectCounters(result);
        } catch (error) {
          const mapped = mapNeo4jError(toError(error));
          logger.debug(
            {
              operation: operation.name,
              code: mapped.code,
              retryable: isTransientStoreFault(mapped),
            },
            "Chunk write rejected"
          );
          throw mapped;
        }
      },

      async close(): Promise<void> {
        await session.close();
      },
    };
  }

  /**
   * Load `records` through `operation` with a {@link BatchLoader} over this client
   *
   * @throws {LoadFailedError} When a chunk fails
   */
  async executeBatch<R extends BatchRecord>(
    operation: WriteOperation,
    records: readonly R[],
    options: BatchLoaderOptions = {}
  ): Promise<EffectCounters> {
    return new BatchLoader(this, options).load(operation, records);
  }

  private requireDriver(): Driver {
    if (!this.driver) {
      throw new StoreConnectionError(
        "Not connected to Neo4j. Call connect() first.",
        undefined,
        false
      );
    }
    return this.driver;
  }

  private openSession(): Session {
    const driver = this.requireDriver();
    return this.config.database
      ? driver.session({ database: this.config.database })
      : driver.session();
  }

  private async closeSession(session: Session): Promise<void> {
    await session.close().catch((closeError: unknown) => {
      this.logger.warn({ err: closeError }, "Error closing Neo4j session");
    });
  }

  private queryFailed(error: unknown, cypher: string, startTime: number): PipelineError {
    this.logger.error(
      {
        metric: "neo4j.query_ms",
        value: Date.now() - startTime,
        err: error,
        cypher: cypher.substring(0, 200),
      },
      "Query failed"
    );
    return mapNeo4jError(toError(error));
  }
}
