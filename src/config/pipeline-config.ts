/**
 * Pipeline Configuration
 *
 * Builds the one configuration object a run uses, from environment variables,
 * validated with zod. It is created once at startup and passed to the components
 * that need it; nothing reads the environment after that.
 *
 * Environment variables:
 * - NEO4J_URI, NEO4J_USER (default "neo4j"), NEO4J_PASSWORD, NEO4J_DATABASE
 * - NEO4J_MAX_POOL_SIZE (default 50), NEO4J_ACQUISITION_TIMEOUT_MS (default 30000)
 * - BATCH_CHUNK_SIZE (default 10000), BATCH_MAX_RETRIES (default 3),
 *   BATCH_BACKOFF_UNIT_MS (default 1000)
 * - EXPORT_DIR (default "import")
 * - LOG_LEVEL (default "info"), LOG_FORMAT (default "json")
 *
 * @module config/pipeline-config
 */

import { z } from "zod";
import { ConfigurationError } from "../graph/errors.js";
import type { Neo4jConfig } from "../graph/types.js";
import type { BatchLoaderConfig } from "../loader/types.js";
import { DEFAULT_BATCH_LOADER_CONFIG } from "../loader/types.js";
import { LOG_LEVELS, type LogFormat, type LogLevel } from "../logging/types.js";

/**
 * Environment variable names
 */
export const ENV_KEYS = {
  NEO4J_URI: "NEO4J_URI",
  NEO4J_USER: "NEO4J_USER",
  NEO4J_PASSWORD: "NEO4J_PASSWORD",
  NEO4J_DATABASE: "NEO4J_DATABASE",
  NEO4J_MAX_POOL_SIZE: "NEO4J_MAX_POOL_SIZE",
  NEO4J_ACQUISITION_TIMEOUT_MS: "NEO4J_ACQUISITION_TIMEOUT_MS",
  BATCH_CHUNK_SIZE: "BATCH_CHUNK_SIZE",
  BATCH_MAX_RETRIES: "BATCH_MAX_RETRIES",
  BATCH_BACKOFF_UNIT_MS: "BATCH_BACKOFF_UNIT_MS",
  EXPORT_DIR: "EXPORT_DIR",
  LOG_LEVEL: "LOG_LEVEL",
  LOG_FORMAT: "LOG_FORMAT",
} as const;

export interface ExportConfig {
  /** Directory bulk files are written to */
  outputDir: string;
}

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
}

export interface PipelineConfig {
  /** Present when NEO4J_URI or NEO4J_PASSWORD is set, or when required */
  neo4j?: Neo4jConfig;
  loader: BatchLoaderConfig;
  export: ExportConfig;
  logging: LoggingConfig;
}

export interface LoadConfigOptions {
  /**
   * Fail unless the Neo4j connection settings are complete
   * @default false
   */
  requireNeo4j?: boolean;
}

const positiveInt = (fallback: number): z.ZodType<number, z.ZodTypeDef, unknown> =>
  z.coerce.number().int().positive().default(fallback);

const Neo4jSchema = z.object({
  uri: z
    .string({ required_error: `${ENV_KEYS.NEO4J_URI} is required` })
    .regex(/^(bolt|neo4j)(\+s|\+ssc)?:\/\/.+/, {
      message: `${ENV_KEYS.NEO4J_URI} must be a bolt:// or neo4j:// URI`,
    }),
  username: z.string().default("neo4j"),
  password: z.string({ required_error: `${ENV_KEYS.NEO4J_PASSWORD} is required` }).min(1),
  database: z.string().optional(),
  maxConnectionPoolSize: positiveInt(50),
  connectionAcquisitionTimeout: positiveInt(30000),
});

const LoaderSchema = z.object({
  chunkSize: positiveInt(DEFAULT_BATCH_LOADER_CONFIG.chunkSize),
  maxRetries: positiveInt(DEFAULT_BATCH_LOADER_CONFIG.maxRetries),
  backoffUnitMs: z.coerce.number().nonnegative().default(DEFAULT_BATCH_LOADER_CONFIG.backoffUnitMs),
});

const LogLevelSchema = z.enum(LOG_LEVELS);

const PipelineSchema = z.object({
  loader: LoaderSchema,
  export: z.object({ outputDir: z.string().min(1).default("import") }),
  logging: z.object({
    level: LogLevelSchema.default("info"),
    format: z.enum(["json", "pretty"]).default("json"),
  }),
});

type Env = Record<string, string | undefined>;

/**
 * Read a variable, treating the empty string as unset
 */
function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value === "" ? undefined : value;
}

function formatIssues(error: z.ZodError, prefix: string): string[] {
  return error.issues.map((issue) => {
    const field = [prefix, ...issue.path].join(".");
    return `${field}: ${issue.message}`;
  });
}

/**
 * Build the pipeline configuration from environment variables
 *
 * @param env - Variables to read; the CLI passes `process.env` after loading `.env`
 * @throws {ConfigurationError} If a value is invalid, or Neo4j settings are required
 *   and incomplete
 *
 * @example
 * ```typescript
 * const config = loadPipelineConfig(process.env, { requireNeo4j: true });
 * const client = new Neo4jGraphClient(requireNeo4jConfig(config));
 * ```
 */
export function loadPipelineConfig(
  env: Env = process.env,
  options: LoadConfigOptions = {}
): PipelineConfig {
  const parsed = PipelineSchema.safeParse({
    loader: {
      chunkSize: read(env, ENV_KEYS.BATCH_CHUNK_SIZE),
      maxRetries: read(env, ENV_KEYS.BATCH_MAX_RETRIES),
      backoffUnitMs: read(env, ENV_KEYS.BATCH_BACKOFF_UNIT_MS),
    },
    export: { outputDir: read(env, ENV_KEYS.EXPORT_DIR) },
    logging: {
      level: read(env, ENV_KEYS.LOG_LEVEL),
      format: read(env, ENV_KEYS.LOG_FORMAT),
    },
  });

  const issues: string[] = parsed.success ? [] : formatIssues(parsed.error, "config");

  let neo4j: Neo4jConfig | undefined;
  const wantNeo4j =
    options.requireNeo4j === true ||
    read(env, ENV_KEYS.NEO4J_URI) !== undefined ||
    read(env, ENV_KEYS.NEO4J_PASSWORD) !== undefined;

  if (wantNeo4j) {
    const neo4jParsed = Neo4jSchema.safeParse({
      uri: read(env, ENV_KEYS.NEO4J_URI),
      username: read(env, ENV_KEYS.NEO4J_USER),
      password: read(env, ENV_KEYS.NEO4J_PASSWORD),
      database: read(env, ENV_KEYS.NEO4J_DATABASE),
      maxConnectionPoolSize: read(env, ENV_KEYS.NEO4J_MAX_POOL_SIZE),
      connectionAcquisitionTimeout: read(env, ENV_KEYS.NEO4J_ACQUISITION_TIMEOUT_MS),
    });
    if (neo4jParsed.success) {
      neo4j = neo4jParsed.data;
    } else {
      issues.push(...formatIssues(neo4jParsed.error, "neo4j"));
    }
  }

  if (!parsed.success || issues.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  return { ...parsed.data, neo4j };
}

/**
 * Neo4j settings of a configuration, for commands that talk to the store
 *
 * @throws {ConfigurationError} If the configuration has none
 */
export function requireNeo4jConfig(config: PipelineConfig): Neo4jConfig {
  if (!config.neo4j) {
    throw new ConfigurationError(
      `${ENV_KEYS.NEO4J_URI} and ${ENV_KEYS.NEO4J_PASSWORD} must be set to connect to Neo4j`,
      [`${ENV_KEYS.NEO4J_URI} is required`, `${ENV_KEYS.NEO4J_PASSWORD} is required`]
    );
  }
  return config.neo4j;
}
