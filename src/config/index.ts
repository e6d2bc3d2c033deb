/**
 * @module config
 */

export {
  ENV_KEYS,
  loadPipelineConfig,
  requireNeo4jConfig,
  type PipelineConfig,
  type ExportConfig,
  type LoggingConfig,
  type LoadConfigOptions,
} from "./pipeline-config.js";
