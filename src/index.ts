/**
 * session-graph - Public API
 *
 * Turns session events into a weighted item-transition graph, exports it as bulk
 * import files or loads it into Neo4j in retried chunks.
 *
 * ```typescript
 * import { initializeLogger, buildSessionGraph, BulkExporter } from "session-graph";
 *
 * initializeLogger({ level: "info", format: "json" });
 * const graph = buildSessionGraph(events);
 * await new BulkExporter().export(graph, { outputDir: "import" });
 * ```
 *
 * @module session-graph
 */

// Events
export type { Identifier, RawEvent } from "./events/types.js";
export { isPresent, compareIdentifiers } from "./events/types.js";
export { parseEvents, readEventFile, readBatchFile } from "./events/event-reader.js";

// Graph construction
export { IdentityTable, assignIdentities } from "./graph/identity.js";
export { aggregateEdges, buildSessionGraph, getGraphStats } from "./graph/aggregation.js";
export type {
  DenseId,
  TransitionEdge,
  ContainmentEdge,
  GraphIdentities,
  AggregatedEdges,
  SessionGraph,
  SessionGraphStats,
  Neo4jConfig,
} from "./graph/types.js";
export { NodeLabel, RelationshipType } from "./graph/types.js";

// Bulk export
export {
  BulkExporter,
  findFormatViolations,
  findIdentifierCollisions,
  type BulkExportOptions,
  type BulkExportSummary,
  type FormatViolationPolicy,
} from "./export/bulk-exporter.js";
export {
  readBulkExport,
  type BulkReadOptions,
  type BulkExportContents,
} from "./export/bulk-reader.js";
export * from "./export/format.js";

// Batch loading
export { BatchLoader, chunkRecords, countChunks } from "./loader/batch-loader.js";
export { transitionChunk, isTerminal, InvalidChunkTransitionError } from "./loader/chunk-state.js";
export type { ChunkState, ChunkEvent, ChunkRetryPolicy } from "./loader/chunk-state.js";
export * from "./loader/types.js";

// Neo4j
export {
  Neo4jGraphClient,
  type Neo4jGraphClientOptions,
  type PreflightResult,
  type QueryParams,
} from "./graph/Neo4jClient.js";
export {
  toGraphWritePlan,
  loadSessionGraph,
  type GraphWriteStep,
  type GraphLoadTarget,
  type GraphLoadOptions,
  type GraphLoadResult,
} from "./graph/graph-records.js";
export { getAllSchemaStatements } from "./graph/schema.js";

// Errors
export * from "./graph/errors.js";

// Configuration and logging
export * from "./config/index.js";
export {
  initializeLogger,
  getComponentLogger,
  resetLogger,
  type LogLevel,
  type LogFormat,
  type LoggerConfig,
} from "./logging/index.js";
