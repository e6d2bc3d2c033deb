/**
 * Direct load of a session graph
 *
 * Turns an aggregated {@link SessionGraph} into the ordered write steps the batch
 * loader runs against the store: nodes before the relationships that match them.
 *
 * @module graph/graph-records
 */

import { BatchLoader } from "../loader/batch-loader.js";
import {
  addCounters,
  emptyCounters,
  type BatchLoaderOptions,
  type BatchWriteTarget,
  type EffectCounters,
  type WriteOperation,
} from "../loader/types.js";
import { getComponentLogger } from "../logging/index.js";
import { MERGE_CONTAINS, MERGE_ITEMS, MERGE_NEXT, MERGE_SESSIONS } from "./queries.js";
import { getAllSchemaStatements } from "./schema.js";
import type { IdentityTable } from "./identity.js";
import type { DenseId, SessionGraph } from "./types.js";

export interface NodeRecord {
  id: DenseId;
  /** Raw identifier in string form */
  key: string;
}

export interface NextRecord {
  source: DenseId;
  dest: DenseId;
  weight: number;
  sessions: string[];
}

export interface ContainsRecord {
  session: DenseId;
  item: DenseId;
}

export type GraphWriteStep =
  | { operation: WriteOperation; kind: "items" | "sessions"; records: NodeRecord[] }
  | { operation: WriteOperation; kind: "next"; records: NextRecord[] }
  | { operation: WriteOperation; kind: "contains"; records: ContainsRecord[] };

/**
 * Store the direct load writes to
 */
export interface GraphLoadTarget extends BatchWriteTarget {
  writeQuery(cypher: string, params?: Record<string, unknown>): Promise<EffectCounters>;
}

export interface GraphLoadOptions {
  /** Options for the batch loader running each step */
  loader?: BatchLoaderOptions;

  /**
   * Create constraints and indexes before writing
   * @default true
   */
  ensureSchema?: boolean;

  /** Called after each step commits */
  onStepCompleted?: (step: GraphLoadStepResult) => void;
}

export interface GraphLoadStepResult {
  name: string;
  rows: number;
  counters: EffectCounters;
}

export interface GraphLoadResult {
  steps: GraphLoadStepResult[];
  total: EffectCounters;
}

function nodeRecords(table: IdentityTable): NodeRecord[] {
  return [...table.entries()].map(([identifier, id]) => ({ id, key: String(identifier) }));
}

/**
 * Build the write steps for `graph`, in execution order
 *
 * @example
 * ```typescript
 * const plan = toGraphWritePlan(buildSessionGraph(events));
 * plan.map((step) => step.kind); // ["items", "sessions", "next", "contains"]
 * ```
 */
export function toGraphWritePlan(graph: SessionGraph): GraphWriteStep[] {
  return [
    { operation: MERGE_ITEMS, kind: "items", records: nodeRecords(graph.items) },
    { operation: MERGE_SESSIONS, kind: "sessions", records: nodeRecords(graph.sessions) },
    {
      operation: MERGE_NEXT,
      kind: "next",
      records: [...graph.transitions.values()].map((edge) => ({
        source: edge.sourceId,
        dest: edge.destId,
        weight: edge.weight,
        sessions: [...edge.evidence],
      })),
    },
    {
      operation: MERGE_CONTAINS,
      kind: "contains",
      records: [...graph.containment.values()].map((edge) => ({
        session: edge.sessionId,
        item: edge.itemId,
      })),
    },
  ];
}

/**
 * Write `graph` to the store, one batch load per step
 *
 * A failed step stops the load; steps and chunks before it stay applied.
 *
 * @throws {LoadFailedError} When a chunk of any step fails
 */
export async function loadSessionGraph(
  target: GraphLoadTarget,
  graph: SessionGraph,
  options: GraphLoadOptions = {}
): Promise<GraphLoadResult> {
  const logger = getComponentLogger("graph:load");
  const { ensureSchema = true, onStepCompleted } = options;
  const loader = new BatchLoader(target, options.loader);

  if (ensureSchema) {
    for (const statement of getAllSchemaStatements()) {
      await target.writeQuery(statement);
    }
    logger.debug("Schema ensured");
  }

  const steps: GraphLoadStepResult[] = [];
  let total = emptyCounters();

  for (const step of toGraphWritePlan(graph)) {
    const counters = await loader.load<NodeRecord | NextRecord | ContainsRecord>(
      step.operation,
      step.records
    );
    const result: GraphLoadStepResult = {
      name: step.operation.name,
      rows: step.records.length,
      counters,
    };
    steps.push(result);
    total = addCounters(total, counters);
    onStepCompleted?.(result);
  }

  logger.info({ steps: steps.length, ...total }, "Session graph loaded");
  return { steps, total };
}
