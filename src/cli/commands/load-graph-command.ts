/**
 * Load-Graph Command - Aggregate an event file and write the graph to Neo4j
 */

/* eslint-disable no-console */

import chalk from "chalk";
import { readEventFile } from "../../events/event-reader.js";
import { buildSessionGraph } from "../../graph/aggregation.js";
import {
  loadSessionGraph,
  type GraphLoadResult,
  type GraphLoadTarget,
} from "../../graph/graph-records.js";
import { createSpinner, updateLoadSpinner } from "../output/progress.js";
import { createGraphLoadTable, formatDuration } from "../output/formatters.js";
import type { CliContext } from "../utils/dependency-init.js";
import type { LoadGraphCommandOptions } from "../utils/validation.js";

/**
 * Execute load-graph command
 *
 * @param eventsPath - JSON array of events
 * @param target - Connected store
 */
export async function loadGraphCommand(
  eventsPath: string,
  options: LoadGraphCommandOptions,
  context: CliContext,
  target: GraphLoadTarget
): Promise<GraphLoadResult> {
  const spinner = createSpinner(`Reading ${chalk.cyan(eventsPath)}...`);
  const startTime = Date.now();

  try {
    const graph = buildSessionGraph(await readEventFile(eventsPath));

    const result = await loadSessionGraph(target, graph, {
      ensureSchema: options.skipSchema !== true,
      loader: {
        ...context.config.loader,
        ...(options.chunkSize !== undefined && { chunkSize: options.chunkSize }),
        onChunkCommitted: (progress) => updateLoadSpinner(spinner, progress),
      },
      onStepCompleted: (step) => {
        context.logger.info({ step: step.name, rows: step.rows, ...step.counters }, "Step done");
      },
    });

    spinner.succeed(`Graph loaded in ${formatDuration(Date.now() - startTime)}`);
    console.log(createGraphLoadTable(result));
    return result;
  } catch (error) {
    spinner.fail("Graph load failed");
    throw error;
  }
}
