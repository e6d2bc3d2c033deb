/**
 * Export Command - Write bulk import files from an event file
 */

/* eslint-disable no-console */

import chalk from "chalk";
import { readEventFile } from "../../events/event-reader.js";
import { BulkExporter, type BulkExportSummary } from "../../export/bulk-exporter.js";
import { buildSessionGraph, getGraphStats } from "../../graph/aggregation.js";
import { createSpinner } from "../output/progress.js";
import { createExportTable } from "../output/formatters.js";
import type { CliContext } from "../utils/dependency-init.js";
import type { ExportCommandOptions } from "../utils/validation.js";

/**
 * Execute export command
 *
 * @param eventsPath - JSON array of events
 */
export async function exportCommand(
  eventsPath: string,
  options: ExportCommandOptions,
  context: CliContext
): Promise<BulkExportSummary> {
  const outputDir = options.output ?? context.config.export.outputDir;
  const spinner = createSpinner(`Reading ${chalk.cyan(eventsPath)}...`);

  try {
    const events = await readEventFile(eventsPath);
    spinner.text = `Aggregating ${events.length.toLocaleString()} events...`;
    const graph = buildSessionGraph(events);
    const stats = getGraphStats(graph);

    spinner.text = `Writing bulk files to ${chalk.cyan(outputDir)}...`;
    const summary = await new BulkExporter().export(graph, {
      outputDir,
      onFormatViolation: options.warnFormat ? "warn" : "error",
    });
    spinner.succeed(
      `Exported ${stats.items} items, ${stats.sessions} sessions, ` +
        `${stats.transitions} NEXT and ${stats.containment} CONTAINS edges`
    );

    console.log(createExportTable(summary));
    if (summary.formatViolations > 0) {
      console.log(
        chalk.yellow(
          `\n${summary.formatViolations} identifier(s) will not read back as written; ` +
            "see the warnings in the log."
        )
      );
    }
    console.log(chalk.gray(`\nManifest: ${summary.manifestPath}`));
    return summary;
  } catch (error) {
    spinner.fail("Export failed");
    throw error;
  }
}
