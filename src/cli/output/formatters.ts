/**
 * Output Formatters for CLI
 *
 * Functions for formatting output as tables or JSON.
 */

import Table from "cli-table3";
import chalk from "chalk";
import type { BulkExportSummary } from "../../export/bulk-exporter.js";
import type { GraphLoadResult } from "../../graph/graph-records.js";
import type { PreflightResult } from "../../graph/Neo4jClient.js";
import type { EffectCounters } from "../../loader/types.js";

/**
 * Truncate a string to a maximum length, adding ellipsis if truncated
 *
 * @param str - String to truncate
 * @param maxLength - Maximum length
 * @returns Truncated string with ellipsis if needed
 */
export function truncate(str: string, maxLength: number): string {
  if (maxLength < 4) return str.substring(0, maxLength);
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength - 3) + "...";
}

/**
 * Format duration in milliseconds to human readable string
 *
 * @example
 * formatDuration(500) // "500ms"
 * formatDuration(2340) // "2.3s"
 * formatDuration(75000) // "1m 15s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Render a cell value from a query row
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray("null");
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

function baseTable(
  head: string[],
  colAligns?: Array<"left" | "right" | "center">
): InstanceType<typeof Table> {
  return new Table({
    head: head.map((h) => chalk.cyan(h)),
    ...(colAligns && { colAligns }),
    style: {
      head: [],
      border: ["gray"],
    },
  });
}

/**
 * Counters of a write as a two-column table
 */
export function createCountersTable(counters: EffectCounters): string {
  const table = baseTable(["Effect", "Count"], ["left", "right"]);
  table.push(
    ["Nodes created", counters.nodes.toLocaleString()],
    ["Relationships created", counters.relationships.toLocaleString()],
    ["Properties set", counters.properties.toLocaleString()]
  );
  return table.toString();
}

/**
 * Files of a bulk export with their row counts
 */
export function createExportTable(summary: BulkExportSummary): string {
  const table = baseTable(["File", "Rows"], ["left", "right"]);
  for (const entry of Object.values(summary.files)) {
    table.push([entry.file, entry.rows.toLocaleString()]);
  }
  return table.toString();
}

/**
 * Per-step results of a direct graph load, with a total row
 */
export function createGraphLoadTable(result: GraphLoadResult): string {
  const table = baseTable(
    ["Step", "Rows", "Nodes", "Relationships", "Properties"],
    ["left", "right", "right", "right", "right"]
  );
  for (const step of result.steps) {
    table.push([
      step.name,
      step.rows.toLocaleString(),
      step.counters.nodes.toLocaleString(),
      step.counters.relationships.toLocaleString(),
      step.counters.properties.toLocaleString(),
    ]);
  }
  const rows = result.steps.reduce((sum, step) => sum + step.rows, 0);
  table.push([
    chalk.bold("total"),
    rows.toLocaleString(),
    result.total.nodes.toLocaleString(),
    result.total.relationships.toLocaleString(),
    result.total.properties.toLocaleString(),
  ]);
  return table.toString();
}

/**
 * Query rows as a table, columns taken from the first row
 */
export function createRowsTable(rows: ReadonlyArray<Record<string, unknown>>): string {
  const first = rows[0];
  if (!first) {
    return chalk.yellow("No rows returned.");
  }

  const columns = Object.keys(first);
  const table = baseTable(columns);
  for (const row of rows) {
    table.push(columns.map((column) => truncate(formatCell(row[column]), 60)));
  }
  return table.toString();
}

/**
 * One-line summary of a preflight check
 */
export function formatPreflight(result: PreflightResult): string {
  const latency = chalk.gray(`(${formatDuration(result.latencyMs)})`);
  if (!result.ok) {
    return `${chalk.red("✗")} Neo4j ${chalk.red("unreachable")} ${latency}\n  ${chalk.red(
      result.error ?? "unexpected response"
    )}`;
  }
  const details = [result.address, result.agent, result.database].filter(
    (part): part is string => part !== undefined && part !== ""
  );
  const status = `${chalk.green("✓")} Neo4j ${chalk.green("healthy")} ${latency}`;
  return `${status}\n  ${details.join(" | ")}`;
}
